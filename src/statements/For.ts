import { isRunning, PC } from "../ControlFlow.ts";
import { FOR_WITHOUT_NEXT, NEXT_WITHOUT_FOR, RuntimeError } from "../Errors.ts";
import { evaluateNumber } from "../Expressions.ts";
import type { Runtime } from "../Runtime.ts";
import type { StatementOf } from "../Syntax.ts";
import * as values from "../Values.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

export function forStatement(statement: StatementOf<'for'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const start = evaluateNumber(statement.start, context);
  const end = evaluateNumber(statement.end, context);
  const step = statement.step ? evaluateNumber(statement.step, context) : 1;
  runtime.setVariable(statement.variable, values.double(start));
  // Re-entering a loop makes it the most recent one again.
  runtime.forLoops.delete(statement.variable);
  if ((step > 0 && start > end) || (step < 0 && start < end)) {
    runtime.jump(runtime.table.next(findMatchingNext(runtime, statement.variable)));
    return;
  }
  runtime.forLoops.set(statement.variable, {resumePc: runtime.table.next(runtime.pc), end, step});
}

// Scans forward for the NEXT that closes the loop on `variable`.  Nested FORs
// open a level; each variable a NEXT names, or a bare NEXT, closes one.
function findMatchingNext(runtime: Runtime, variable: string): PC {
  let depth = 1;
  let scan = runtime.pc;
  for (;;) {
    scan = runtime.table.next(scan);
    if (!isRunning(scan)) {
      throw RuntimeError.fromError(FOR_WITHOUT_NEXT);
    }
    const statement = runtime.table.get(scan);
    if (statement?.kind === 'for') {
      depth++;
    } else if (statement?.kind === 'next') {
      if (statement.variables.length === 0) {
        depth--;
      }
      for (const name of statement.variables) {
        depth--;
        if (name === variable) {
          return scan;
        }
      }
      if (depth <= 0) {
        return scan;
      }
    }
  }
}

export function next(statement: StatementOf<'next'>, context: ExecutionContext) {
  const runtime = context.runtime;
  let names = statement.variables;
  if (names.length === 0) {
    const active = [...runtime.forLoops.keys()];
    if (active.length === 0) {
      throw RuntimeError.fromError(NEXT_WITHOUT_FOR);
    }
    names = [active[active.length - 1]];
  }
  for (const name of names) {
    const state = runtime.forLoops.get(name);
    if (!state) {
      throw RuntimeError.fromError(NEXT_WITHOUT_FOR);
    }
    runtime.setVariable(name, values.double(values.toNumber(runtime.getVariable(name)) + state.step));
    const value = values.toNumber(runtime.getVariable(name));
    const finished = state.step > 0 ? value > state.end : value < state.end;
    if (!finished) {
      dropLoopsAfter(runtime, name);
      runtime.jump(state.resumePc);
      return;
    }
    runtime.forLoops.delete(name);
  }
}

// Loops entered after `name` are abandoned when it iterates.
function dropLoopsAfter(runtime: Runtime, name: string) {
  const names = [...runtime.forLoops.keys()];
  for (const inner of names.slice(names.indexOf(name) + 1)) {
    runtime.forLoops.delete(inner);
  }
}
