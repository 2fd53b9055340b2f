import { ControlFlowTag, isRunning } from "../ControlFlow.ts";
import { RuntimeError, WEND_WITHOUT_WHILE, WHILE_WITHOUT_WEND } from "../Errors.ts";
import { evaluate } from "../Expressions.ts";
import type { StatementOf } from "../Syntax.ts";
import * as values from "../Values.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

export function whileStatement(statement: StatementOf<'while'>, context: ExecutionContext) {
  const runtime = context.runtime;
  if (values.toBoolean(evaluate(statement.condition, context))) {
    runtime.controlStack.push({tag: ControlFlowTag.WHILE, whilePc: runtime.pc});
    return;
  }
  let depth = 1;
  let scan = runtime.pc;
  while (depth > 0) {
    scan = runtime.table.next(scan);
    if (!isRunning(scan)) {
      throw RuntimeError.fromError(WHILE_WITHOUT_WEND);
    }
    const kind = runtime.table.get(scan)?.kind;
    if (kind === 'while') {
      depth++;
    } else if (kind === 'wend') {
      depth--;
    }
  }
  runtime.jump(runtime.table.next(scan));
}

// WEND goes back to the nearest WHILE, which tests the condition again.
// GOSUB frames pushed since then stay on the stack.
export function wend(_statement: StatementOf<'wend'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const stack = runtime.controlStack;
  const index = stack.map((frame) => frame.tag).lastIndexOf(ControlFlowTag.WHILE);
  const frame = stack[index];
  if (index < 0 || frame.tag !== ControlFlowTag.WHILE) {
    throw RuntimeError.fromError(WEND_WITHOUT_WHILE);
  }
  stack.splice(index, 1);
  runtime.jump(frame.whilePc);
}
