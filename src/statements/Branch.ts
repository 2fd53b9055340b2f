import { ControlFlowTag } from "../ControlFlow.ts";
import { RETURN_WITHOUT_GOSUB, RuntimeError } from "../Errors.ts";
import { evaluate, evaluateNumber } from "../Expressions.ts";
import type { Statement, StatementOf } from "../Syntax.ts";
import * as values from "../Values.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { execute } from "./Statement.ts";

export function goto(statement: StatementOf<'goto'>, context: ExecutionContext) {
  context.runtime.jumpToLine(statement.line);
}

export function gosub(statement: StatementOf<'gosub'>, context: ExecutionContext) {
  callSubroutine(statement.line, context);
}

function callSubroutine(line: number, context: ExecutionContext) {
  const runtime = context.runtime;
  const target = runtime.findLineOrThrow(line);
  runtime.controlStack.push({tag: ControlFlowTag.GOSUB, returnPc: runtime.table.next(runtime.pc)});
  runtime.jump(target);
}

// Frames for WHILE loops entered inside the subroutine are discarded.
export function returnStatement(statement: StatementOf<'return'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const stack = runtime.controlStack;
  const index = stack.map((frame) => frame.tag).lastIndexOf(ControlFlowTag.GOSUB);
  const frame = stack[index];
  if (index < 0 || frame.tag !== ControlFlowTag.GOSUB) {
    throw RuntimeError.fromError(RETURN_WITHOUT_GOSUB);
  }
  const target = statement.line !== undefined ? runtime.findLineOrThrow(statement.line) : frame.returnPc;
  stack.length = index;
  if (frame.fromError) {
    runtime.endErrorHandling();
  }
  runtime.jump(target);
}

// Selectors outside 1..n fall through to the next statement.
export function on(statement: StatementOf<'on'>, context: ExecutionContext) {
  const index = Math.trunc(evaluateNumber(statement.selector, context));
  if (index < 1 || index > statement.lines.length) {
    return;
  }
  const line = statement.lines[index - 1];
  if (statement.gosub) {
    callSubroutine(line, context);
  } else {
    context.runtime.jumpToLine(line);
  }
}

export function ifStatement(statement: StatementOf<'if'>, context: ExecutionContext) {
  const condition = values.toBoolean(evaluate(statement.condition, context));
  const line = condition ? statement.thenLine : statement.elseLine;
  const statements = condition ? statement.thenStatements : statement.elseStatements;
  if (line !== undefined) {
    context.runtime.jumpToLine(line);
  } else if (statements) {
    executeInline(statements, context);
  }
}

// Runs statements of a single-line IF until one of them transfers control.
function executeInline(statements: Statement[], context: ExecutionContext) {
  const runtime = context.runtime;
  for (const statement of statements) {
    execute(statement, context);
    if (runtime.nextPc || !runtime.isRunning()) {
      return;
    }
  }
}
