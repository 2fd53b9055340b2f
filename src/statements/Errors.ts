import { ControlFlowTag } from "../ControlFlow.ts";
import { ILLEGAL_FUNCTION_CALL, RESUME_WITHOUT_ERROR, RuntimeError } from "../Errors.ts";
import { evaluateInteger } from "../Expressions.ts";
import { ERR_VARIABLE } from "../Runtime.ts";
import type { StatementOf } from "../Syntax.ts";
import * as values from "../Values.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

// ON ERROR GOTO 0 turns trapping off.  Inside a handler it also makes the
// error being handled fatal.
export function onError(statement: StatementOf<'onError'>, context: ExecutionContext) {
  const runtime = context.runtime;
  if (statement.line !== 0) {
    runtime.errorHandler = {line: statement.line, gosub: statement.gosub};
    return;
  }
  runtime.errorHandler = undefined;
  if (runtime.errorPending) {
    throw RuntimeError.fromCode(values.toInteger(runtime.getVariable(ERR_VARIABLE)));
  }
}

export function error(statement: StatementOf<'error'>, context: ExecutionContext) {
  const code = evaluateInteger(statement.code, context);
  if (code < 1 || code > 255) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  throw RuntimeError.fromCode(code);
}

// RESUME retries the statement that failed, RESUME NEXT skips it and
// RESUME n continues at line n.
export function resume(statement: StatementOf<'resume'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const errorPc = runtime.errorPc;
  if (!runtime.errorPending || !errorPc) {
    throw RuntimeError.fromError(RESUME_WITHOUT_ERROR);
  }
  const target = statement.line !== undefined ? runtime.findLineOrThrow(statement.line) :
    statement.next ? runtime.table.next(errorPc) : errorPc;
  // Leaving an ON ERROR GOSUB handler this way abandons its return address.
  const stack = runtime.controlStack;
  const handlerFrame = stack.findIndex((frame) => frame.tag === ControlFlowTag.GOSUB && frame.fromError);
  if (handlerFrame >= 0) {
    stack.length = handlerFrame;
  }
  runtime.endErrorHandling();
  runtime.jump(target);
}
