import { ILLEGAL_FUNCTION_CALL, RuntimeError, TYPE_MISMATCH } from "../Errors.ts";
import { evaluate, evaluateIndices, evaluateInteger, evaluateString } from "../Expressions.ts";
import type { LValue, StatementOf } from "../Syntax.ts";
import { TypeTag } from "../Types.ts";
import * as values from "../Values.ts";
import { typeOfVariable } from "../Variables.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

// Stores a value, converting numbers to the target's numeric type.
export function store(target: LValue, value: values.Value, context: ExecutionContext) {
  if (target.kind === 'variable') {
    context.runtime.setVariable(target.name, value);
  } else {
    context.runtime.setArray(target.name, evaluateIndices(target.indices, context), value);
  }
}

export function read(target: LValue, context: ExecutionContext): values.Value {
  if (target.kind === 'variable') {
    return context.runtime.getVariable(target.name);
  }
  return context.runtime.getArray(target.name, evaluateIndices(target.indices, context));
}

// Like store, but strings and numbers do not mix.
export function assign(target: LValue, value: values.Value, context: ExecutionContext) {
  const isStringTarget = typeOfVariable(target.name) === TypeTag.STRING;
  if (isStringTarget !== values.isString(value)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  store(target, value, context);
}

export function let_(statement: StatementOf<'let'>, context: ExecutionContext) {
  assign(statement.target, evaluate(statement.value, context), context);
}

export function swap(statement: StatementOf<'swap'>, context: ExecutionContext) {
  const {first, second} = statement;
  if (typeOfVariable(first.name) !== typeOfVariable(second.name)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  const a = read(first, context);
  const b = read(second, context);
  store(first, b, context);
  store(second, a, context);
}

// MID$(v$, start[, n]) = s$ overwrites characters in place without changing
// the length of v$.
export function midAssign(statement: StatementOf<'midAssign'>, context: ExecutionContext) {
  const target = read(statement.target, context);
  if (!values.isString(target)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  const text = target.string;
  const start = evaluateInteger(statement.start, context);
  if (start < 1 || start > text.length) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  const replacement = evaluateString(statement.value, context);
  let length = replacement.length;
  if (statement.length) {
    const limit = evaluateInteger(statement.length, context);
    if (limit < 0) {
      throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
    }
    length = Math.min(length, limit);
  }
  length = Math.min(length, text.length - start + 1);
  const result = text.slice(0, start - 1) + replacement.slice(0, length) + text.slice(start - 1 + length);
  store(statement.target, values.string(result), context);
}
