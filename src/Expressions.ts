import { DIVISION_BY_ZERO, ILLEGAL_FUNCTION_CALL, RuntimeError, STRING_TOO_LONG, TYPE_MISMATCH, UNDEFINED_USER_FUNCTION } from "./Errors.ts";
import { callBuiltin } from "./Builtins.ts";
import { floatEqual } from "./Math.ts";
import type { BinaryOperator, Expr, FnCallExpr, UnaryOperator } from "./Syntax.ts";
import { TypeTag } from "./Types.ts";
import { typeOfVariable } from "./Variables.ts";
import type { ExecutionContext } from "./statements/ExecutionContext.ts";
import * as values from "./Values.ts";

export const MAX_STRING_LENGTH = 255;

export function evaluate(expr: Expr, context: ExecutionContext): values.Value {
  switch (expr.kind) {
    case 'number':
      return values.double(expr.value);
    case 'string':
      return values.string(expr.value);
    case 'variable':
      return context.runtime.getVariable(expr.name);
    case 'array':
      return context.runtime.getArray(expr.name, evaluateIndices(expr.indices, context));
    case 'unary':
      return evaluateUnary(expr.op, evaluate(expr.operand, context));
    case 'binary':
      return evaluateBinary(expr.op, evaluate(expr.left, context), evaluate(expr.right, context));
    case 'builtin':
      return callBuiltin(expr.name, expr.args.map((arg) => evaluate(arg, context)), context);
    case 'fn':
      return callUserFunction(expr, context);
  }
  throw new Error(`unknown expression ${JSON.stringify(expr)}`);
}

export function evaluateNumber(expr: Expr, context: ExecutionContext): number {
  const value = evaluate(expr, context);
  if (!values.isNumeric(value)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  return value.number;
}

// Rounds to a 16-bit integer the way assignment to an integer variable does.
export function evaluateInteger(expr: Expr, context: ExecutionContext): number {
  return values.toInt16(evaluateNumber(expr, context));
}

export function evaluateString(expr: Expr, context: ExecutionContext): string {
  const value = evaluate(expr, context);
  if (!values.isString(value)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  return value.string;
}

export function evaluateIndices(indices: Expr[], context: ExecutionContext): number[] {
  return indices.map((index) => values.toInteger(evaluate(index, context)));
}

function evaluateUnary(op: UnaryOperator, operand: values.Value): values.Value {
  switch (op) {
    case '-': return values.double(-values.toNumber(operand));
    case '+': return values.double(values.toNumber(operand));
    case 'not': return values.integer(~values.toInteger(operand));
  }
}

export function evaluateBinary(op: BinaryOperator, left: values.Value, right: values.Value): values.Value {
  if ((op === '+' || op === '&') && (values.isString(left) || values.isString(right))) {
    const result = stringOf(left) + stringOf(right);
    if (result.length > MAX_STRING_LENGTH) {
      throw RuntimeError.fromError(STRING_TOO_LONG);
    }
    return values.string(result);
  }
  if (values.isString(left) && values.isString(right)) {
    const comparison = compareStrings(op, left.string, right.string);
    if (comparison !== undefined) {
      return values.boolean(comparison);
    }
  }
  const a = values.toNumber(left);
  const b = values.toNumber(right);
  switch (op) {
    case '+':
    case '&':
      return values.double(a + b);
    case '-':
      return values.double(a - b);
    case '*':
      return values.double(a * b);
    case '/':
      if (b === 0) {
        throw RuntimeError.fromError(DIVISION_BY_ZERO);
      }
      return values.double(a / b);
    case '\\': {
      const divisor = Math.trunc(b);
      if (divisor === 0) {
        throw RuntimeError.fromError(DIVISION_BY_ZERO);
      }
      return values.double(Math.trunc(Math.trunc(a) / divisor));
    }
    case 'mod': {
      const divisor = Math.trunc(b);
      if (divisor === 0) {
        throw RuntimeError.fromError(DIVISION_BY_ZERO);
      }
      return values.double(Math.trunc(a) % divisor + 0);
    }
    case '^':
      return values.double(Math.pow(a, b));
    case '=':
      return values.boolean(floatEqual(a, b));
    case '<>':
      return values.boolean(!floatEqual(a, b));
    case '<':
      return values.boolean(a < b && !floatEqual(a, b));
    case '>':
      return values.boolean(a > b && !floatEqual(a, b));
    case '<=':
      return values.boolean(a < b || floatEqual(a, b));
    case '>=':
      return values.boolean(a > b || floatEqual(a, b));
    case 'and':
      return values.integer(values.toInt16(a) & values.toInt16(b));
    case 'or':
      return values.integer(values.toInt16(a) | values.toInt16(b));
    case 'xor':
      return values.integer(values.toInt16(a) ^ values.toInt16(b));
    case 'eqv':
      return values.integer(~(values.toInt16(a) ^ values.toInt16(b)));
    case 'imp':
      return values.integer(~values.toInt16(a) | values.toInt16(b));
  }
}

function stringOf(value: values.Value): string {
  return values.isString(value) ? value.string : '';
}

function compareStrings(op: BinaryOperator, a: string, b: string): boolean | undefined {
  switch (op) {
    case '=': return a === b;
    case '<>': return a !== b;
    case '<': return a < b;
    case '>': return a > b;
    case '<=': return a <= b;
    case '>=': return a >= b;
  }
}

// Parameters shadow variables of the same name for the duration of the call.
function callUserFunction(expr: FnCallExpr, context: ExecutionContext): values.Value {
  const runtime = context.runtime;
  const fn = runtime.functions.get(expr.name);
  if (!fn) {
    throw RuntimeError.fromError(UNDEFINED_USER_FUNCTION);
  }
  if (expr.args.length !== fn.params.length) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  const args = expr.args.map((arg) => evaluate(arg, context));
  const saved = new Map<string, values.Value>();
  for (const param of fn.params) {
    if (runtime.hasVariable(param)) {
      saved.set(param, runtime.getVariable(param));
    }
  }
  try {
    fn.params.forEach((param, i) => runtime.setVariable(param, args[i]));
    const result = evaluate(fn.body, context);
    if (values.isString(result) !== (typeOfVariable(expr.name) === TypeTag.STRING)) {
      throw RuntimeError.fromError(TYPE_MISMATCH);
    }
    return values.coerce(result, typeOfVariable(expr.name));
  } finally {
    for (const param of fn.params) {
      const previous = saved.get(param);
      if (previous) {
        runtime.setVariable(param, previous);
      } else {
        runtime.variables.delete(param);
      }
    }
  }
}
