import { DUPLICATE_DEFINITION, RuntimeError } from "../Errors.ts";
import { evaluateIndices } from "../Expressions.ts";
import type { StatementOf } from "../Syntax.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

export function dim(statement: StatementOf<'dim'>, context: ExecutionContext) {
  for (const {name, bounds} of statement.arrays) {
    context.runtime.dimArray(name, evaluateIndices(bounds, context));
  }
}

export function erase(statement: StatementOf<'erase'>, context: ExecutionContext) {
  for (const name of statement.names) {
    context.runtime.eraseArray(name);
  }
}

// The base can only change before any array exists.
export function optionBase(statement: StatementOf<'optionBase'>, context: ExecutionContext) {
  const runtime = context.runtime;
  if (runtime.variables.arrays.size > 0 && runtime.optionBase !== statement.base) {
    throw RuntimeError.fromError(DUPLICATE_DEFINITION);
  }
  runtime.optionBase = statement.base;
}
