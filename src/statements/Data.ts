import { ILLEGAL_DIRECT, RuntimeError } from "../Errors.ts";
import type { StatementOf } from "../Syntax.ts";
import { TypeTag } from "../Types.ts";
import * as values from "../Values.ts";
import { typeOfVariable } from "../Variables.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { store } from "./Assignment.ts";

// DATA is collected when the program loads, so running it does nothing.
export function data(_statement: StatementOf<'data'>, context: ExecutionContext) {
  if (context.runtime.directMode) {
    throw RuntimeError.fromError(ILLEGAL_DIRECT);
  }
}

// Numbers read into string variables keep the digits they were written with.
export function read(statement: StatementOf<'read'>, context: ExecutionContext) {
  for (const target of statement.targets) {
    let value = context.runtime.readData();
    if (typeOfVariable(target.name) === TypeTag.STRING && values.isNumeric(value)) {
      value = values.string(values.formatNumber(value));
    }
    store(target, value, context);
  }
}

export function restore(statement: StatementOf<'restore'>, context: ExecutionContext) {
  context.runtime.restoreData(statement.line);
}
