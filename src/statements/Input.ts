import { INPUT_PAST_END, RuntimeError } from "../Errors.ts";
import { parseNumberPrefix } from "../Builtins.ts";
import { tryIo } from "../Files.ts";
import type { Expr, LValue, StatementOf } from "../Syntax.ts";
import { TypeTag } from "../Types.ts";
import * as values from "../Values.ts";
import { typeOfVariable } from "../Variables.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { store } from "./Assignment.ts";
import { getSequentialReadAccessor } from "./FileSystem.ts";

export function input(statement: StatementOf<'input'>, context: ExecutionContext) {
  const prompt = (statement.prompt ?? '') + (statement.questionMark ? '? ' : '');
  const line = readInputLine(statement.fileNumber, prompt, context);
  const items = splitInputItems(line);
  // Targets beyond the items typed keep their values.
  statement.targets.forEach((target, i) => {
    if (i < items.length) {
      store(target, parseInputItem(target, items[i]), context);
    }
  });
}

export function lineInput(statement: StatementOf<'lineInput'>, context: ExecutionContext) {
  const line = readInputLine(statement.fileNumber, statement.prompt ?? '', context);
  store(statement.target, values.string(line), context);
}

function readInputLine(fileNumber: Expr | undefined, prompt: string, context: ExecutionContext): string {
  if (fileNumber) {
    return tryIo(() => getSequentialReadAccessor(fileNumber, context).readLine());
  }
  const line = context.console.readLine(prompt);
  if (line === undefined) {
    throw RuntimeError.fromError(INPUT_PAST_END);
  }
  return line;
}

// Splits on commas outside double quotes and trims each item.  Quotes around
// an item are removed.
export function splitInputItems(line: string): string[] {
  const items: string[] = [];
  let current = '';
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (ch === ',' && !quoted) {
      items.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  items.push(current);
  return items.map((item) => {
    const trimmed = item.trim();
    const match = trimmed.match(/^"([^"]*)"?$/);
    return match ? match[1] : trimmed;
  });
}

function parseInputItem(target: LValue, item: string): values.Value {
  if (typeOfVariable(target.name) === TypeTag.STRING) {
    return values.string(item);
  }
  return values.double(parseNumberPrefix(item));
}
