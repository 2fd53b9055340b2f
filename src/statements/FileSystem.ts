import { BAD_FILE_MODE, BAD_RECORD_NUMBER, FIELD_OVERFLOW, ILLEGAL_FUNCTION_CALL, IOError, RuntimeError, TYPE_MISMATCH } from "../Errors.ts";
import { evaluateInteger, evaluateNumber, evaluateString } from "../Expressions.ts";
import { FieldDefinition, FileAccessor, OpenFile, OpenMode, tryIo } from "../Files.ts";
import { bytesToString, stringToBytes } from "../Disk.ts";
import type { Expr, LValue, StatementOf } from "../Syntax.ts";
import { TypeTag } from "../Types.ts";
import * as values from "../Values.ts";
import { typeOfVariable } from "../Variables.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { assign } from "./Assignment.ts";

const OPEN_MODES: Map<string, OpenMode> = new Map([
  ['I', OpenMode.INPUT],
  ['O', OpenMode.OUTPUT],
  ['A', OpenMode.APPEND],
  ['R', OpenMode.RANDOM],
]);

export function open(statement: StatementOf<'open'>, context: ExecutionContext) {
  const modeName = evaluateString(statement.mode, context).trim().charAt(0).toUpperCase();
  const mode = OPEN_MODES.get(modeName);
  if (mode === undefined) {
    throw RuntimeError.fromError(BAD_FILE_MODE);
  }
  const fileNumber = evaluateInteger(statement.fileNumber, context);
  const fileName = evaluateString(statement.fileName, context);
  const recordLength = statement.recordLength && evaluateInteger(statement.recordLength, context);
  if (recordLength !== undefined && recordLength <= 0) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  context.runtime.files.open(context.disk, fileNumber, fileName, mode, recordLength);
}

// A bare CLOSE closes everything.
export function close(statement: StatementOf<'close'>, context: ExecutionContext) {
  const files = context.runtime.files;
  if (statement.fileNumbers.length === 0) {
    files.closeAll();
    return;
  }
  for (const expr of statement.fileNumbers) {
    files.close(evaluateInteger(expr, context));
  }
}

export function getOpenFile(expr: Expr, context: ExecutionContext): OpenFile {
  return context.runtime.files.get(evaluateInteger(expr, context));
}

export function getSequentialWriteAccessor(expr: Expr, context: ExecutionContext): FileAccessor {
  const file = getOpenFile(expr, context);
  if (file.mode !== OpenMode.OUTPUT && file.mode !== OpenMode.APPEND) {
    throw new IOError(BAD_FILE_MODE);
  }
  return file.handle.accessor;
}

export function getSequentialReadAccessor(expr: Expr, context: ExecutionContext): FileAccessor {
  const file = getOpenFile(expr, context);
  if (file.mode !== OpenMode.INPUT) {
    throw new IOError(BAD_FILE_MODE);
  }
  return file.handle.accessor;
}

export function field(statement: StatementOf<'field'>, context: ExecutionContext) {
  const file = getOpenFile(statement.fileNumber, context);
  if (file.mode !== OpenMode.RANDOM) {
    throw RuntimeError.fromError(BAD_FILE_MODE);
  }
  let offset = 0;
  const fields: FieldDefinition[] = [];
  for (const {width: widthExpr, target} of statement.fields) {
    const width = evaluateInteger(widthExpr, context);
    if (width < 0) {
      throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
    }
    if (offset + width > file.recordLength) {
      throw RuntimeError.fromError(FIELD_OVERFLOW);
    }
    if (typeOfVariable(target.name) !== TypeTag.STRING) {
      throw RuntimeError.fromError(TYPE_MISMATCH);
    }
    fields.push({name: target.name, offset, width});
    offset += width;
  }
  file.fields = fields;
  publishFields(file, context);
}

// Copies the record buffer into the variables named by FIELD.
function publishFields(file: OpenFile, context: ExecutionContext) {
  for (const {name, offset, width} of file.fields) {
    context.runtime.setVariable(name, values.string(bytesToString(file.buffer.slice(offset, offset + width))));
  }
}

function recordNumber(file: OpenFile, expr: Expr | undefined, context: ExecutionContext): number {
  if (file.mode !== OpenMode.RANDOM) {
    throw RuntimeError.fromError(BAD_FILE_MODE);
  }
  if (!expr) {
    return file.nextRecord;
  }
  const record = Math.trunc(evaluateNumber(expr, context));
  if (record < 1) {
    throw RuntimeError.fromError(BAD_RECORD_NUMBER);
  }
  return record;
}

export function getRecord(statement: StatementOf<'get'>, context: ExecutionContext) {
  const file = getOpenFile(statement.fileNumber, context);
  const record = recordNumber(file, statement.record, context);
  const offset = (record - 1) * file.recordLength;
  file.buffer = tryIo(() => file.handle.accessor.readRecord(offset, file.recordLength));
  file.nextRecord = record + 1;
  publishFields(file, context);
}

export function putRecord(statement: StatementOf<'put'>, context: ExecutionContext) {
  const file = getOpenFile(statement.fileNumber, context);
  const record = recordNumber(file, statement.record, context);
  const offset = (record - 1) * file.recordLength;
  tryIo(() => file.handle.accessor.writeRecord(offset, file.buffer));
  file.nextRecord = record + 1;
}

function findField(name: string, context: ExecutionContext): {file: OpenFile, offset: number, width: number} | undefined {
  for (const file of context.runtime.files.handles.values()) {
    const definition = file.fields.find((field) => field.name === name);
    if (definition) {
      return {file, offset: definition.offset, width: definition.width};
    }
  }
}

// LSET and RSET justify the value within a field and write it into the record
// buffer.  Other targets are assigned as they are.
export function justifiedSet(statement: StatementOf<'lset'> | StatementOf<'rset'>, context: ExecutionContext) {
  const text = evaluateString(statement.value, context);
  const target: LValue = statement.target;
  const found = target.kind === 'variable' ? findField(target.name, context) : undefined;
  if (!found) {
    assign(target, values.string(text), context);
    return;
  }
  const {file, offset, width} = found;
  const clipped = text.slice(0, width);
  const justified = statement.kind === 'lset' ? clipped.padEnd(width, ' ') : clipped.padStart(width, ' ');
  file.buffer.splice(offset, width, ...stringToBytes(justified));
  publishFields(file, context);
}

export function kill(statement: StatementOf<'kill'>, context: ExecutionContext) {
  const fileName = evaluateString(statement.fileName, context);
  tryIo(() => context.disk.remove(fileName));
}

export function name(statement: StatementOf<'name'>, context: ExecutionContext) {
  const from = evaluateString(statement.from, context);
  const to = evaluateString(statement.to, context);
  tryIo(() => context.disk.rename(from, to));
}
