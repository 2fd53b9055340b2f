import { errorMessage, ILLEGAL_FUNCTION_CALL, RuntimeError, STRING_TOO_LONG, TYPE_MISMATCH } from "./Errors.ts";
import { ERR_VARIABLE } from "./Runtime.ts";
import type { ExecutionContext } from "./statements/ExecutionContext.ts";
import { bytesToString, stringToBytes } from "./Disk.ts";
import { tryIo } from "./Files.ts";
import * as values from "./Values.ts";
import { Value } from "./Values.ts";

type ArgumentType = 'numeric' | 'string' | 'any';

interface BuiltinArgumentSpec {
  type: ArgumentType;
  optional: boolean;
}

type BuiltinFunction = (args: Value[], context: ExecutionContext) => Value;

export interface Builtin {
  name: string;
  arguments: BuiltinArgumentSpec[];
  fn: BuiltinFunction;
}

const _ = parseBuiltinSpec;

const BUILTINS: Map<string, Builtin> = new Map([
  _("abs numeric", ([x]) => values.double(Math.abs(num(x)))),
  _("atn numeric", ([x]) => values.double(Math.atan(num(x)))),
  _("cos numeric", ([x]) => values.double(Math.cos(num(x)))),
  _("exp numeric", ([x]) => values.double(Math.exp(num(x)))),
  _("fix numeric", ([x]) => values.double(Math.trunc(num(x)) + 0)),
  _("int numeric", ([x]) => values.double(Math.floor(num(x)))),
  _("log numeric", log),
  _("rnd numeric?", rnd),
  _("sgn numeric", ([x]) => values.double(Math.sign(num(x)) + 0)),
  _("sin numeric", ([x]) => values.double(Math.sin(num(x)))),
  _("sqr numeric", sqr),
  _("tan numeric", ([x]) => values.double(Math.tan(num(x)))),
  _("cint numeric", ([x]) => values.integer(num(x))),
  _("csng numeric", ([x]) => values.single(num(x))),
  _("cdbl numeric", ([x]) => values.double(num(x))),
  _("cvi string", ([s]) => values.integer(unpack(str(s), 2).getInt16(0, true))),
  _("cvs string", ([s]) => values.single(unpack(str(s), 4).getFloat32(0, true))),
  _("cvd string", ([s]) => values.double(unpack(str(s), 8).getFloat64(0, true))),
  _("mki$ numeric", ([x]) => pack(2, (view) => view.setInt16(0, values.toInt16(num(x)), true))),
  _("mks$ numeric", ([x]) => pack(4, (view) => view.setFloat32(0, num(x), true))),
  _("mkd$ numeric", ([x]) => pack(8, (view) => view.setFloat64(0, num(x), true))),
  _("asc string", asc),
  _("chr$ numeric", chr),
  _("hex$ numeric", ([x]) => values.string(radixString(num(x), 16))),
  _("oct$ numeric", ([x]) => values.string(radixString(num(x), 8))),
  _("left$ string numeric", left),
  _("right$ string numeric", right),
  _("mid$ string numeric numeric?", mid),
  _("len string", ([s]) => values.double(str(s).length)),
  _("str$ numeric", ([x]) => values.string(values.formatValue(x).trimEnd())),
  _("val string", ([s]) => values.double(parseNumberPrefix(str(s)))),
  _("space$ numeric", ([n]) => values.string(' '.repeat(stringLength(n)))),
  _("string$ numeric any", stringOf),
  _("instr any any any?", instr),
  _("tab numeric", tab),
  _("spc numeric", ([n]) => values.string(' '.repeat(Math.max(0, values.toInteger(n))))),
  _("pos any?", (_args, context) => values.double(context.console.getColumn())),
  _("lpos any?", () => values.double(0)),
  _("fre any?", () => values.double(32767)),
  _("peek numeric", () => values.double(0)),
  _("inp numeric", () => values.double(0)),
  _("varptr any", () => values.double(0)),
  _("usr any?", () => values.double(0)),
  _("eof numeric", ([n], context) => values.boolean(openFile(n, context).handle.accessor.eof())),
  _("lof numeric", ([n], context) => values.double(openFile(n, context).handle.accessor.length())),
  _("loc numeric", ([n], context) => values.double(openFile(n, context).handle.accessor.getLoc())),
  _("inkey$", (_args, context) => values.string(context.console.inkey())),
  _("input$ numeric numeric?", inputChars),
  _("timer", (_args, context) => values.double(secondsSinceMidnight(context.now()))),
  _("date$", (_args, context) => values.string(formatDate(context.now()))),
  _("time$", (_args, context) => values.string(formatTime(context.now()))),
  _("environ$ string", ([s], context) => values.string(context.environment.get(str(s)) ?? '')),
  _("error$ numeric?", errorString),
  _("erl", (_args, context) => values.double(context.runtime.errorLine)),
]);

// Checks the argument count and types before calling.  Wrong counts are
// illegal function calls and wrong types are type mismatches.
export function callBuiltin(name: string, args: Value[], context: ExecutionContext): Value {
  const builtin = BUILTINS.get(name);
  if (!builtin) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  const required = builtin.arguments.filter((arg) => !arg.optional).length;
  if (args.length < required || args.length > builtin.arguments.length) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  args.forEach((arg, i) => {
    const type = builtin.arguments[i].type;
    if ((type === 'string' && !values.isString(arg)) || (type === 'numeric' && !values.isNumeric(arg))) {
      throw RuntimeError.fromError(TYPE_MISMATCH);
    }
  });
  return builtin.fn(args, context);
}

function parseBuiltinSpec(spec: string, fn: BuiltinFunction): [string, Builtin] {
  const [name, ...argSpecs] = spec.split(/\s+/);
  const args: BuiltinArgumentSpec[] = argSpecs.map((argSpec) => {
    const optional = argSpec.endsWith('?');
    return {type: parseTypeSpec(optional ? argSpec.slice(0, -1) : argSpec), optional};
  });
  return [name, {name, arguments: args, fn}];
}

function parseTypeSpec(name: string): ArgumentType {
  switch (name) {
    case 'numeric':
    case 'string':
    case 'any':
      return name;
  }
  throw new Error(`invalid argument ${name}`);
}

function num(value: Value | undefined): number {
  return value ? values.toNumber(value) : 0;
}

function str(value: Value | undefined): string {
  return value && values.isString(value) ? value.string : '';
}

function illegalFunctionCall(): RuntimeError {
  return RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
}

function log([x]: Value[]): Value {
  const n = num(x);
  if (n <= 0) {
    throw illegalFunctionCall();
  }
  return values.double(Math.log(n));
}

function sqr([x]: Value[]): Value {
  const n = num(x);
  if (n < 0) {
    throw illegalFunctionCall();
  }
  return values.double(Math.sqrt(n));
}

// RND(0) repeats the last number and negative arguments reseed first.
function rnd([x]: Value[], context: ExecutionContext): Value {
  const n = x === undefined ? 1 : num(x);
  if (n === 0) {
    return values.single(context.random.getRandom(false));
  }
  if (n < 0) {
    context.random.reseed(n);
  }
  return values.single(context.random.getRandom(true));
}

function unpack(text: string, size: number): DataView {
  const bytes = stringToBytes(text.slice(0, size));
  while (bytes.length < size) {
    bytes.push(0);
  }
  return new DataView(Uint8Array.from(bytes).buffer);
}

function pack(size: number, write: (view: DataView) => void): Value {
  const buffer = new ArrayBuffer(size);
  write(new DataView(buffer));
  return values.string(bytesToString([...new Uint8Array(buffer)]));
}

function asc([s]: Value[]): Value {
  const text = str(s);
  if (text.length === 0) {
    throw illegalFunctionCall();
  }
  return values.double(text.charCodeAt(0) & 0xff);
}

function chr([x]: Value[]): Value {
  const code = values.toInt16(num(x));
  if (code < 0 || code > 255) {
    throw illegalFunctionCall();
  }
  return values.string(String.fromCharCode(code));
}

// Negative numbers print as their 16-bit two's complement.
function radixString(n: number, radix: number): string {
  let integer = values.toInt16(n);
  if (integer < 0) {
    integer += 0x10000;
  }
  return integer.toString(radix).toUpperCase();
}

function count(value: Value): number {
  const n = values.toInteger(value);
  if (n < 0) {
    throw illegalFunctionCall();
  }
  return n;
}

function left([s, n]: Value[]): Value {
  return values.string(str(s).slice(0, count(n)));
}

function right([s, n]: Value[]): Value {
  const text = str(s);
  const length = count(n);
  return values.string(length >= text.length ? text : text.slice(text.length - length));
}

function mid([s, start, length]: Value[]): Value {
  const text = str(s);
  const from = Math.max(0, values.toInteger(start) - 1);
  if (from >= text.length) {
    return values.string('');
  }
  const n = length === undefined ? text.length : count(length);
  return values.string(text.slice(from, from + n));
}

// Reads a leading number, ignoring anything after it.
export function parseNumberPrefix(text: string): number {
  const match = text.trim().match(/^[+-]?(\d+\.?\d*|\.\d+)([eEdD][+-]?\d+)?/);
  if (!match) {
    return 0;
  }
  return parseFloat(match[0].replace(/[dD]/, 'e'));
}

function stringLength(value: Value): number {
  const n = count(value);
  if (n > 255) {
    throw RuntimeError.fromError(STRING_TOO_LONG);
  }
  return n;
}

function stringOf([n, fill]: Value[]): Value {
  const length = stringLength(n);
  let ch: string;
  if (values.isString(fill)) {
    ch = fill.string.charAt(0) || ' ';
  } else {
    const code = values.toInteger(fill);
    if (code < 0 || code > 255) {
      throw illegalFunctionCall();
    }
    ch = String.fromCharCode(code);
  }
  return values.string(ch.repeat(length));
}

function instr(args: Value[]): Value {
  let start = 0;
  let haystack: Value;
  let needle: Value | undefined;
  if (args.length === 3) {
    start = values.toInteger(args[0]) - 1;
    [, haystack, needle] = args;
  } else {
    [haystack, needle] = args;
  }
  if (!values.isString(haystack) || !needle || !values.isString(needle)) {
    throw RuntimeError.fromError(TYPE_MISMATCH);
  }
  start = Math.max(0, start);
  if (start >= haystack.string.length) {
    return values.double(0);
  }
  if (needle.string === '') {
    return values.double(start + 1);
  }
  return values.double(haystack.string.indexOf(needle.string, start) + 1);
}

// Outside PRINT, TAB gives the spaces needed to reach the column.
function tab([n]: Value[], context: ExecutionContext): Value {
  const column = values.toInteger(n);
  const current = context.console.getColumn();
  return values.string(column > current ? ' '.repeat(column - current) : '');
}

function openFile(n: Value, context: ExecutionContext) {
  return context.runtime.files.get(values.toInteger(n));
}

function inputChars([n, fileNumber]: Value[], context: ExecutionContext): Value {
  const length = count(n);
  if (fileNumber !== undefined) {
    return values.string(tryIo(() => openFile(fileNumber, context).handle.accessor.readChars(length)));
  }
  let text = '';
  while (text.length < length) {
    const line = context.console.readLine('');
    if (line === undefined) {
      break;
    }
    text += line;
  }
  return values.string(text.slice(0, length));
}

function secondsSinceMidnight(now: Date): number {
  return now.getHours() * 3600 + now.getMinutes() * 60 + now.getSeconds();
}

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, '0');
}

function formatDate(now: Date): string {
  return `${pad(now.getMonth() + 1)}-${pad(now.getDate())}-${pad(now.getFullYear(), 4)}`;
}

function formatTime(now: Date): string {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

function errorString([code]: Value[], context: ExecutionContext): Value {
  const n = code === undefined ? values.toInteger(context.runtime.getVariable(ERR_VARIABLE)) : values.toInteger(code);
  return values.string(errorMessage(n));
}
