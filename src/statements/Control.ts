import { HaltReason } from "../ControlFlow.ts";
import { ILLEGAL_DIRECT, ILLEGAL_FUNCTION_CALL, NO_RESUME, ParseError, RuntimeError, SYNTAX_ERROR } from "../Errors.ts";
import { evaluate, evaluateInteger, evaluateNumber, evaluateString } from "../Expressions.ts";
import { tryIo } from "../Files.ts";
import { parseProgram } from "../Parser.ts";
import type { CommonValues, Runtime } from "../Runtime.ts";
import type { Program, StatementOf } from "../Syntax.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";

// END closes all files.  Ending while an error is being handled is an error
// of its own.
export function end(_statement: StatementOf<'end'>, context: ExecutionContext) {
  const runtime = context.runtime;
  if (runtime.errorPending) {
    throw RuntimeError.fromError(NO_RESUME);
  }
  runtime.files.closeAll();
  runtime.halt(HaltReason.END);
}

export function stop(_statement: StatementOf<'stop'>, context: ExecutionContext) {
  context.runtime.halt(HaltReason.STOP);
}

// CHAIN stops this program and hands the host a request to load the next
// one, along with the variables it shares.
export function chain(statement: StatementOf<'chain'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const fileName = evaluateString(statement.fileName, context);
  const line = statement.line ? evaluateNumber(statement.line, context) : undefined;
  runtime.chainRequest = {
    fileName,
    line,
    all: statement.all,
    merge: statement.merge,
    deleteRange: statement.deleteRange,
    common: collectCommon(runtime, statement.all),
  };
  runtime.halt(HaltReason.END);
}

function collectCommon(runtime: Runtime, all: boolean): CommonValues {
  const {scalars, arrays} = runtime.variables;
  if (all) {
    return {scalars: new Map(scalars), arrays: new Map(arrays)};
  }
  const common: CommonValues = {scalars: new Map(), arrays: new Map()};
  for (const name of runtime.commonNames) {
    const scalar = scalars.get(name);
    if (scalar) {
      common.scalars.set(name, scalar);
    }
    const array = arrays.get(name);
    if (array) {
      common.arrays.set(name, array);
    }
  }
  return common;
}

export function common(statement: StatementOf<'common'>, context: ExecutionContext) {
  const names = context.runtime.commonNames;
  for (const name of statement.names) {
    if (!names.includes(name)) {
      names.push(name);
    }
  }
}

// RUN "file" is handled by the host.  RUN [line] restarts the loaded program.
export function run(statement: StatementOf<'run'>, context: ExecutionContext) {
  const runtime = context.runtime;
  if (statement.fileName) {
    runtime.runRequest = {
      fileName: evaluateString(statement.fileName, context),
      line: statement.line,
      keepFiles: statement.keepFiles,
    };
    runtime.halt(HaltReason.END);
    return;
  }
  const target = statement.line !== undefined ? runtime.findLineOrThrow(statement.line) : runtime.table.first();
  runtime.reset();
  runtime.jump(target);
}

export function merge(statement: StatementOf<'merge'>, context: ExecutionContext) {
  const fileName = evaluateString(statement.fileName, context);
  const text = tryIo(() => context.disk.readText(fileName));
  let program: Program;
  try {
    program = parseProgram(text);
  } catch (e: unknown) {
    if (e instanceof ParseError) {
      throw RuntimeError.fromError(SYNTAX_ERROR);
    }
    throw e;
  }
  context.runtime.merge(program);
}

// Clears variables but carries on with the next statement.
export function clear(_statement: StatementOf<'clear'>, context: ExecutionContext) {
  const runtime = context.runtime;
  const pc = runtime.pc;
  runtime.reset();
  runtime.pc = pc;
}

export function cls(_statement: StatementOf<'cls'>, context: ExecutionContext) {
  context.console.clear();
}

export function tron(_statement: StatementOf<'tron'>, context: ExecutionContext) {
  context.runtime.trace = true;
}

export function troff(_statement: StatementOf<'troff'>, context: ExecutionContext) {
  context.runtime.trace = false;
}

export function width(statement: StatementOf<'width'>, context: ExecutionContext) {
  const columns = evaluateInteger(statement.width, context);
  if (columns < 1 || columns > 255) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  context.console.setWidth(columns);
}

// Without a seed, the clock picks one.
export function randomize(statement: StatementOf<'randomize'>, context: ExecutionContext) {
  const seed = statement.seed ? evaluateNumber(statement.seed, context) : context.now().getTime();
  context.random.setSeed(seed);
}

// POKE, OUT, WAIT and CALL have no machine to act on.
export function noop(statement: StatementOf<'noop'>, context: ExecutionContext) {
  for (const arg of statement.args) {
    evaluate(arg, context);
  }
}

// Functions are collected when the program loads.
export function defFn(_statement: StatementOf<'defFn'>, context: ExecutionContext) {
  if (context.runtime.directMode) {
    throw RuntimeError.fromError(ILLEGAL_DIRECT);
  }
}
