import type { Console } from "./Console.ts";
import { CANT_CONTINUE, DIRECT_STATEMENT_IN_FILE, IOError, ParseError, RuntimeError, SYNTAX_ERROR, UNDEFINED_LINE_NUMBER } from "./Errors.ts";
import type { ErrorValue } from "./Errors.ts";
import type { Disk } from "./Disk.ts";
import { Interpreter } from "./Interpreter.ts";
import type { Outcome } from "./Interpreter.ts";
import { MAX_LINE_NUMBER } from "./Lexer.ts";
import { parseDirectStatements, parseProgram } from "./Parser.ts";
import type { ChainRequest, CommonValues, ErrorInfo, RunRequest } from "./Runtime.ts";
import type { Program } from "./Syntax.ts";
import { isRunning } from "./ControlFlow.ts";

export interface ShellOptions {
  console: Console;
  disk: Disk;
  seed?: number;
  now?: () => Date;
  environment?: Map<string, string>;
  // Where "?message" diagnostics go.  Defaults to the console.
  report?: (message: string) => void;
}

// Thrown while loading program text; reported but never trapped.
class LoadError extends Error {
  constructor(readonly error: ErrorValue, readonly line?: number) {
    super(error.errorMessage);
    this.name = "LoadError";
  }
}

// Loads and runs programs, services CHAIN, RUN and MERGE requests and reads
// commands in interactive mode.
export class Shell {
  readonly interpreter: Interpreter;
  private console: Console;
  private disk: Disk;
  private report: (message: string) => void;
  // Program text by line number, as typed or loaded.
  private lines: Map<number, string> = new Map();
  // The interpreter's program is out of date with the text.
  private edited = true;

  constructor(options: ShellOptions) {
    this.console = options.console;
    this.disk = options.disk;
    this.report = options.report ?? ((message: string) => this.console.print(message, true));
    this.interpreter = new Interpreter({
      console: options.console,
      disk: options.disk,
      seed: options.seed,
      now: options.now,
      environment: options.environment,
    });
  }

  // Loads a program file and runs it.  Returns the final outcome, or
  // undefined when the file could not be loaded.
  runFile(fileName: string): Outcome | undefined {
    if (!this.tryLoad(fileName)) {
      return undefined;
    }
    return this.runProgram();
  }

  // Runs the program in memory from its first line, or from startLine.
  // Open files are closed unless keepFiles is set, as for RUN "file",R.
  runProgram(startLine?: number, options: {keepFiles?: boolean} = {}): Outcome | undefined {
    if (!this.tryCompile(options)) {
      return undefined;
    }
    return this.finish(this.start(startLine));
  }

  // Reads commands until SYSTEM or the end of input.
  repl() {
    this.console.print('Ok', true);
    for (;;) {
      const line = this.console.readLine('');
      if (line === undefined) {
        return;
      }
      if (!this.command(line)) {
        return;
      }
    }
  }

  // Carries out one line typed in interactive mode.  Returns false for SYSTEM.
  command(text: string): boolean {
    const line = text.trim();
    if (line === '') {
      return true;
    }
    const numbered = line.match(/^(\d+)\s*(.*)$/);
    if (numbered) {
      this.enterLine(+numbered[1], line, numbered[2]);
      return true;
    }
    const [word, rest] = splitCommand(line);
    switch (word) {
      case 'SYSTEM':
        return false;
      case 'NEW':
        this.lines.clear();
        this.edited = true;
        this.interpreter.runtime.clear();
        break;
      case 'RUN':
        if (/^\d+$/.test(rest)) {
          this.runProgram(+rest);
        } else if (rest) {
          this.runCommand(rest);
        } else {
          this.runProgram();
        }
        break;
      case 'LIST':
        this.list(parseRange(rest));
        break;
      case 'DELETE':
        this.deleteLines(parseRange(rest));
        break;
      case 'LOAD':
        this.tryLoad(unquote(rest));
        break;
      case 'SAVE':
        this.save(unquote(rest));
        break;
      case 'MERGE':
        this.mergeFile(unquote(rest));
        break;
      case 'CONT':
        this.cont();
        break;
      default:
        this.direct(line);
        break;
    }
    this.console.print('Ok', true);
    return true;
  }

  // SYSTEM closes open files before the host exits.
  shutdown() {
    try {
      this.interpreter.runtime.files.closeAll();
    } catch (e: unknown) {
      this.reportThrown(e);
    }
  }

  list(range: [number, number] = [0, MAX_LINE_NUMBER]) {
    const [from, to] = range;
    for (const number of this.sortedLineNumbers()) {
      if (number >= from && number <= to) {
        this.console.print(this.lines.get(number) ?? '', true);
      }
    }
  }

  programText(): string {
    return this.sortedLineNumbers().map((number) => this.lines.get(number) ?? '').join('\n') + '\n';
  }

  private enterLine(number: number, text: string, body: string) {
    if (number > MAX_LINE_NUMBER) {
      this.reportError(errorInfo(SYNTAX_ERROR));
      return;
    }
    if (body === '') {
      this.lines.delete(number);
    } else {
      this.lines.set(number, text);
    }
    this.edited = true;
  }

  private deleteLines([from, to]: [number, number]) {
    for (const number of [...this.lines.keys()]) {
      if (number >= from && number <= to) {
        this.lines.delete(number);
      }
    }
    this.edited = true;
  }

  // RUN "file"[,R] typed as a command.
  private runCommand(rest: string) {
    const match = rest.match(/^(.*?)\s*,\s*R\s*$/i);
    const fileName = unquote(match ? match[1] : rest);
    const keepFiles = !!match;
    if (this.tryLoad(fileName, {keepFiles})) {
      this.runProgram(undefined, {keepFiles});
    }
  }

  private cont() {
    if (this.edited) {
      this.reportError(errorInfo(CANT_CONTINUE));
      return;
    }
    this.finish(this.interpreter.continue());
  }

  // Statements typed without a line number.
  private direct(text: string) {
    if (this.edited && !this.tryCompile({keepFiles: true})) {
      return;
    }
    try {
      const statements = parseDirectStatements(text, this.interpreter.runtime.defTypes);
      this.finish(this.interpreter.executeDirect(statements));
    } catch (e: unknown) {
      if (e instanceof ParseError) {
        this.report(`?${e.message}`);
        return;
      }
      throw e;
    }
  }

  private save(fileName: string) {
    try {
      this.disk.writeText(programFileName(fileName), this.programText());
    } catch (e: unknown) {
      this.reportThrown(e);
    }
  }

  private mergeFile(fileName: string) {
    try {
      for (const [number, text] of this.readLines(fileName)) {
        this.lines.set(number, text);
      }
      this.edited = true;
    } catch (e: unknown) {
      this.reportThrown(e);
    }
  }

  // Replaces the program text with a file's.  Returns false after reporting
  // a failure.
  private tryLoad(fileName: string, options: {keepFiles?: boolean} = {}): boolean {
    try {
      this.lines = this.readLines(fileName);
      this.edited = true;
      if (!options.keepFiles) {
        this.interpreter.runtime.files.closeAll();
      }
      return true;
    } catch (e: unknown) {
      this.reportThrown(e);
      return false;
    }
  }

  // Every non-blank line of a program file starts with its line number.
  private readLines(fileName: string): Map<number, string> {
    const text = this.disk.readText(programFileName(fileName));
    const lines: Map<number, string> = new Map();
    for (const source of text.split(/\r?\n/)) {
      const line = source.trim();
      if (line === '') {
        continue;
      }
      const match = line.match(/^\d+/);
      if (!match) {
        throw new LoadError(DIRECT_STATEMENT_IN_FILE);
      }
      lines.set(+match[0], line);
    }
    return lines;
  }

  // Parses the program text into the interpreter, which clears variables.
  private tryCompile(options: {keepFiles?: boolean}): boolean {
    try {
      this.interpreter.load(this.parse(), options);
      this.edited = false;
      return true;
    } catch (e: unknown) {
      this.reportThrown(e);
      return false;
    }
  }

  private parse(): Program {
    const numbers = this.sortedLineNumbers();
    try {
      return parseProgram(this.programText());
    } catch (e: unknown) {
      if (e instanceof ParseError) {
        throw new LoadError(SYNTAX_ERROR, numbers[e.line - 1]);
      }
      throw e;
    }
  }

  // Follows CHAIN and RUN requests until the program stops for good.
  private finish(outcome: Outcome): Outcome {
    let current = outcome;
    for (;;) {
      switch (current.kind) {
        case 'end':
          return current;
        case 'stop':
        case 'break':
        case 'breakpoint':
          this.report(`Break in ${current.pc.line}`);
          return current;
        case 'error':
          this.reportError(current.error);
          return current;
        case 'chain': {
          const next = this.chain(current.request);
          if (!next) {
            return current;
          }
          current = next;
          break;
        }
        case 'run': {
          const next = this.runRequest(current.request);
          if (!next) {
            return current;
          }
          current = next;
          break;
        }
      }
    }
  }

  private runRequest(request: RunRequest): Outcome | undefined {
    const options = {keepFiles: request.keepFiles};
    if (!this.tryLoad(request.fileName, options) || !this.tryCompile(options)) {
      return undefined;
    }
    return this.start(request.line);
  }

  // CHAIN keeps open files.  CHAIN MERGE overlays the file on the current
  // program after deleting the requested range.
  private chain(request: ChainRequest): Outcome | undefined {
    try {
      const incoming = this.readLines(request.fileName);
      if (request.merge) {
        if (request.deleteRange) {
          this.deleteLines(request.deleteRange);
        }
        for (const [number, text] of incoming) {
          this.lines.set(number, text);
        }
      } else {
        this.lines = incoming;
      }
      this.edited = true;
    } catch (e: unknown) {
      this.reportThrown(e);
      return undefined;
    }
    if (!this.tryCompile({keepFiles: true})) {
      return undefined;
    }
    restoreCommon(this.interpreter, request.common);
    return this.start(request.line);
  }

  private start(line?: number): Outcome {
    const runtime = this.interpreter.runtime;
    if (line !== undefined) {
      const target = runtime.table.findLine(line);
      if (!isRunning(target)) {
        return {kind: 'error', error: errorInfo(UNDEFINED_LINE_NUMBER)};
      }
      runtime.pc = target;
    }
    return this.interpreter.run();
  }

  private reportError(error: ErrorInfo) {
    this.report(error.pc ? `?${error.message} in ${error.pc.line}` : `?${error.message}`);
  }

  private reportThrown(e: unknown) {
    if (e instanceof LoadError) {
      this.report(e.line !== undefined ? `?${e.message} in ${e.line}` : `?${e.message}`);
    } else if (e instanceof IOError || e instanceof RuntimeError) {
      this.report(`?${e.error.errorMessage}`);
    } else {
      throw e;
    }
  }

  private sortedLineNumbers(): number[] {
    return [...this.lines.keys()].sort((a, b) => a - b);
  }
}

function restoreCommon(interpreter: Interpreter, common: CommonValues) {
  const variables = interpreter.runtime.variables;
  for (const [name, value] of common.scalars) {
    variables.scalars.set(name, value);
  }
  for (const [name, array] of common.arrays) {
    variables.arrays.set(name, array);
  }
}

function errorInfo(error: ErrorValue): ErrorInfo {
  return {code: error.errorCode, message: error.errorMessage};
}

// Program files without an extension are taken to be .bas files.
export function programFileName(name: string): string {
  return name.includes('.') ? name : `${name}.bas`;
}

function splitCommand(line: string): [string, string] {
  const match = line.match(/^([A-Za-z]+)\s*(.*)$/);
  return match ? [match[1].toUpperCase(), match[2].trim()] : ['', line];
}

function unquote(text: string): string {
  return text.trim().replace(/^"/, '').replace(/"$/, '');
}

// "n", "n-m", "n-" and "-m".
export function parseRange(text: string): [number, number] {
  const match = text.trim().match(/^(\d*)\s*(-?)\s*(\d*)$/);
  if (!match || text.trim() === '') {
    return [0, MAX_LINE_NUMBER];
  }
  const from = match[1] ? +match[1] : 0;
  if (!match[2]) {
    return [from, from];
  }
  return [from, match[3] ? +match[3] : MAX_LINE_NUMBER];
}
