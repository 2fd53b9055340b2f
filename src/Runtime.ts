import { ControlFlowFrame, ForState, HaltReason, PC, halted, isRunning } from "./ControlFlow.ts";
import { ErrorValue, RuntimeError, UNDEFINED_LINE_NUMBER } from "./Errors.ts";
import { Files } from "./Files.ts";
import { ProgramData } from "./ProgramData.ts";
import { StatementTable } from "./StatementTable.ts";
import { Expr, Program, Statement } from "./Syntax.ts";
import { DefTypeMap } from "./Types.ts";
import { integer, Value } from "./Values.ts";
import { ArrayVariable, Variables } from "./Variables.ts";

export const ERR_VARIABLE = 'err%';

export interface UserFunction {
  params: string[];
  body: Expr;
}

export interface ErrorHandler {
  line: number;
  gosub: boolean;
}

// Errors raised by direct statements have no program location.
export interface ErrorInfo {
  code: number;
  message: string;
  pc?: PC;
}

// Variables handed to a chained program.
export interface CommonValues {
  scalars: Map<string, Value>;
  arrays: Map<string, ArrayVariable>;
}

export interface ChainRequest {
  fileName: string;
  line?: number;
  all: boolean;
  merge: boolean;
  deleteRange?: [number, number];
  common: CommonValues;
}

export interface RunRequest {
  fileName: string;
  line?: number;
  keepFiles: boolean;
}

// All mutable state of a running program.
export class Runtime {
  table: StatementTable = new StatementTable();
  defTypes: DefTypeMap = new Map();
  variables: Variables = new Variables();
  data: ProgramData = new ProgramData();
  files: Files = new Files();
  functions: Map<string, UserFunction> = new Map();

  pc: PC = halted(HaltReason.END);
  // Set by statements that transfer control.
  nextPc?: PC;

  controlStack: ControlFlowFrame[] = [];
  // Insertion order is activation order.
  forLoops: Map<string, ForState> = new Map();
  optionBase = 0;
  trace = false;

  breakRequested = false;
  pauseRequested = false;
  breakpoints: Set<number> = new Set();
  skipBreakpoint = false;

  errorHandler?: ErrorHandler;
  // Where the trapped error happened, for RESUME.
  errorPc?: PC;
  errorPending = false;
  lastError?: ErrorInfo;
  // The line ERL reports.  Kept apart from err% since line numbers pass 32767.
  errorLine = 0;

  directMode = false;
  commonNames: string[] = [];
  chainRequest?: ChainRequest;
  runRequest?: RunRequest;

  load(program: Program, options: {keepFiles?: boolean} = {}) {
    this.defTypes = new Map(program.defTypes);
    this.table = StatementTable.build(program);
    this.collectProgramDefinitions();
    this.reset(options);
  }

  // Adds lines to the loaded program and recollects DATA and functions.
  merge(program: Program) {
    for (const [letter, type] of program.defTypes) {
      this.defTypes.set(letter, type);
    }
    this.table.merge(program);
    const dataIndex = this.data.dataIndex;
    this.collectProgramDefinitions();
    // The DATA cursor stays where it was.
    this.data.dataIndex = dataIndex;
  }

  reset(options: {keepFiles?: boolean} = {}) {
    const err = this.variables.get(ERR_VARIABLE);
    this.variables.clear();
    this.variables.set(ERR_VARIABLE, err);
    this.controlStack = [];
    this.forLoops = new Map();
    this.data.dataIndex = 0;
    this.optionBase = 0;
    this.trace = false;
    this.breakRequested = false;
    this.pauseRequested = false;
    this.skipBreakpoint = false;
    this.errorHandler = undefined;
    this.errorPc = undefined;
    this.errorPending = false;
    this.lastError = undefined;
    this.commonNames = [];
    this.chainRequest = undefined;
    this.runRequest = undefined;
    this.nextPc = undefined;
    if (!options.keepFiles) {
      this.files.closeAll();
    }
    this.pc = this.table.first();
  }

  clear() {
    this.reset();
    this.data.clear();
    this.functions = new Map();
    this.breakpoints = new Set();
  }

  getVariable(name: string): Value {
    return this.variables.get(name);
  }

  setVariable(name: string, value: Value) {
    this.variables.set(name, value);
  }

  hasVariable(name: string): boolean {
    return this.variables.has(name);
  }

  getArray(name: string, indices: number[]): Value {
    return this.variables.getElement(name, indices, this.optionBase);
  }

  setArray(name: string, indices: number[], value: Value) {
    this.variables.setElement(name, indices, this.optionBase, value);
  }

  dimArray(name: string, bounds: number[]) {
    this.variables.dim(name, bounds, this.optionBase);
  }

  eraseArray(name: string) {
    this.variables.erase(name);
  }

  hasArray(name: string): boolean {
    return this.variables.hasArray(name);
  }

  readData(): Value {
    return this.data.read();
  }

  restoreData(line?: number) {
    this.data.restore(line);
  }

  isRunning(): boolean {
    return isRunning(this.pc);
  }

  halt(reason: HaltReason) {
    this.pc = halted(reason);
    this.nextPc = undefined;
  }

  jump(pc: PC) {
    this.nextPc = pc;
  }

  jumpToLine(line: number) {
    this.nextPc = this.findLineOrThrow(line);
  }

  findLineOrThrow(line: number): PC {
    const pc = this.table.findLine(line);
    if (!isRunning(pc)) {
      throw RuntimeError.fromError(UNDEFINED_LINE_NUMBER);
    }
    return pc;
  }

  endErrorHandling() {
    this.errorPending = false;
    this.errorPc = undefined;
    this.setVariable(ERR_VARIABLE, integer(0));
  }

  recordError(error: ErrorValue, pc?: PC) {
    this.lastError = {code: error.errorCode, message: error.errorMessage, pc};
  }

  private collectProgramDefinitions() {
    const lines = this.table.toLines();
    this.data.load(lines);
    this.functions = new Map();
    const collect = (statements: Statement[]) => {
      for (const statement of statements) {
        if (statement.kind === 'defFn') {
          this.functions.set(statement.name, {params: statement.params, body: statement.body});
        } else if (statement.kind === 'if') {
          collect(statement.thenStatements ?? []);
          collect(statement.elseStatements ?? []);
        }
      }
    };
    for (const line of lines) {
      collect(line.statements);
    }
  }
}
