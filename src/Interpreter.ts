import type { Console } from "./Console.ts";
import { ControlFlowTag, HaltReason, isRunning, PC, running } from "./ControlFlow.ts";
import { CANT_CONTINUE, INTERNAL_ERROR, RuntimeError, UNDEFINED_LINE_NUMBER } from "./Errors.ts";
import { Disk, MemoryDrive } from "./Disk.ts";
import { MAX_LINE_NUMBER } from "./Lexer.ts";
import { RandomNumbers } from "./RandomNumbers.ts";
import { ChainRequest, ERR_VARIABLE, ErrorInfo, RunRequest, Runtime } from "./Runtime.ts";
import type { Program, Statement } from "./Syntax.ts";
import { integer } from "./Values.ts";
import type { ExecutionContext } from "./statements/ExecutionContext.ts";
import { execute } from "./statements/Statement.ts";

export interface InterpreterOptions {
  console: Console;
  disk?: Disk;
  // Seeds RND so runs can be repeated.
  seed?: number;
  now?: () => Date;
  environment?: Map<string, string>;
}

export type Outcome =
  | {kind: 'end'}
  | {kind: 'stop', pc: PC}
  | {kind: 'error', error: ErrorInfo}
  | {kind: 'chain', request: ChainRequest}
  | {kind: 'run', request: RunRequest}
  | {kind: 'breakpoint', pc: PC}
  | {kind: 'break', pc: PC};

// Direct statements run as a line past the end of the program.
const DIRECT_LINE = MAX_LINE_NUMBER + 1;

export class Interpreter {
  readonly runtime: Runtime = new Runtime();
  readonly context: ExecutionContext;
  // Where CONT picks up after STOP, a breakpoint or a break.
  private resumePc?: PC;
  private stoppedAt?: PC;

  constructor(options: InterpreterOptions) {
    this.context = {
      runtime: this.runtime,
      console: options.console,
      disk: options.disk ?? new MemoryDrive(),
      random: new RandomNumbers(options.seed),
      now: options.now ?? (() => new Date()),
      environment: options.environment ?? new Map(),
    };
  }

  load(program: Program, options: {keepFiles?: boolean} = {}) {
    this.runtime.load(program, options);
    this.resumePc = undefined;
  }

  requestBreak() {
    this.runtime.breakRequested = true;
  }

  // Executes one statement.  Returns false once the program has halted.
  tick(): boolean {
    const runtime = this.runtime;
    const pc = runtime.pc;
    if (!isRunning(pc)) {
      return false;
    }
    if (runtime.pauseRequested) {
      runtime.pauseRequested = false;
      this.suspend(pc, HaltReason.STOP);
      return false;
    }
    if (runtime.breakRequested) {
      runtime.breakRequested = false;
      this.suspend(pc, HaltReason.BREAK);
      return false;
    }
    // A breakpoint fires on entry to its line.  Resuming skips it once.
    if (pc.stmt === 0 && runtime.breakpoints.has(pc.line) && !runtime.skipBreakpoint) {
      runtime.skipBreakpoint = true;
      this.suspend(pc, HaltReason.BREAKPOINT);
      return false;
    }
    runtime.skipBreakpoint = false;
    const statement = runtime.table.get(pc);
    if (!statement) {
      runtime.halt(HaltReason.END);
      return false;
    }
    runtime.directMode = pc.line === DIRECT_LINE;
    if (runtime.trace && pc.stmt === 0 && !runtime.directMode) {
      this.context.console.print(`[${pc.line}]`, false);
    }
    runtime.nextPc = undefined;
    try {
      execute(statement, this.context);
    } catch (e: unknown) {
      this.handleError(e, pc);
    }
    if (runtime.isRunning()) {
      const following = runtime.nextPc ?? runtime.table.next(pc);
      // Programs never fall through into the direct line.
      const intoDirectLine = following.line === DIRECT_LINE && !runtime.nextPc;
      if (pc.line !== DIRECT_LINE && (intoDirectLine || !isRunning(following))) {
        this.endProgram(pc);
      } else {
        runtime.pc = following;
      }
    } else if (runtime.pc.reason === HaltReason.STOP) {
      this.stoppedAt = pc;
      this.resumePc = runtime.table.next(pc);
    } else {
      this.resumePc = undefined;
    }
    runtime.nextPc = undefined;
    return runtime.isRunning();
  }

  run(): Outcome {
    while (this.tick()) {
    }
    return this.outcome();
  }

  // CONT: resumes after STOP, a breakpoint or a break.
  continue(): Outcome {
    const pc = this.resumePc;
    if (!pc || this.runtime.isRunning()) {
      return {kind: 'error', error: {code: CANT_CONTINUE.errorCode, message: CANT_CONTINUE.errorMessage}};
    }
    this.resumePc = undefined;
    this.runtime.pc = pc;
    return this.run();
  }

  // Runs statements typed without a line number.  A GOTO or RUN among them
  // carries on into the program.
  executeDirect(statements: Statement[]): Outcome {
    const runtime = this.runtime;
    const table = runtime.table;
    table.merge({lines: [{number: DIRECT_LINE, statements, text: ''}], defTypes: new Map()});
    runtime.pc = running(DIRECT_LINE, 0);
    try {
      return this.run();
    } finally {
      table.deleteRange(DIRECT_LINE, DIRECT_LINE);
      runtime.directMode = false;
    }
  }

  // Running past the last line ends the program the way END does.
  private endProgram(pc: PC) {
    const runtime = this.runtime;
    try {
      runtime.files.closeAll();
      runtime.halt(HaltReason.END);
    } catch (e: unknown) {
      const error = e instanceof RuntimeError ? e : RuntimeError.internalError(e);
      runtime.recordError(error.error, pc);
      runtime.halt(HaltReason.ERROR);
    }
  }

  private suspend(pc: PC, reason: HaltReason) {
    this.runtime.halt(reason);
    this.stoppedAt = pc;
    this.resumePc = pc;
  }

  // Traps the error with the ON ERROR handler if there is one.  Errors raised
  // while a handler is running are not trapped again.
  private handleError(e: unknown, pc: PC) {
    const runtime = this.runtime;
    const error = e instanceof RuntimeError ? e : RuntimeError.internalError(e);
    const handler = runtime.errorHandler;
    if (handler && !runtime.errorPending && pc.line !== DIRECT_LINE) {
      const target = runtime.table.findLine(handler.line);
      if (isRunning(target)) {
        runtime.setVariable(ERR_VARIABLE, integer(error.code));
        runtime.errorLine = pc.line;
        runtime.errorPc = pc;
        runtime.errorPending = true;
        if (handler.gosub) {
          runtime.controlStack.push({tag: ControlFlowTag.GOSUB, returnPc: runtime.table.next(pc), fromError: true});
        }
        runtime.pc = pc;
        runtime.jump(target);
        return;
      }
      runtime.recordError(UNDEFINED_LINE_NUMBER, pc);
      runtime.halt(HaltReason.ERROR);
      return;
    }
    runtime.recordError(error.error, pc.line === DIRECT_LINE ? undefined : pc);
    runtime.halt(HaltReason.ERROR);
  }

  private outcome(): Outcome {
    const runtime = this.runtime;
    const stoppedAt = this.stoppedAt ?? runtime.pc;
    switch (runtime.pc.reason) {
      case HaltReason.STOP:
        return {kind: 'stop', pc: stoppedAt};
      case HaltReason.BREAKPOINT:
        return {kind: 'breakpoint', pc: stoppedAt};
      case HaltReason.BREAK:
        return {kind: 'break', pc: stoppedAt};
      case HaltReason.ERROR:
        return {kind: 'error', error: runtime.lastError ?? {code: INTERNAL_ERROR.errorCode, message: INTERNAL_ERROR.errorMessage}};
    }
    if (runtime.chainRequest) {
      const request = runtime.chainRequest;
      runtime.chainRequest = undefined;
      return {kind: 'chain', request};
    }
    if (runtime.runRequest) {
      const request = runtime.runRequest;
      runtime.runRequest = undefined;
      return {kind: 'run', request};
    }
    return {kind: 'end'};
  }
}
