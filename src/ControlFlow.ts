export enum HaltReason {
  RUNNING,
  END,
  STOP,
  BREAKPOINT,
  ERROR,
  INPUT_WAIT,
  BREAK,
}

// The address of a statement: a line number and the statement's index on
// that line.
export interface PC {
  line: number;
  stmt: number;
  reason: HaltReason;
}

export function running(line: number, stmt: number): PC {
  return {line, stmt, reason: HaltReason.RUNNING};
}

export function halted(reason: HaltReason): PC {
  return {line: 0, stmt: 0, reason};
}

export function isRunning(pc: PC): boolean {
  return pc.reason === HaltReason.RUNNING;
}

export enum ControlFlowTag {
  GOSUB,
  WHILE,
}

export interface Gosub {
  tag: ControlFlowTag.GOSUB;
  returnPc: PC;
  // Pushed by ON ERROR GOSUB; returning from it ends error handling.
  fromError?: boolean;
}

export interface While {
  tag: ControlFlowTag.WHILE;
  whilePc: PC;
}

export type ControlFlowFrame =
  | Gosub
  | While;

// FOR loops are keyed by variable name rather than stacked.
export interface ForState {
  // The statement after the FOR, where each iteration starts.
  resumePc: PC;
  end: number;
  step: number;
}
