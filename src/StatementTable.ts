import { HaltReason, PC, halted, running } from "./ControlFlow.ts";
import { Line, Program, Statement } from "./Syntax.ts";

// Program lines indexed by number, addressed one statement at a time.
export class StatementTable {
  private statements: Map<number, Statement[]> = new Map();
  private sources: Map<number, string> = new Map();
  private lineNumbers: number[] = [];

  static build(program: Program): StatementTable {
    const table = new StatementTable();
    for (const line of program.lines) {
      table.statements.set(line.number, line.statements);
      table.sources.set(line.number, line.text);
    }
    table.sortLines();
    return table;
  }

  // Lines in the merged program replace existing lines with the same number.
  merge(program: Program) {
    for (const line of program.lines) {
      this.statements.set(line.number, line.statements);
      this.sources.set(line.number, line.text);
    }
    this.sortLines();
  }

  deleteRange(from: number, to: number) {
    for (const line of this.lineNumbers) {
      if (line >= from && line <= to) {
        this.statements.delete(line);
        this.sources.delete(line);
      }
    }
    this.sortLines();
  }

  first(): PC {
    return this.firstFrom(0);
  }

  next(pc: PC): PC {
    const statements = this.statements.get(pc.line);
    if (statements && pc.stmt + 1 < statements.length) {
      return running(pc.line, pc.stmt + 1);
    }
    const index = upperBound(this.lineNumbers, pc.line);
    return this.firstFrom(index);
  }

  findLine(line: number): PC {
    const statements = this.statements.get(line);
    if (!statements) {
      return halted(HaltReason.ERROR);
    }
    if (statements.length === 0) {
      return this.next({line, stmt: -1, reason: HaltReason.RUNNING});
    }
    return running(line, 0);
  }

  valid(pc: PC): boolean {
    const statements = this.statements.get(pc.line);
    return !!statements && pc.stmt >= 0 && pc.stmt < statements.length;
  }

  get(pc: PC): Statement | undefined {
    return this.statements.get(pc.line)?.[pc.stmt];
  }

  lines(): number[] {
    return this.lineNumbers;
  }

  text(line: number): string | undefined {
    return this.sources.get(line);
  }

  toLines(): Line[] {
    return this.lineNumbers.map((number) => ({
      number,
      statements: this.statements.get(number) ?? [],
      text: this.sources.get(number) ?? '',
    }));
  }

  get size(): number {
    return this.lineNumbers.length;
  }

  private firstFrom(index: number): PC {
    // Lines without statements are skipped.
    for (let i = index; i < this.lineNumbers.length; i++) {
      const line = this.lineNumbers[i];
      if ((this.statements.get(line)?.length ?? 0) > 0) {
        return running(line, 0);
      }
    }
    return halted(HaltReason.END);
  }

  private sortLines() {
    this.lineNumbers = [...this.statements.keys()].sort((a, b) => a - b);
  }
}

// Index of the first element greater than target.
function upperBound(sorted: number[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid] <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
