import { OUT_OF_DATA, RuntimeError } from "./Errors.ts";
import { Line } from "./Syntax.ts";
import { Value } from "./Values.ts";

// DATA values from the whole program, read in line order.
export class ProgramData {
  dataIndex: number = 0;
  data: Value[] = [];
  // Index of the first value on each line with DATA.
  lineStarts: Map<number, number> = new Map();

  load(lines: Line[]) {
    this.data = [];
    this.lineStarts = new Map();
    this.dataIndex = 0;
    for (const line of lines) {
      for (const statement of line.statements) {
        if (statement.kind === 'data') {
          if (!this.lineStarts.has(line.number)) {
            this.lineStarts.set(line.number, this.data.length);
          }
          this.data.push(...statement.values);
        }
      }
    }
  }

  // Without a line, restores to the first value.  Otherwise to the first DATA
  // at or after the line, or past the end when there is none.
  restore(line?: number) {
    if (line === undefined) {
      this.dataIndex = 0;
      return;
    }
    let index = this.data.length;
    let bestLine = Infinity;
    for (const [dataLine, start] of this.lineStarts) {
      if (dataLine >= line && dataLine < bestLine) {
        bestLine = dataLine;
        index = start;
      }
    }
    this.dataIndex = index;
  }

  read(): Value {
    if (this.dataIndex < this.data.length) {
      return this.data[this.dataIndex++];
    }
    throw RuntimeError.fromError(OUT_OF_DATA);
  }

  clear() {
    this.data = [];
    this.lineStarts = new Map();
    this.dataIndex = 0;
  }
}
