export const LF = '\n';
export const CR = '\r';

export interface Printer {
  print(text: string, newline: boolean): void;
  space(numSpaces: number): void;
  tab(targetColumn?: number): void;
  setWidth(columns: number): void;
  getColumn(): number;
}

export const ZONE_WIDTH = 14;
export const DEFAULT_WIDTH = 80;
// WIDTH 255 means lines never wrap.
export const UNLIMITED_WIDTH = 255;

// The column of the next character after `column` that starts a print zone.
export function nextZone(column: number): number {
  return column + ZONE_WIDTH - (column - 1) % ZONE_WIDTH;
}

// An output device that counts its own column from 1.  Subclasses only
// emit characters; wrapping at the width happens here.
export abstract class DevicePrinter implements Printer {
  protected column = 1;

  constructor(protected width: number = DEFAULT_WIDTH) {
  }

  protected abstract emit(text: string): void;

  setWidth(columns: number) {
    this.width = columns;
  }

  getColumn(): number {
    return this.column;
  }

  // An item that does not fit in what is left of the line starts a new one.
  print(text: string, newline: boolean) {
    if (this.wraps() && this.column > 1 && this.column + text.length - 1 > this.width) {
      this.endLine();
    }
    this.write(text);
    if (newline) {
      this.endLine();
    }
  }

  space(numSpaces: number) {
    const count = this.wraps() ? numSpaces % this.width : numSpaces;
    this.write(' '.repeat(Math.max(0, count)));
  }

  // Without a target, a comma: the next zone, or a new line when no whole
  // zone is left.  TAB to a column already passed moves to the next line.
  tab(targetColumn?: number) {
    if (targetColumn === undefined) {
      const zone = nextZone(this.column);
      if (this.wraps() && zone + ZONE_WIDTH - 1 > this.width) {
        this.endLine();
      } else {
        this.write(' '.repeat(zone - this.column));
      }
      return;
    }
    let target = Math.max(1, targetColumn);
    if (this.wraps() && target > this.width) {
      target = (target - 1) % this.width + 1;
    }
    if (target < this.column) {
      this.endLine();
    }
    this.write(' '.repeat(target - this.column));
  }

  // Writes text as it is, keeping the column in step.
  protected write(text: string) {
    for (const ch of text) {
      if (ch === LF) {
        this.endLine();
        continue;
      }
      if (this.wraps() && this.column > this.width) {
        this.endLine();
      }
      this.emit(ch);
      this.column = ch === CR ? 1 : this.column + 1;
    }
  }

  protected endLine() {
    this.emit(LF);
    this.column = 1;
  }

  private wraps(): boolean {
    return this.width < UNLIMITED_WIDTH;
  }
}
