import * as fs from "node:fs";
import { CLEAR_SCREEN, Console } from "./Console.ts";
import { DEFAULT_WIDTH, DevicePrinter, LF } from "./Printer.ts";

// A console on the process's standard streams.  Input is read synchronously
// so that INPUT can block inside a tick.
export class NodeConsole extends DevicePrinter implements Console {
  private buffer = "";
  private pending: number[] = [];
  private endOfInput = false;

  constructor(width = DEFAULT_WIDTH, private output: NodeJS.WritableStream = process.stdout, private inputFd = 0) {
    super(width);
  }

  protected override emit(text: string) {
    this.buffer += text;
    if (text === LF) {
      this.flush();
    }
  }

  flush() {
    if (this.buffer) {
      this.output.write(this.buffer);
      this.buffer = "";
    }
  }

  readLine(prompt: string): string | undefined {
    this.write(prompt);
    this.flush();
    const line = this.readRawLine();
    // The terminal echoed the line and its newline.
    this.column = 1;
    return line;
  }

  inkey(): string {
    this.flush();
    return "";
  }

  clear() {
    this.buffer += CLEAR_SCREEN;
    this.flush();
    this.column = 1;
  }

  private readRawLine(): string | undefined {
    const bytes: number[] = [];
    for (;;) {
      const byte = this.readByte();
      if (byte === undefined) {
        return bytes.length > 0 ? Buffer.from(bytes).toString('latin1') : undefined;
      }
      if (byte === 10) {
        return Buffer.from(bytes).toString('latin1');
      }
      if (byte !== 13) {
        bytes.push(byte);
      }
    }
  }

  private readByte(): number | undefined {
    if (this.pending.length === 0) {
      if (this.endOfInput) {
        return undefined;
      }
      const chunk = Buffer.alloc(1024);
      let count = 0;
      try {
        count = fs.readSync(this.inputFd, chunk, 0, chunk.length, null);
      } catch (e: unknown) {
        if (e instanceof Error && 'code' in e && e.code === 'EAGAIN') {
          return this.readByte();
        }
        if (e instanceof Error && 'code' in e && e.code === 'EOF') {
          count = 0;
        } else {
          throw e;
        }
      }
      if (count === 0) {
        this.endOfInput = true;
        return undefined;
      }
      this.pending.push(...chunk.subarray(0, count));
    }
    return this.pending.shift();
  }
}
