import { DevicePrinter, Printer } from "./Printer.ts";

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface Console extends Printer {
  // Prints the prompt and reads one line of input, or undefined at end of
  // input.
  readLine(prompt: string): string | undefined;
  // Returns a pending keypress without waiting, or "".
  inkey(): string;
  clear(): void;
}

// A console that reads from queued lines and collects its output.  Input
// lines are echoed the way a terminal would show them.
export class TestConsole extends DevicePrinter implements Console {
  output: string = "";
  input: string[];
  keys: string[];

  constructor(input: string[] = [], keys: string[] = []) {
    super();
    this.input = [...input];
    this.keys = [...keys];
  }

  protected override emit(text: string) {
    this.output += text;
  }

  readLine(prompt: string): string | undefined {
    this.write(prompt);
    const line = this.input.shift();
    if (line !== undefined) {
      this.write(line);
    }
    this.endLine();
    return line;
  }

  inkey(): string {
    return this.keys.shift() ?? "";
  }

  clear() {
    this.output += CLEAR_SCREEN;
    this.column = 1;
  }
}
