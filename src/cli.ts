#!/usr/bin/env -S npx tsx
import * as fs from "node:fs";
import { NodeConsole } from "./NodeConsole.ts";
import { NodeDrive } from "./NodeDrive.ts";
import { ParseError } from "./Errors.ts";
import { TokenType, tokenizeLine } from "./Lexer.ts";
import { parseProgram } from "./Parser.ts";
import { Shell } from "./Shell.ts";

enum Mode {
  RUN,
  PARSE,
  TOKENIZE,
}

interface CliOptions {
  mode: Mode;
  fileName?: string;
}

const USAGE = `
Usage: mbasic [options] [program.bas]

Options:
  --run, -r       Run the program (default)
  --parse         Parse the program and list its lines
  --tokenize, -t  Print the tokens of each line
  --help, -h      Show this help message

Without a program, commands are read interactively:
  NEW, RUN [n | "file"[,R]], LIST [n[-m]], DELETE n[-m], LOAD "file",
  SAVE "file", MERGE "file", CONT, SYSTEM
`;

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {mode: Mode.RUN};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--run" || arg === "-r") {
      options.mode = Mode.RUN;
    } else if (arg === "--parse") {
      options.mode = Mode.PARSE;
    } else if (arg === "--tokenize" || arg === "-t") {
      options.mode = Mode.TOKENIZE;
    } else if (arg === "--help" || arg === "-h") {
      process.stdout.write(USAGE);
      process.exit(0);
    } else if (arg.startsWith("-")) {
      process.stderr.write(`Unknown option: ${arg}\n`);
      process.exit(1);
    } else {
      options.fileName = arg;
    }
  }
  return options;
}

function readSource(fileName: string): string {
  try {
    return fs.readFileSync(fileName, "latin1");
  } catch {
    process.stderr.write(`Could not open file: ${fileName}\n`);
    process.exit(1);
  }
}

function tokenize(source: string) {
  source.split(/\r?\n/).forEach((text, i) => {
    if (text.trim() === '') {
      return;
    }
    const tokens = tokenizeLine(text, i + 1);
    process.stdout.write(tokens.map((token) => `${TokenType[token.type]}(${token.text})`).join(' ') + '\n');
  });
}

function parse(source: string) {
  const program = parseProgram(source);
  process.stdout.write(`Parsed ${program.lines.length} lines:\n`);
  for (const line of program.lines) {
    process.stdout.write(`  Line ${line.number}: ${line.statements.map((s) => s.kind).join(', ')}\n`);
  }
}

function environment(): Map<string, string> {
  const variables: Map<string, string> = new Map();
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      variables.set(key, value);
    }
  }
  return variables;
}

function main() {
  const options = parseArgs(process.argv.slice(2));
  const terminal = new NodeConsole();
  const shell = new Shell({
    console: terminal,
    disk: new NodeDrive(),
    environment: environment(),
    report: (message: string) => {
      terminal.flush();
      process.stderr.write(`${message}\n`);
    },
  });

  if (!options.fileName) {
    shell.repl();
    shell.shutdown();
    terminal.flush();
    return;
  }
  try {
    switch (options.mode) {
      case Mode.TOKENIZE:
        tokenize(readSource(options.fileName));
        break;
      case Mode.PARSE:
        parse(readSource(options.fileName));
        break;
      case Mode.RUN: {
        const outcome = shell.runFile(options.fileName);
        shell.shutdown();
        terminal.flush();
        if (!outcome || outcome.kind === 'error') {
          process.exitCode = 1;
        }
        break;
      }
    }
  } catch (e: unknown) {
    if (e instanceof ParseError) {
      process.stderr.write(`?${e.message} at ${e.line}:${e.charPositionInLine}\n`);
      process.exit(1);
    }
    throw e;
  }
}

main();
