import { describe, expect, it } from "vitest";
import { TestConsole } from "./Console.ts";
import { MemoryDrive } from "./Disk.ts";
import { Shell, parseRange, programFileName } from "./Shell.ts";

function setup(files: Record<string, string> = {}, input: string[] = []) {
  const console = new TestConsole(input);
  const disk = new MemoryDrive();
  for (const [name, text] of Object.entries(files)) {
    disk.writeText(name, text);
  }
  const reports: string[] = [];
  const shell = new Shell({console, disk, seed: 1, report: (message) => reports.push(message)});
  return {shell, console, disk, reports};
}

describe("running files", () => {
  it("adds .bas to names without an extension", () => {
    const {shell, console} = setup({"HELLO.bas": '10 PRINT "HI"\n'});
    expect(shell.runFile("HELLO")).toEqual({kind: 'end'});
    expect(console.output).toBe("HI\n");
  });

  it("reports a missing file", () => {
    const {shell, reports} = setup();
    expect(shell.runFile("NOPE")).toBeUndefined();
    expect(reports).toEqual(["?File not found"]);
  });

  it("reports runtime errors with their line", () => {
    const {shell, reports} = setup({"E.bas": '10 PRINT 1\n20 ERROR 13\n'});
    expect(shell.runFile("E")).toMatchObject({kind: 'error', error: {code: 13}});
    expect(reports).toEqual(["?Type mismatch in 20"]);
  });

  it("reports syntax errors by program line", () => {
    const {shell, reports} = setup({"S.bas": '10 PRINT 1\n20 X = (1\n'});
    expect(shell.runFile("S")).toBeUndefined();
    expect(reports).toEqual(["?Syntax error in 20"]);
  });

  it("rejects lines without a number", () => {
    const {shell, reports} = setup({"D.bas": 'PRINT 1\n'});
    expect(shell.runFile("D")).toBeUndefined();
    expect(reports).toEqual(["?Direct statement in file"]);
  });
});

describe("CHAIN", () => {
  it("passes COMMON variables to the next program", () => {
    const {shell, console} = setup({
      "A.bas": '10 A = 5: B = 7\n20 COMMON A\n30 CHAIN "B"\n',
      "B.bas": '10 PRINT A; B\n',
    });
    expect(shell.runFile("A")).toEqual({kind: 'end'});
    expect(console.output).toBe(" 5  0 \n");
  });

  it("merges over the current program and starts at the given line", () => {
    const {shell, console} = setup({
      "A.bas": '10 A = 1\n20 CHAIN MERGE "OVL", 30, ALL, DELETE 40-50\n40 PRINT "OLD"\n',
      "OVL.bas": '30 PRINT "NEW"; A\n',
    });
    shell.runFile("A");
    expect(console.output).toBe("NEW 1 \n");
    expect(shell.programText()).toBe('10 A = 1\n20 CHAIN MERGE "OVL", 30, ALL, DELETE 40-50\n30 PRINT "NEW"; A\n');
  });
});

describe("commands", () => {
  it("enters, lists and deletes lines", () => {
    const {shell, console} = setup();
    shell.command('20 PRINT "B"');
    shell.command('10 PRINT "A"');
    shell.command('LIST');
    expect(console.output).toBe('10 PRINT "A"\n20 PRINT "B"\nOk\n');
    shell.command('DELETE 10');
    expect(shell.programText()).toBe('20 PRINT "B"\n');
    shell.command('20');
    expect(shell.programText()).toBe('\n');
  });

  it("runs the program in memory", () => {
    const {shell, console} = setup();
    shell.command('10 PRINT "A"');
    shell.command('RUN');
    expect(console.output).toBe("A\nOk\n");
  });

  it("closes open files on each RUN", () => {
    const {shell, reports} = setup();
    shell.command('10 OPEN "O", #1, "A.TXT"');
    shell.command('20 STOP');
    shell.command('RUN');
    shell.command('RUN');
    expect(reports).toEqual(["Break in 20", "Break in 20"]);
  });

  it("starts at a given line with RUN n", () => {
    const {shell, console} = setup();
    shell.command('10 PRINT "A"');
    shell.command('20 PRINT "B"');
    shell.command('RUN 20');
    expect(console.output).toBe("B\nOk\n");
  });

  it("closes open files on shutdown", () => {
    const {shell} = setup();
    shell.command('10 OPEN "O", #1, "A.TXT"');
    shell.command('20 STOP');
    shell.command('RUN');
    expect(shell.interpreter.runtime.files.handles.size).toBe(1);
    shell.shutdown();
    expect(shell.interpreter.runtime.files.handles.size).toBe(0);
  });

  it("executes direct statements", () => {
    const {shell, console} = setup();
    shell.command('PRINT 2 + 3');
    expect(console.output).toBe(" 5 \nOk\n");
  });

  it("continues after STOP", () => {
    const {shell, console, reports} = setup();
    shell.command('10 PRINT "A"');
    shell.command('20 STOP');
    shell.command('30 PRINT "C"');
    shell.command('RUN');
    expect(reports).toEqual(["Break in 20"]);
    shell.command('CONT');
    expect(console.output).toBe("A\nOk\nC\nOk\n");
  });

  it("refuses to continue after the program was edited", () => {
    const {shell, reports} = setup();
    shell.command('10 STOP');
    shell.command('RUN');
    shell.command('20 END');
    shell.command('CONT');
    expect(reports).toEqual(["Break in 10", "?Can't continue"]);
  });

  it("saves and loads programs", () => {
    const {shell, disk} = setup();
    shell.command('10 PRINT 1');
    shell.command('SAVE "PROG"');
    expect(disk.readText("PROG.bas")).toBe('10 PRINT 1\n');
    shell.command('NEW');
    expect(shell.programText()).toBe('\n');
    shell.command('LOAD "PROG"');
    expect(shell.programText()).toBe('10 PRINT 1\n');
  });

  it("rejects line numbers that are too large", () => {
    const {shell, reports} = setup();
    shell.command('70000 PRINT');
    expect(reports).toEqual(["?Syntax error"]);
  });

  it("reports syntax errors in direct statements", () => {
    const {shell, reports} = setup();
    shell.command('PRINT (');
    expect(reports).toEqual(["?Missing operand"]);
  });

  it("reads commands until SYSTEM", () => {
    const {shell, console} = setup({}, ['10 PRINT "HI"', 'RUN', 'SYSTEM', 'PRINT "NEVER"']);
    shell.repl();
    expect(console.output).toBe('Ok\n10 PRINT "HI"\nRUN\nHI\nOk\nSYSTEM\n');
  });
});

describe("parseRange", () => {
  it("reads single lines and open or closed ranges", () => {
    expect(parseRange("")).toEqual([0, 65529]);
    expect(parseRange("10")).toEqual([10, 10]);
    expect(parseRange("10-20")).toEqual([10, 20]);
    expect(parseRange("10-")).toEqual([10, 65529]);
    expect(parseRange("-20")).toEqual([0, 20]);
  });
});

describe("programFileName", () => {
  it("keeps an explicit extension", () => {
    expect(programFileName("A.TXT")).toBe("A.TXT");
    expect(programFileName("A")).toBe("A.bas");
  });
});
