import { describe, expect, it } from "vitest";
import { TestConsole } from "./Console.ts";
import { MemoryDrive } from "./Disk.ts";
import { Interpreter } from "./Interpreter.ts";
import { parseDirectStatements, parseProgram } from "./Parser.ts";

function run(source: string, input: string[] = [], disk = new MemoryDrive()) {
  const console = new TestConsole(input);
  const interpreter = new Interpreter({console, disk, seed: 1, now: () => new Date(2024, 0, 2, 3, 4, 5)});
  interpreter.load(parseProgram(source));
  const outcome = interpreter.run();
  return {output: console.output, outcome, interpreter, console};
}

function errorCode(source: string): number | undefined {
  const {outcome} = run(source);
  return outcome.kind === 'error' ? outcome.error.code : undefined;
}

describe("FOR and NEXT", () => {
  it("counts through the loop", () => {
    const {output, outcome} = run(`
10 FOR I = 1 TO 3
20 PRINT I
30 NEXT I
`);
    expect(output).toBe(" 1 \n 2 \n 3 \n");
    expect(outcome).toEqual({kind: 'end'});
  });

  it("counts down with a negative step", () => {
    const {output} = run(`10 FOR I = 3 TO 1 STEP -1: PRINT I;: NEXT`);
    expect(output).toBe(" 3  2  1 ");
  });

  it("skips the body of a loop that runs zero times", () => {
    const {output} = run(`10 FOR I = 5 TO 1: PRINT "X": NEXT I: PRINT "DONE"`);
    expect(output).toBe("DONE\n");
  });

  it("finds the matching NEXT past nested loops", () => {
    const {output} = run(`
10 FOR I = 2 TO 1
20 FOR J = 1 TO 2
30 PRINT "INNER"
40 NEXT J
50 NEXT I
60 PRINT "OUT"
`);
    expect(output).toBe("OUT\n");
  });

  it("closes several loops with one NEXT", () => {
    const {output} = run(`
10 FOR I = 1 TO 2: FOR J = 1 TO 2
20 PRINT I * 10 + J;
30 NEXT J, I
`);
    expect(output).toBe(" 11  12  21  22 ");
  });

  it("closes the most recently entered loop with a bare NEXT", () => {
    const {output, interpreter} = run(`
10 FOR I = 1 TO 2
20 FOR J = 1 TO 2
30 PRINT I; J;
40 NEXT
50 NEXT
`);
    expect(output).toBe(" 1  1  1  2  2  1  2  2 ");
    expect(interpreter.runtime.forLoops.size).toBe(0);
  });

  it("leaves the variable past the end value", () => {
    const {output} = run(`10 FOR I = 1 TO 3: NEXT: PRINT I`);
    expect(output).toBe(" 4 \n");
  });

  it("reports NEXT without FOR", () => {
    expect(errorCode(`10 NEXT I`)).toBe(1);
  });

  it("reports FOR without NEXT", () => {
    expect(errorCode(`10 FOR I = 3 TO 1\n20 PRINT I`)).toBe(26);
  });
});

describe("WHILE and WEND", () => {
  it("loops while the condition holds", () => {
    const {output} = run(`
10 I = 0
20 WHILE I < 3
30 I = I + 1: PRINT I;
40 WEND
50 PRINT "END"
`);
    expect(output).toBe(" 1  2  3 END\n");
  });

  it("finds its WHILE below a GOSUB frame", () => {
    const {output, outcome, interpreter} = run(`
10 I = 0
20 WHILE I < 2
30 I = I + 1
40 GOSUB 100
100 PRINT I;
110 WEND
`);
    expect(output).toBe(" 1  2 ");
    expect(outcome).toEqual({kind: 'end'});
    expect(interpreter.runtime.controlStack.length).toBe(2);
  });

  it("reports WEND without WHILE", () => {
    expect(errorCode(`10 WEND`)).toBe(30);
  });
});

describe("GOSUB and RETURN", () => {
  it("returns to the statement after the call", () => {
    const {output} = run(`
10 GOSUB 100: PRINT "BACK"
20 END
100 PRINT "SUB";
110 RETURN
`);
    expect(output).toBe("SUBBACK\n");
  });

  it("returns from nested calls in reverse order", () => {
    const {output, interpreter} = run(`
10 GOSUB 100: PRINT "C"
20 END
100 PRINT "A";: GOSUB 200: PRINT "B";
110 RETURN
200 PRINT "S";
210 RETURN
`);
    expect(output).toBe("ASBC\n");
    expect(interpreter.runtime.controlStack.length).toBe(0);
  });

  it("reports RETURN without GOSUB", () => {
    expect(errorCode(`10 RETURN`)).toBe(3);
  });

  it("reports a missing target line", () => {
    expect(errorCode(`10 GOSUB 500`)).toBe(8);
  });

  it("selects a target with ON GOTO", () => {
    const {output} = run(`
10 X = 2
20 ON X GOTO 100, 200
30 PRINT "NONE": END
100 PRINT "ONE": END
200 PRINT "TWO": END
`);
    expect(output).toBe("TWO\n");
  });

  it("falls through ON GOTO when the selector is out of range", () => {
    const {output} = run(`
10 ON 3 GOTO 100, 200
20 PRINT "FELL"
30 END
100 PRINT "ONE"
200 PRINT "TWO"
`);
    expect(output).toBe("FELL\n");
  });
});

describe("IF", () => {
  it("runs the ELSE branch when the condition is false", () => {
    const {output} = run(`10 A = 1: IF A = 2 THEN PRINT "YES" ELSE PRINT "NO"`);
    expect(output).toBe("NO\n");
  });

  it("branches to a line number after THEN", () => {
    const {output} = run(`
10 IF 1 THEN 30
20 PRINT "SKIPPED"
30 PRINT "HERE"
`);
    expect(output).toBe("HERE\n");
  });

  it("stops running inline statements after a jump", () => {
    const {output} = run(`
10 IF 1 THEN GOTO 30: PRINT "NEVER"
20 PRINT "SKIPPED"
30 PRINT "HERE"
`);
    expect(output).toBe("HERE\n");
  });
});

describe("error trapping", () => {
  it("resumes at the next statement", () => {
    const {output, outcome} = run(`
10 ON ERROR GOTO 100
20 X = 1 / 0
30 PRINT "AFTER"
40 END
100 PRINT "E"; ERR; ERL
110 RESUME NEXT
`);
    expect(output).toBe("E 11  20 \nAFTER\n");
    expect(outcome).toEqual({kind: 'end'});
  });

  it("retries the failed statement with RESUME", () => {
    const {output} = run(`
10 ON ERROR GOTO 100
20 D = 0
30 PRINT 10 / D
40 END
100 D = 2: RESUME
`);
    expect(output).toBe(" 5 \n");
  });

  it("continues at a given line with RESUME n", () => {
    const {output} = run(`
10 ON ERROR GOTO 100
20 ERROR 200
30 PRINT "NO"
40 END
100 PRINT ERR: RESUME 40
`);
    expect(output).toBe(" 200 \n");
  });

  it("makes the pending error fatal with ON ERROR GOTO 0", () => {
    const {outcome} = run(`
10 ON ERROR GOTO 100
20 ERROR 5
100 ON ERROR GOTO 0
`);
    expect(outcome.kind).toBe('error');
    expect(outcome.kind === 'error' && outcome.error.code).toBe(5);
  });

  it("does not trap errors raised inside the handler", () => {
    const {outcome} = run(`
10 ON ERROR GOTO 100
20 ERROR 5
100 X = 1 / 0
`);
    expect(outcome.kind === 'error' && outcome.error.code).toBe(11);
    expect(outcome.kind === 'error' && outcome.error.pc?.line).toBe(100);
  });

  it("returns from an ON ERROR GOSUB handler", () => {
    const {output} = run(`
10 ON ERROR GOSUB 100
20 ERROR 7
30 PRINT "BACK"; ERR
40 END
100 PRINT "HANDLER";
110 RETURN
`);
    expect(output).toBe("HANDLERBACK 0 \n");
  });

  it("reports RESUME without an error", () => {
    expect(errorCode(`10 RESUME`)).toBe(20);
  });

  it("reports END inside a handler as No RESUME", () => {
    expect(errorCode(`10 ON ERROR GOTO 100\n20 ERROR 5\n100 END`)).toBe(19);
  });

  it("rejects error codes outside 1 to 255", () => {
    expect(errorCode(`10 ERROR 0`)).toBe(5);
  });

  it("reports uncaught errors with their line", () => {
    const {outcome, output} = run(`10 PRINT "A"\n20 X = 1 / 0`);
    expect(output).toBe("A\n");
    expect(outcome).toEqual({
      kind: 'error',
      error: {code: 11, message: 'Division by zero', pc: {line: 20, stmt: 0, reason: 0}},
    });
  });

  it("reports ERL for lines past 32767", () => {
    const {output} = run(`
10 ON ERROR GOTO 50000
20 GOTO 40000
40000 ERROR 5
50000 PRINT ERL: RESUME 60000
60000 END
`);
    expect(output).toBe(" 40000 \n");
  });
});

describe("arrays", () => {
  it("stores and reads elements", () => {
    const {output} = run(`10 DIM A(3): A(2) = 5: PRINT A(2) + A(3)`);
    expect(output).toBe(" 5 \n");
  });

  it("creates arrays of ten on first use", () => {
    expect(run(`10 B(10) = 1: PRINT B(10)`).output).toBe(" 1 \n");
    expect(errorCode(`10 B(11) = 1`)).toBe(9);
  });

  it("reports a second DIM as a duplicate definition", () => {
    expect(errorCode(`10 DIM A(5)\n20 DIM A(3)`)).toBe(10);
  });

  it("reports subscripts past the bound", () => {
    expect(errorCode(`10 DIM A(5)\n20 A(6) = 1`)).toBe(9);
  });

  it("honors OPTION BASE 1", () => {
    expect(errorCode(`10 OPTION BASE 1: DIM A(3): A(0) = 1`)).toBe(9);
  });

  it("rejects OPTION BASE after arrays exist", () => {
    expect(errorCode(`10 DIM A(3): OPTION BASE 1`)).toBe(10);
  });

  it("allows DIM again after ERASE", () => {
    expect(run(`10 DIM A(3): ERASE A: DIM A(5): A(5) = 2: PRINT A(5)`).output).toBe(" 2 \n");
  });
});

describe("DATA, READ and RESTORE", () => {
  it("reads values in order and restores to the start", () => {
    const {output} = run(`
10 DATA 1, 2
20 READ A, B
30 RESTORE
40 READ C
50 PRINT A; B; C
`);
    expect(output).toBe(" 1  2  1 \n");
  });

  it("restores to a given line", () => {
    const {output} = run(`
10 DATA 1
20 DATA 2
30 RESTORE 20
40 READ A
50 PRINT A
`);
    expect(output).toBe(" 2 \n");
  });

  it("runs out of data after restoring past the last DATA line", () => {
    expect(errorCode(`10 DATA 1\n20 RESTORE 30\n30 READ A`)).toBe(4);
  });

  it("keeps its place when MERGE adds DATA", () => {
    const disk = new MemoryDrive();
    disk.writeText("OVL.BAS", "100 DATA 3\n");
    const {output} = run(`
10 DATA 1, 2
20 READ A
30 MERGE "OVL.BAS"
40 READ B, C
50 PRINT A; B; C
`, [], disk);
    expect(output).toBe(" 1  2  3 \n");
  });

  it("reports a syntax error in a merged file", () => {
    const disk = new MemoryDrive();
    disk.writeText("BAD.BAS", "100 X = (1\n");
    const {outcome} = run(`10 MERGE "BAD.BAS"`, [], disk);
    expect(outcome.kind === 'error' && outcome.error.code).toBe(2);
  });

  it("reads numbers into string variables as text", () => {
    const {output} = run(`10 DATA 42, "HI, THERE"\n20 READ A$, B$\n30 PRINT A$; "/"; B$`);
    expect(output).toBe("42/HI, THERE\n");
  });

  it("reports running out of data", () => {
    expect(errorCode(`10 DATA 1\n20 READ A, B`)).toBe(4);
  });
});

describe("assignment", () => {
  it("reports a string assigned to a number", () => {
    expect(errorCode(`10 A = "X"`)).toBe(13);
  });

  it("swaps two values", () => {
    const {output} = run(`10 A$ = "L": B$ = "R": SWAP A$, B$: PRINT A$; B$`);
    expect(output).toBe("RL\n");
  });

  it("overwrites part of a string with MID$", () => {
    const {output} = run(`10 A$ = "HELLO": MID$(A$, 2, 3) = "IPPY": PRINT A$`);
    expect(output).toBe("HIPPO\n");
  });

  it("rounds to the nearest even integer for integer variables", () => {
    const {output} = run(`10 A% = 2.5: B% = 3.5: PRINT A%; B%`);
    expect(output).toBe(" 2  4 \n");
  });

  it("applies DEFINT to names without a suffix", () => {
    const {output} = run(`10 DEFINT I\n20 I = 7 / 2\n30 PRINT I`);
    expect(output).toBe(" 4 \n");
  });

  it("calls user functions", () => {
    const {output} = run(`10 DEF FNSQ(X) = X * X\n20 PRINT FNSQ(4)`);
    expect(output).toBe(" 16 \n");
  });
});

describe("PRINT", () => {
  it("formats with PRINT USING", () => {
    const {output} = run(`10 PRINT USING "###.##"; 3.14159`);
    expect(output).toBe("  3.14\n");
  });

  it("reuses nothing once the fields run out", () => {
    const {output} = run(`10 PRINT USING "A=## "; 1; 2`);
    expect(output).toBe("A= 1 \n");
  });

  it("rejects a format without fields", () => {
    expect(errorCode(`10 PRINT USING "ABC"; 1`)).toBe(5);
  });

  it("moves to print zones on commas", () => {
    const {output} = run(`10 PRINT "A", "B"`);
    expect(output).toBe("A" + " ".repeat(13) + "B\n");
  });

  it("writes quoted, comma separated values", () => {
    const {output} = run(`10 WRITE "A", 1, -2.5`);
    expect(output).toBe(`"A",1,-2.5\n`);
  });

  it("prints the line numbers of a traced program", () => {
    const {output} = run(`10 TRON\n20 PRINT "X"\n30 TROFF\n40 PRINT "Y"`);
    expect(output).toBe("[20]X\n[30]Y\n");
  });
});

describe("INPUT", () => {
  it("splits the typed line into variables", () => {
    const {output} = run(`10 INPUT "NAME, AGE"; N$, A\n20 PRINT N$; A`, ["BOB, 42"]);
    expect(output).toBe("NAME, AGE? BOB, 42\nBOB 42 \n");
  });

  it("reports input past the end of the console", () => {
    const {outcome} = run(`10 INPUT A`);
    expect(outcome.kind === 'error' && outcome.error.code).toBe(62);
  });

  it("reads a whole line with LINE INPUT", () => {
    const {output} = run(`10 LINE INPUT L$\n20 PRINT L$`, ["A, B"]);
    expect(output).toBe("A, B\nA, B\n");
  });
});

describe("files", () => {
  it("writes and reads a sequential file", () => {
    const disk = new MemoryDrive();
    const {output} = run(`
10 OPEN "O", #1, "OUT.TXT"
20 WRITE #1, "A", 1
30 PRINT #1, "X,"; 3
40 CLOSE
50 OPEN "I", #1, "OUT.TXT"
60 LINE INPUT #1, L$
70 INPUT #1, S$, N
80 PRINT L$: PRINT S$; N; EOF(1)
`, [], disk);
    expect(disk.readText("OUT.TXT")).toBe(`"A",1\nX, 3 \n`);
    expect(output).toBe(`"A",1\nX 3 -1 \n`);
  });

  it("stores records through FIELD buffers", () => {
    const disk = new MemoryDrive();
    const {output} = run(`
10 OPEN "R", #1, "DATA.DAT", 10
20 FIELD #1, 5 AS A$, 5 AS B$
30 LSET A$ = "HI": RSET B$ = "YO"
40 PUT #1, 1
50 LSET A$ = ""
60 GET #1, 1
70 PRINT A$; B$; "|"
80 CLOSE #1
`, [], disk);
    expect(output).toBe("HI      YO|\n");
    expect(disk.readText("DATA.DAT")).toBe("HI      YO");
  });

  it("rejects fields wider than the record", () => {
    expect(errorCode(`10 OPEN "R", #1, "F.DAT", 4\n20 FIELD #1, 5 AS A$`)).toBe(50);
  });

  it("reports a missing file", () => {
    expect(errorCode(`10 OPEN "I", #1, "MISSING.TXT"`)).toBe(53);
  });

  it("reports printing to a file opened for input", () => {
    const disk = new MemoryDrive();
    disk.writeText("IN.TXT", "1\n");
    const {outcome} = run(`10 OPEN "I", #1, "IN.TXT"\n20 PRINT #1, "X"`, [], disk);
    expect(outcome.kind === 'error' && outcome.error.code).toBe(54);
  });

  it("closes files at END", () => {
    const {interpreter} = run(`10 OPEN "O", #1, "A.TXT"\n20 END`);
    expect(interpreter.runtime.files.handles.size).toBe(0);
  });

  it("closes files when the program runs past its last line", () => {
    const disk = new MemoryDrive();
    const {outcome, interpreter} = run(`10 OPEN "O", #1, "A.TXT"\n20 PRINT #1, "HI"`, [], disk);
    expect(outcome).toEqual({kind: 'end'});
    expect(interpreter.runtime.files.handles.size).toBe(0);
    expect(disk.readText("A.TXT")).toBe("HI\n");
  });
});

describe("STOP and CONT", () => {
  it("continues after STOP", () => {
    const {outcome, interpreter, console} = run(`10 PRINT "A"\n20 STOP\n30 PRINT "B"`);
    expect(outcome).toEqual({kind: 'stop', pc: {line: 20, stmt: 0, reason: 0}});
    expect(interpreter.continue()).toEqual({kind: 'end'});
    expect(console.output).toBe("A\nB\n");
  });

  it("cannot continue after END", () => {
    const {interpreter} = run(`10 END`);
    const outcome = interpreter.continue();
    expect(outcome.kind === 'error' && outcome.error.code).toBe(17);
  });

  it("stops at a breakpoint once", () => {
    const console = new TestConsole();
    const interpreter = new Interpreter({console});
    interpreter.load(parseProgram(`10 PRINT "A"\n20 PRINT "B"`));
    interpreter.runtime.breakpoints.add(20);
    expect(interpreter.run()).toEqual({kind: 'breakpoint', pc: {line: 20, stmt: 0, reason: 0}});
    expect(console.output).toBe("A\n");
    expect(interpreter.continue()).toEqual({kind: 'end'});
    expect(console.output).toBe("A\nB\n");
  });

  it("stops at a breakpoint again when a loop comes back to it", () => {
    const console = new TestConsole();
    const interpreter = new Interpreter({console});
    interpreter.load(parseProgram(`10 I = I + 1: PRINT I;: IF I < 3 THEN 10`));
    interpreter.runtime.breakpoints.add(10);
    const atLine10 = {kind: 'breakpoint', pc: {line: 10, stmt: 0, reason: 0}};
    expect(interpreter.run()).toEqual(atLine10);
    expect(console.output).toBe("");
    expect(interpreter.continue()).toEqual(atLine10);
    expect(console.output).toBe(" 1 ");
    expect(interpreter.continue()).toEqual(atLine10);
    expect(interpreter.continue()).toEqual({kind: 'end'});
    expect(console.output).toBe(" 1  2  3 ");
  });

  it("stops on a break request", () => {
    const console = new TestConsole();
    const interpreter = new Interpreter({console});
    interpreter.load(parseProgram(`10 PRINT "A"`));
    interpreter.requestBreak();
    expect(interpreter.run()).toEqual({kind: 'break', pc: {line: 10, stmt: 0, reason: 0}});
  });
});

describe("direct statements", () => {
  it("see the variables a program left behind", () => {
    const {interpreter, console} = run(`10 A = 6`);
    const outcome = interpreter.executeDirect(parseDirectStatements(`PRINT A * 2`, new Map()));
    expect(outcome).toEqual({kind: 'end'});
    expect(console.output).toBe(" 12 \n");
  });

  it("report errors without a line", () => {
    const {interpreter} = run(`10 END`);
    const outcome = interpreter.executeDirect(parseDirectStatements(`X = 1 / 0`, new Map()));
    expect(outcome).toEqual({kind: 'error', error: {code: 11, message: 'Division by zero', pc: undefined}});
  });

  it("reject DATA outside a program", () => {
    const {interpreter} = run(`10 END`);
    const outcome = interpreter.executeDirect(parseDirectStatements(`DATA 1`, new Map()));
    expect(outcome.kind === 'error' && outcome.error.code).toBe(12);
  });

  it("carry on into the program after GOTO", () => {
    const {interpreter, console} = run(`10 END\n20 PRINT "TWENTY"`);
    interpreter.executeDirect(parseDirectStatements(`GOTO 20`, new Map()));
    expect(console.output).toBe("TWENTY\n");
  });
});

describe("CHAIN and RUN", () => {
  it("hands back a chain request with COMMON variables", () => {
    const {outcome} = run(`10 COMMON A\n20 A = 3: B = 4\n30 CHAIN "NEXT.BAS"`);
    expect(outcome.kind).toBe('chain');
    if (outcome.kind === 'chain') {
      expect(outcome.request.fileName).toBe("NEXT.BAS");
      expect([...outcome.request.common.scalars.keys()]).toEqual(['a!']);
    }
  });

  it("restarts at a line with RUN n, clearing variables", () => {
    const {output} = run(`
10 PRINT "X"
20 A = 1: RUN 40
30 END
40 PRINT "FORTY"; A
`);
    expect(output).toBe("X\nFORTY 0 \n");
  });

  it("requests another program with RUN \"file\"", () => {
    const {outcome} = run(`10 RUN "OTHER.BAS"`);
    expect(outcome).toEqual({kind: 'run', request: {fileName: "OTHER.BAS", line: undefined, keepFiles: false}});
  });
});

describe("built-in functions", () => {
  it("slices strings", () => {
    const {output} = run(`10 A$ = "HELLO": PRINT LEFT$(A$, 2); RIGHT$(A$, 2); MID$(A$, 2, 3); LEN(A$)`);
    expect(output).toBe("HELLOELL 5 \n");
  });

  it("converts between strings and numbers", () => {
    const {output} = run(`10 PRINT STR$(5); VAL("12AB"); CHR$(65); ASC("a"); HEX$(255)`);
    expect(output).toBe(" 5 12 A 97 FF\n");
  });

  it("reads the environment", () => {
    const console = new TestConsole();
    const interpreter = new Interpreter({console, environment: new Map([["HOME", "/home/test"]])});
    interpreter.load(parseProgram(`10 PRINT ENVIRON$("HOME")`));
    interpreter.run();
    expect(console.output).toBe("/home/test\n");
  });

  it("formats the date and time from the clock", () => {
    const {output} = run(`10 PRINT DATE$; " "; TIME$`);
    expect(output).toBe("01-02-2024 03:04:05\n");
  });

  it("repeats a seeded random sequence", () => {
    const first = run(`10 PRINT RND(1); RND(1)`).output;
    const second = run(`10 PRINT RND(1); RND(1)`).output;
    expect(first).toBe(second);
  });
});
