import { describe, expect, it } from "vitest";
import { ParseError } from "./Errors.ts";
import { parseDataItems, parseDirectStatements, parseProgram } from "./Parser.ts";
import { TypeTag } from "./Types.ts";
import { double, string } from "./Values.ts";

function parseOne(text: string) {
  const [statement] = parseDirectStatements(text, new Map());
  return statement;
}

function parseErrorOf(text: string): ParseError | undefined {
  try {
    parseProgram(text);
  } catch (e: unknown) {
    if (e instanceof ParseError) {
      return e;
    }
    throw e;
  }
  return undefined;
}

describe("parseProgram", () => {
  it("sorts lines and splits statements on colons", () => {
    const program = parseProgram('20 PRINT 2\n10 A = 1 : B$ = "X"\n');
    expect(program.lines.map((line) => line.number)).toEqual([10, 20]);
    expect(program.lines[0].text).toBe('10 A = 1 : B$ = "X"');
    expect(program.lines[0].statements).toEqual([
      {kind: 'let', target: {kind: 'variable', name: 'a!'}, value: {kind: 'number', value: 1}},
      {kind: 'let', target: {kind: 'variable', name: 'b$'}, value: {kind: 'string', value: 'X'}},
    ]);
  });

  it("keeps the last of two lines with the same number", () => {
    const program = parseProgram('10 PRINT 1\n10 PRINT 2');
    expect(program.lines).toHaveLength(1);
    expect(program.lines[0].text).toBe('10 PRINT 2');
  });

  it("applies DEFtype ranges to the whole program", () => {
    const program = parseProgram('10 I = 1\n20 DEFINT I-K');
    expect(program.defTypes.get('j')).toBe(TypeTag.INTEGER);
    expect(program.lines[0].statements[0]).toMatchObject({target: {name: 'i%'}});
  });

  it("requires a line number on every line", () => {
    expect(parseErrorOf('PRINT 1')?.message).toBe("Expected line number");
  });

  it("reports the source line of a syntax error", () => {
    const error = parseErrorOf('10 X = 1\n\n20 X = (1');
    expect(error?.message).toBe("Expected ')' after expression");
    expect(error?.line).toBe(3);
  });
});

describe("expressions", () => {
  it("binds ^ tighter than unary minus", () => {
    expect(parseOne('X = -2^2')).toMatchObject({
      value: {
        kind: 'unary',
        op: '-',
        operand: {kind: 'binary', op: '^', left: {kind: 'number', value: 2}, right: {kind: 'number', value: 2}},
      },
    });
  });

  it("binds * tighter than +", () => {
    expect(parseOne('X = 1 + 2 * 3')).toMatchObject({
      value: {
        kind: 'binary',
        op: '+',
        left: {kind: 'number', value: 1},
        right: {kind: 'binary', op: '*'},
      },
    });
  });

  it("reads ERR and FN calls", () => {
    expect(parseOne('X = ERR')).toMatchObject({value: {kind: 'variable', name: 'err%'}});
    expect(parseOne('X = FN SQ(2)')).toMatchObject({value: {kind: 'fn', name: 'fnsq!', args: [{kind: 'number', value: 2}]}});
  });
});

describe("statements", () => {
  it("parses ? as PRINT", () => {
    expect(parseOne('? 1')).toEqual({kind: 'print', fileNumber: undefined, items: [{expr: {kind: 'number', value: 1}, separator: ''}]});
  });

  it("parses IF with line number branches", () => {
    expect(parseOne('IF A THEN 100 ELSE 200')).toMatchObject({kind: 'if', thenLine: 100, elseLine: 200});
  });

  it("parses IF with statement branches", () => {
    const statement = parseOne('IF A THEN PRINT 1: PRINT 2 ELSE GOTO 50');
    expect(statement).toMatchObject({kind: 'if', elseStatements: [{kind: 'goto', line: 50}]});
    expect(statement.kind === 'if' && statement.thenStatements).toHaveLength(2);
  });

  it("parses both forms of OPEN", () => {
    expect(parseOne('OPEN "O", #1, "F.TXT"')).toMatchObject({
      mode: {kind: 'string', value: 'O'},
      fileNumber: {kind: 'number', value: 1},
      fileName: {kind: 'string', value: 'F.TXT'},
    });
    expect(parseOne('OPEN "F" FOR INPUT AS #2')).toMatchObject({
      mode: {kind: 'string', value: 'I'},
      fileNumber: {kind: 'number', value: 2},
      fileName: {kind: 'string', value: 'F'},
    });
  });

  it("parses CHAIN MERGE with its options", () => {
    expect(parseOne('CHAIN MERGE "B", 100, ALL, DELETE 10-20')).toMatchObject({
      kind: 'chain',
      merge: true,
      line: {kind: 'number', value: 100},
      all: true,
      deleteRange: [10, 20],
    });
  });

  it("parses RUN with a file and R", () => {
    expect(parseOne('RUN "NEXT", R')).toMatchObject({kind: 'run', fileName: {kind: 'string', value: 'NEXT'}, keepFiles: true});
    expect(parseOne('RUN 30')).toEqual({kind: 'run', line: 30, keepFiles: false});
  });

  it("treats RESUME 0 as a plain RESUME", () => {
    expect(parseOne('RESUME 0')).toEqual({kind: 'resume', next: false});
    expect(parseOne('RESUME NEXT')).toEqual({kind: 'resume', next: true});
  });
});

describe("parseDataItems", () => {
  it("splits on commas outside quotes and reads numbers", () => {
    expect(parseDataItems(' 1, "A,B", hello world, -2.5E1, ')).toEqual([
      double(1),
      string("A,B"),
      string("hello world"),
      double(-25),
      string(""),
    ]);
  });
});
