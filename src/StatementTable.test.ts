import { describe, expect, it } from "vitest";
import { HaltReason, halted, running } from "./ControlFlow.ts";
import { parseProgram } from "./Parser.ts";
import { StatementTable } from "./StatementTable.ts";

function table() {
  return StatementTable.build(parseProgram('10 A = 1: B = 2\n20 :\n30 END'));
}

describe("StatementTable", () => {
  it("steps through statements and skips empty lines", () => {
    const statements = table();
    const first = statements.first();
    expect(first).toEqual(running(10, 0));
    const second = statements.next(first);
    expect(second).toEqual(running(10, 1));
    const third = statements.next(second);
    expect(third).toEqual(running(30, 0));
    expect(statements.next(third)).toEqual(halted(HaltReason.END));
  });

  it("finds the first statement at or after an empty line", () => {
    expect(table().findLine(20)).toEqual(running(30, 0));
  });

  it("reports a missing line as an error", () => {
    expect(table().findLine(25).reason).toBe(HaltReason.ERROR);
  });

  it("merges and deletes lines", () => {
    const statements = table();
    statements.merge(parseProgram('15 PRINT\n30 STOP'));
    expect(statements.lines()).toEqual([10, 15, 20, 30]);
    expect(statements.get(running(30, 0))).toEqual({kind: 'stop'});
    statements.deleteRange(10, 15);
    expect(statements.lines()).toEqual([20, 30]);
    expect(statements.text(30)).toBe('30 STOP');
    expect(statements.size).toBe(2);
  });

  it("checks whether a pc addresses a statement", () => {
    const statements = table();
    expect(statements.valid(running(10, 1))).toBe(true);
    expect(statements.valid(running(10, 2))).toBe(false);
    expect(statements.valid(running(20, 0))).toBe(false);
  });
});
