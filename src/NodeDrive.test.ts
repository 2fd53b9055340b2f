import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TestConsole } from "./Console.ts";
import { FILE_NOT_FOUND, IOError } from "./Errors.ts";
import { OpenMode } from "./Files.ts";
import { Interpreter } from "./Interpreter.ts";
import { NodeDrive } from "./NodeDrive.ts";
import { parseProgram } from "./Parser.ts";

describe("NodeDrive", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mbasic-drive-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, {recursive: true, force: true});
  });

  it("reads and writes text relative to its directory", () => {
    const drive = new NodeDrive(tempDir);
    drive.writeText("A.TXT", "HELLO\n");
    expect(fs.readFileSync(path.join(tempDir, "A.TXT"), "latin1")).toBe("HELLO\n");
    expect(drive.readText("A.TXT")).toBe("HELLO\n");
  });

  it("reports a missing file", () => {
    const drive = new NodeDrive(tempDir);
    let code: number | undefined;
    try {
      drive.open("MISSING.TXT", OpenMode.INPUT);
    } catch (e: unknown) {
      code = e instanceof IOError ? e.error.errorCode : undefined;
    }
    expect(code).toBe(FILE_NOT_FOUND.errorCode);
  });

  it("writes a file when it is closed", () => {
    const drive = new NodeDrive(tempDir);
    const handle = drive.open("B.TXT", OpenMode.OUTPUT);
    handle.accessor.print("LINE", true);
    drive.close(handle);
    expect(fs.readFileSync(path.join(tempDir, "B.TXT"), "latin1")).toBe("LINE\n");
  });

  it("keeps the output of a program that runs past its last line", () => {
    const interpreter = new Interpreter({console: new TestConsole(), disk: new NodeDrive(tempDir)});
    interpreter.load(parseProgram(`10 OPEN "O", #1, "OUT.TXT"\n20 PRINT #1, "HELLO"`));
    expect(interpreter.run()).toEqual({kind: 'end'});
    expect(fs.readFileSync(path.join(tempDir, "OUT.TXT"), "latin1")).toBe("HELLO\n");
  });
});
