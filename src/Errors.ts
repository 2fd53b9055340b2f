export interface ErrorValue {
  errorCode: number;
  errorMessage: string;
}

// Lexical and syntax errors detected while parsing program text.
export class ParseError extends Error {
  line: number;
  charPositionInLine: number;
  length: number;

  constructor(line: number, charPositionInLine: number, length: number, message: string) {
    super(message);
    this.name = "ParseError";
    this.line = line;
    this.charPositionInLine = charPositionInLine;
    this.length = length;
  }

  static fromLineAndPosition(line: number, charPositionInLine: number, message: string, length = 1) {
    return new ParseError(line, charPositionInLine, length, message);
  }

  get location() {
    return {
      line: this.line,
      column: this.charPositionInLine,
      length: this.length,
    };
  }
}

// Errors raised while executing a statement.  These can be trapped with
// ON ERROR.
export class RuntimeError extends Error {
  error: ErrorValue;

  private constructor(error: ErrorValue) {
    super(error.errorMessage);
    this.name = "RuntimeError";
    this.error = error;
  }

  static fromError(error: ErrorValue) {
    return new RuntimeError(error);
  }

  static fromCode(code: number) {
    return new RuntimeError(getErrorForCode(code));
  }

  static internalError(thrownError: unknown) {
    return new RuntimeError({
      errorCode: INTERNAL_ERROR.errorCode,
      errorMessage: internalErrorMessage(thrownError),
    });
  }

  get code(): number {
    return this.error.errorCode;
  }
}

// Thrown by disk and file back ends, and rethrown as a RuntimeError by the
// statement that triggered the access.
export class IOError extends Error {
  error: ErrorValue;

  constructor(error: ErrorValue) {
    super(error.errorMessage);
    this.name = "IOError";
    this.error = error;
  }
}

function internalErrorMessage(e: unknown): string {
  return e instanceof Error ? `Internal error: ${e.message}` : 'Internal error';
}

const ERROR_MESSAGES: Map<number, string> = (() => {
  const chart = `
1       NEXT without FOR             26      FOR without NEXT
2       Syntax error                 29      WHILE without WEND
3       RETURN without GOSUB         30      WEND without WHILE
4       Out of DATA                  50      Field overflow
5       Illegal function call        51      Internal error
6       Overflow                     52      Bad file number
7       Out of memory                53      File not found
8       Undefined line number        54      Bad file mode
9       Subscript out of range       55      File already open
10      Duplicate definition         57      Disk I/O error
11      Division by zero             58      File already exists
12      Illegal direct               61      Disk full
13      Type mismatch                62      Input past end
14      Out of string space          63      Bad record number
15      String too long              64      Bad file name
16      String formula too complex   66      Direct statement in file
17      Can't continue               67      Too many files
18      Undefined user function
19      No RESUME
20      RESUME without error
22      Missing operand
23      Line buffer overflow
`;
  const errors = new Map<number, string>();
  for (const line of chart.split('\n')) {
    for (const entry of line.match(/(\d+)\s+([^\d]+)/g) ?? []) {
      const match = entry.trim().match(/^(\d+)\s+(.*)$/);
      if (match && +match[1] && match[2]) {
        errors.set(+match[1], match[2]);
      }
    }
  }
  return errors;
})();

export function errorMessage(code: number): string {
  return ERROR_MESSAGES.get(code) ?? "Unprintable error";
}

export function getErrorForCode(code: number): ErrorValue {
  return {errorCode: code, errorMessage: errorMessage(code)};
}

export const
  NEXT_WITHOUT_FOR = getErrorForCode(1),
  SYNTAX_ERROR = getErrorForCode(2),
  RETURN_WITHOUT_GOSUB = getErrorForCode(3),
  OUT_OF_DATA = getErrorForCode(4),
  ILLEGAL_FUNCTION_CALL = getErrorForCode(5),
  OVERFLOW = getErrorForCode(6),
  UNDEFINED_LINE_NUMBER = getErrorForCode(8),
  SUBSCRIPT_OUT_OF_RANGE = getErrorForCode(9),
  DUPLICATE_DEFINITION = getErrorForCode(10),
  DIVISION_BY_ZERO = getErrorForCode(11),
  ILLEGAL_DIRECT = getErrorForCode(12),
  TYPE_MISMATCH = getErrorForCode(13),
  STRING_TOO_LONG = getErrorForCode(15),
  CANT_CONTINUE = getErrorForCode(17),
  UNDEFINED_USER_FUNCTION = getErrorForCode(18),
  NO_RESUME = getErrorForCode(19),
  RESUME_WITHOUT_ERROR = getErrorForCode(20),
  MISSING_OPERAND = getErrorForCode(22),
  FOR_WITHOUT_NEXT = getErrorForCode(26),
  WHILE_WITHOUT_WEND = getErrorForCode(29),
  WEND_WITHOUT_WHILE = getErrorForCode(30),
  FIELD_OVERFLOW = getErrorForCode(50),
  INTERNAL_ERROR = getErrorForCode(51),
  BAD_FILE_NUMBER = getErrorForCode(52),
  FILE_NOT_FOUND = getErrorForCode(53),
  BAD_FILE_MODE = getErrorForCode(54),
  FILE_ALREADY_OPEN = getErrorForCode(55),
  DISK_IO_ERROR = getErrorForCode(57),
  FILE_ALREADY_EXISTS = getErrorForCode(58),
  INPUT_PAST_END = getErrorForCode(62),
  BAD_RECORD_NUMBER = getErrorForCode(63),
  BAD_FILE_NAME = getErrorForCode(64),
  DIRECT_STATEMENT_IN_FILE = getErrorForCode(66),
  TOO_MANY_FILES = getErrorForCode(67);
