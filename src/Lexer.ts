import { ParseError } from "./Errors.ts";
import keywords from "./keywords.json" with { type: "json" };

export enum TokenType {
  LINE_NUMBER,
  NUMBER,
  STRING,
  IDENTIFIER,
  KEYWORD,
  FUNCTION,
  OPERATOR,
  // The unparsed text of a DATA statement.
  DATA,
  // REM or ' comments, including the comment text.
  REM,
  EOL,
}

export interface Token {
  type: TokenType;
  // Lowercased for identifiers and keywords, raw for strings and comments.
  text: string;
  // Identifier text as written.
  original?: string;
  number?: number;
  line: number;
  column: number;
}

export const MAX_LINE_NUMBER = 65529;

const STATEMENT_KEYWORDS: Set<string> = new Set(keywords.statements);
const OPERATOR_KEYWORDS: Set<string> = new Set(keywords.operators);
const FUNCTION_NAMES: Set<string> = new Set(keywords.functions);

// Statements that may be written with a file number glued on, as in PRINT#1.
const FILE_STATEMENTS = new Set(['print', 'lprint', 'input', 'write', 'field', 'get', 'put', 'close']);

const OPERATORS = ['<>', '><', '<=', '>=', '=<', '=>', '+', '-', '*', '/', '^', '\\', '=', '<', '>', '(', ')', ',', ';', ':', '?', '#', '&'];

export function isKeyword(name: string): boolean {
  return STATEMENT_KEYWORDS.has(name) || OPERATOR_KEYWORDS.has(name) || FUNCTION_NAMES.has(name);
}

export class Lexer {
  private text: string;
  private line: number;
  private pos = 0;
  private tokens: Token[] = [];

  constructor(text: string, line: number = 1) {
    this.text = text;
    this.line = line;
  }

  tokenize(): Token[] {
    this.skipWhitespace();
    if (isDigit(this.current())) {
      this.readLineNumber();
    }
    while (this.pos < this.text.length) {
      this.skipWhitespace();
      if (this.pos >= this.text.length) {
        break;
      }
      const ch = this.current();
      const column = this.pos + 1;
      if (isDigit(ch) || (ch === '.' && isDigit(this.peek()))) {
        this.readNumber();
      } else if (ch === '&' && /[hHoO0-7]/.test(this.peek())) {
        this.readRadixNumber();
      } else if (ch === '"') {
        this.readString();
      } else if (isLetter(ch)) {
        this.readIdentifier();
      } else if (ch === "'") {
        this.push(TokenType.REM, this.text.slice(this.pos + 1), column);
        this.pos = this.text.length;
      } else if (ch.charCodeAt(0) < 32) {
        this.pos++;
      } else {
        const op = OPERATORS.find((op) => this.text.startsWith(op, this.pos));
        if (!op) {
          throw ParseError.fromLineAndPosition(this.line, column, `Unexpected character '${ch}'`);
        }
        this.pos += op.length;
        this.push(TokenType.OPERATOR, normalizeOperator(op), column);
      }
    }
    this.push(TokenType.EOL, '', this.text.length + 1);
    return this.tokens;
  }

  private current(): string {
    return this.text.charAt(this.pos);
  }

  private peek(offset = 1): string {
    return this.text.charAt(this.pos + offset);
  }

  private push(type: TokenType, text: string, column: number, extra: Partial<Token> = {}) {
    this.tokens.push({type, text, line: this.line, column, ...extra});
  }

  private skipWhitespace() {
    while (this.current() === ' ' || this.current() === '\t') {
      this.pos++;
    }
  }

  private readLineNumber() {
    const column = this.pos + 1;
    const start = this.pos;
    while (isDigit(this.current())) {
      this.pos++;
    }
    const text = this.text.slice(start, this.pos);
    const number = parseInt(text, 10);
    if (number > MAX_LINE_NUMBER) {
      throw ParseError.fromLineAndPosition(this.line, column, `Line number ${text} exceeds maximum of ${MAX_LINE_NUMBER}`, text.length);
    }
    this.push(TokenType.LINE_NUMBER, text, column, {number});
  }

  private readNumber() {
    const column = this.pos + 1;
    const start = this.pos;
    while (isDigit(this.current())) {
      this.pos++;
    }
    if (this.current() === '.' && !isLetter(this.peek())) {
      this.pos++;
      while (isDigit(this.current())) {
        this.pos++;
      }
    }
    let mantissa = this.text.slice(start, this.pos);
    let exponent = '';
    if (/[eEdD]/.test(this.current())) {
      this.pos++;
      if (this.current() === '+' || this.current() === '-') {
        exponent += this.current();
        this.pos++;
      }
      if (!isDigit(this.current())) {
        throw ParseError.fromLineAndPosition(this.line, column, `Invalid number format: ${this.text.slice(start, this.pos)}`);
      }
      while (isDigit(this.current())) {
        exponent += this.current();
        this.pos++;
      }
    }
    if (/[!#%]/.test(this.current())) {
      this.pos++;
    }
    if (mantissa.endsWith('.')) {
      mantissa = mantissa.slice(0, -1) || '0';
    }
    const number = parseFloat(exponent ? `${mantissa}e${exponent}` : mantissa);
    this.push(TokenType.NUMBER, this.text.slice(start, this.pos), column, {number});
  }

  private readRadixNumber() {
    const column = this.pos + 1;
    const start = this.pos;
    this.pos++;
    let radix = 8;
    let digits = /[0-7]/;
    if (/[hH]/.test(this.current())) {
      radix = 16;
      digits = /[0-9a-fA-F]/;
      this.pos++;
    } else if (/[oO]/.test(this.current())) {
      this.pos++;
    }
    const digitsStart = this.pos;
    while (digits.test(this.current())) {
      this.pos++;
    }
    const text = this.text.slice(digitsStart, this.pos);
    const number = text ? parseInt(text, radix) : 0;
    this.push(TokenType.NUMBER, this.text.slice(start, this.pos), column, {number});
  }

  private readString() {
    const column = this.pos + 1;
    const end = this.text.indexOf('"', this.pos + 1);
    if (end < 0) {
      throw ParseError.fromLineAndPosition(this.line, column, "Unterminated string");
    }
    this.push(TokenType.STRING, this.text.slice(this.pos + 1, end), column);
    this.pos = end + 1;
  }

  private readIdentifier() {
    const column = this.pos + 1;
    const start = this.pos;
    this.pos++;
    while (isLetter(this.current()) || isDigit(this.current()) || this.current() === '.') {
      this.pos++;
    }
    if (/[$%!#]/.test(this.current())) {
      this.pos++;
    }
    let original = this.text.slice(start, this.pos);
    let name = original.toLowerCase();
    if (name.endsWith('#') && FILE_STATEMENTS.has(name.slice(0, -1))) {
      // Leave the # to be read as a separate token.
      this.pos--;
      original = original.slice(0, -1);
      name = name.slice(0, -1);
    }
    if (name === 'rem' || name === 'remark') {
      this.push(TokenType.REM, this.text.slice(this.pos), column);
      this.pos = this.text.length;
      return;
    }
    if (name === 'data') {
      this.push(TokenType.KEYWORD, name, column);
      this.readData();
      return;
    }
    if (FUNCTION_NAMES.has(name)) {
      this.push(TokenType.FUNCTION, name, column, {original});
    } else if (STATEMENT_KEYWORDS.has(name) || OPERATOR_KEYWORDS.has(name)) {
      this.push(TokenType.KEYWORD, name, column, {original});
    } else {
      this.push(TokenType.IDENTIFIER, name, column, {original});
    }
  }

  // DATA runs to the end of the line or to a colon outside quotes.
  private readData() {
    const column = this.pos + 1;
    let end = this.pos;
    let quoted = false;
    while (end < this.text.length && (quoted || this.text[end] !== ':')) {
      if (this.text[end] === '"') {
        quoted = !quoted;
      }
      end++;
    }
    this.push(TokenType.DATA, this.text.slice(this.pos, end), column);
    this.pos = end;
  }
}

export function tokenizeLine(text: string, line: number = 1): Token[] {
  return new Lexer(text, line).tokenize();
}

function normalizeOperator(op: string): string {
  switch (op) {
    case '><': return '<>';
    case '=<': return '<=';
    case '=>': return '>=';
  }
  return op;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9' && ch.length === 1;
}

function isLetter(ch: string): boolean {
  return /^[A-Za-z]$/.test(ch);
}
