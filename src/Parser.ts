import { ParseError } from "./Errors.ts";
import { MAX_LINE_NUMBER, Token, TokenType, tokenizeLine } from "./Lexer.ts";
import { ArrayExpr, BinaryOperator, Expr, LValue, Line, PrintItem, PrintSeparator, Program, Statement, VariableExpr } from "./Syntax.ts";
import { DefTypeMap, TypeTag, normalizeName } from "./Types.ts";
import { double, string, Value } from "./Values.ts";

const DEF_TYPES: Map<string, TypeTag> = new Map([
  ['defint', TypeTag.INTEGER],
  ['defsng', TypeTag.SINGLE],
  ['defdbl', TypeTag.DOUBLE],
  ['defstr', TypeTag.STRING],
]);

const OPEN_MODES: Map<string, string> = new Map([
  ['input', 'I'],
  ['output', 'O'],
  ['append', 'A'],
  ['random', 'R'],
]);

const COMPARISON_OPERATORS = new Set(['=', '<>', '<', '>', '<=', '>=']);

// Parses a whole program.  Every non-blank line must start with a line
// number; later lines replace earlier ones with the same number.
export function parseProgram(text: string): Program {
  const tokenizedLines: {tokens: Token[], text: string}[] = [];
  const sourceLines = text.split(/\r?\n/);
  for (let i = 0; i < sourceLines.length; i++) {
    const source = sourceLines[i].replace(/\s+$/, '');
    if (source.trim() === '') {
      continue;
    }
    const tokens = tokenizeLine(source, i + 1);
    if (tokens[0].type !== TokenType.LINE_NUMBER) {
      throw ParseError.fromLineAndPosition(i + 1, tokens[0].column, "Expected line number");
    }
    tokenizedLines.push({tokens, text: source.trim()});
  }
  const defTypes = collectDefTypes(tokenizedLines.map((line) => line.tokens));
  const lines = new Map<number, Line>();
  for (const {tokens, text} of tokenizedLines) {
    const line = new Parser(tokens, defTypes).parseLine(text);
    lines.set(line.number, line);
  }
  return {
    lines: [...lines.values()].sort((a, b) => a.number - b.number),
    defTypes,
  };
}

// Parses statements typed without a line number, for direct mode.
export function parseDirectStatements(text: string, defTypes: DefTypeMap): Statement[] {
  const tokens = tokenizeLine(text);
  return new Parser(tokens, defTypes).parseStatements();
}

// DEFtype statements apply to the whole program regardless of where they
// appear, so they are collected before any names are resolved.
export function collectDefTypes(lines: Token[][], defTypes: DefTypeMap = new Map()): DefTypeMap {
  for (const tokens of lines) {
    for (let i = 0; i < tokens.length; i++) {
      const type = tokens[i].type === TokenType.KEYWORD ? DEF_TYPES.get(tokens[i].text) : undefined;
      if (type === undefined) {
        continue;
      }
      for (const [from, to] of parseLetterRanges(tokens, i + 1)) {
        for (let code = from.charCodeAt(0); code <= to.charCodeAt(0); code++) {
          defTypes.set(String.fromCharCode(code), type);
        }
      }
    }
  }
  return defTypes;
}

function parseLetterRanges(tokens: Token[], pos: number): [string, string][] {
  const ranges: [string, string][] = [];
  while (tokens[pos]?.type === TokenType.IDENTIFIER) {
    const from = tokens[pos].text.charAt(0);
    let to = from;
    pos++;
    if (tokens[pos]?.text === '-' && tokens[pos + 1]?.type === TokenType.IDENTIFIER) {
      to = tokens[pos + 1].text.charAt(0);
      pos += 2;
    }
    ranges.push([from, to]);
    if (tokens[pos]?.text !== ',') {
      break;
    }
    pos++;
  }
  return ranges;
}

export class Parser {
  private pos = 0;

  constructor(private tokens: Token[], private defTypes: DefTypeMap) {
  }

  parseLine(text: string): Line {
    const lineToken = this.advance();
    const number = lineToken.number ?? 0;
    if (lineToken.type !== TokenType.LINE_NUMBER || number > MAX_LINE_NUMBER) {
      throw this.error("Expected line number", lineToken);
    }
    const statements = this.parseStatements();
    return {number, statements, text};
  }

  parseStatements(): Statement[] {
    const statements: Statement[] = [];
    do {
      while (this.matchOperator(':')) {
      }
      if (this.atEnd()) {
        break;
      }
      statements.push(this.parseStatement());
    } while (this.matchOperator(':'));
    if (this.current().type === TokenType.REM) {
      this.advance();
      if (statements.length === 0) {
        statements.push({kind: 'rem'});
      }
    }
    if (!this.atEnd()) {
      throw this.error("Expected end of line");
    }
    return statements;
  }

  private current(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private peek(offset = 1): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.current();
    if (this.pos < this.tokens.length - 1) {
      this.pos++;
    }
    return token;
  }

  private atEnd(): boolean {
    return this.current().type === TokenType.EOL;
  }

  private isOperator(op: string, token = this.current()): boolean {
    return token.type === TokenType.OPERATOR && token.text === op;
  }

  private isKeyword(name: string, token = this.current()): boolean {
    return token.type === TokenType.KEYWORD && token.text === name;
  }

  private matchOperator(op: string): boolean {
    if (this.isOperator(op)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchKeyword(name: string): boolean {
    if (this.isKeyword(name)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expectOperator(op: string, message: string) {
    if (!this.matchOperator(op)) {
      throw this.error(message);
    }
  }

  private expectKeyword(name: string, message: string) {
    if (!this.matchKeyword(name)) {
      throw this.error(message);
    }
  }

  private error(message: string, token = this.current()): ParseError {
    return ParseError.fromLineAndPosition(token.line, token.column, message, Math.max(1, token.text.length));
  }

  private parseLineNumber(): number {
    const token = this.current();
    if (token.type !== TokenType.NUMBER || token.number === undefined || !Number.isInteger(token.number)) {
      throw this.error("Expected line number");
    }
    this.advance();
    return token.number;
  }

  private isStatementEnd(): boolean {
    return this.atEnd() || this.isOperator(':') || this.isKeyword('else') || this.current().type === TokenType.REM;
  }

  private parseStatement(): Statement {
    const token = this.current();
    if (this.matchOperator('?')) {
      return this.parsePrint();
    }
    if (token.type === TokenType.IDENTIFIER) {
      return this.parseLet();
    }
    if (token.type === TokenType.FUNCTION && token.text === 'mid$') {
      return this.parseMidAssign();
    }
    if (token.type !== TokenType.KEYWORD) {
      throw this.error(`Unexpected token '${token.text}'`);
    }
    this.advance();
    switch (token.text) {
      case 'print':
      case 'lprint':
        return this.parsePrint();
      case 'input': return this.parseInput();
      case 'line':
        this.expectKeyword('input', "Expected INPUT after LINE");
        return this.parseLineInput();
      case 'let': return this.parseLet();
      case 'if': return this.parseIf();
      case 'for': return this.parseFor();
      case 'next': return this.parseNext();
      case 'while': return {kind: 'while', condition: this.parseExpression()};
      case 'wend': return {kind: 'wend'};
      case 'goto': return {kind: 'goto', line: this.parseLineNumber()};
      case 'gosub': return {kind: 'gosub', line: this.parseLineNumber()};
      case 'return':
        return this.current().type === TokenType.NUMBER ?
          {kind: 'return', line: this.parseLineNumber()} :
          {kind: 'return'};
      case 'on': return this.parseOn();
      case 'data': return this.parseData();
      case 'read': return {kind: 'read', targets: this.parseLValueList()};
      case 'restore':
        return this.current().type === TokenType.NUMBER ?
          {kind: 'restore', line: this.parseLineNumber()} :
          {kind: 'restore'};
      case 'dim': return this.parseDim();
      case 'def': return this.parseDefFn();
      case 'defint':
      case 'defsng':
      case 'defdbl':
      case 'defstr':
        this.skipLetterRanges();
        return {kind: 'defType'};
      case 'end':
      case 'system':
        return {kind: 'end'};
      case 'stop': return {kind: 'stop'};
      case 'cls': return {kind: 'cls'};
      case 'swap': {
        const first = this.parseLValue();
        this.expectOperator(',', "Expected ',' in SWAP");
        return {kind: 'swap', first, second: this.parseLValue()};
      }
      case 'erase': return this.parseErase();
      case 'clear':
        // CLEAR ,n memory arguments are accepted and ignored.
        while (!this.isStatementEnd()) {
          this.advance();
        }
        return {kind: 'clear'};
      case 'option': return this.parseOptionBase();
      case 'randomize':
        return this.isStatementEnd() ?
          {kind: 'randomize'} :
          {kind: 'randomize', seed: this.parseExpression()};
      case 'tron': return {kind: 'tron'};
      case 'troff': return {kind: 'troff'};
      case 'width': return {kind: 'width', width: this.parseExpression()};
      case 'poke':
      case 'out':
      case 'wait':
        return {kind: 'noop', args: this.parseExpressionList()};
      case 'call': return this.parseCall();
      case 'error': return {kind: 'error', code: this.parseExpression()};
      case 'resume': return this.parseResume();
      case 'open': return this.parseOpen();
      case 'close': return this.parseClose();
      case 'reset': return {kind: 'close', fileNumbers: []};
      case 'field': return this.parseField();
      case 'get': return this.parseRecordAccess('get');
      case 'put': return this.parseRecordAccess('put');
      case 'lset': return this.parseJustifiedSet('lset');
      case 'rset': return this.parseJustifiedSet('rset');
      case 'write': return this.parseWrite();
      case 'chain': return this.parseChain();
      case 'common': return {kind: 'common', names: this.parseNameList()};
      case 'kill': return {kind: 'kill', fileName: this.parseExpression()};
      case 'name': {
        const from = this.parseExpression();
        this.expectKeyword('as', "Expected AS in NAME");
        return {kind: 'name', from, to: this.parseExpression()};
      }
      case 'merge': return {kind: 'merge', fileName: this.parseExpression()};
      case 'run': return this.parseRun();
    }
    throw this.error(`Unexpected token '${token.text}'`, token);
  }

  private parseFileNumber(): Expr | undefined {
    if (this.matchOperator('#')) {
      const fileNumber = this.parseExpression();
      this.expectOperator(',', "Expected ',' after file number");
      return fileNumber;
    }
  }

  private parsePrint(): Statement {
    const fileNumber = this.parseFileNumber();
    if (this.matchKeyword('using')) {
      const format = this.parseExpression();
      this.expectOperator(';', "Expected ';' after format string");
      const exprs: Expr[] = [];
      let newline = true;
      while (this.isExpressionStart()) {
        exprs.push(this.parseExpression());
        newline = !(this.matchOperator(';') || this.matchOperator(','));
        if (newline) {
          break;
        }
      }
      return {kind: 'printUsing', fileNumber, format, exprs, newline};
    }
    const items: PrintItem[] = [];
    const empty = (): Expr => ({kind: 'string', value: ''});
    const matchSeparator = (): PrintSeparator | undefined => {
      if (this.matchOperator(';')) {
        return ';';
      }
      if (this.matchOperator(',')) {
        return ',';
      }
    };
    let separator = matchSeparator();
    while (separator) {
      items.push({expr: empty(), separator});
      separator = matchSeparator();
    }
    while (this.isExpressionStart()) {
      const expr = this.parseExpression();
      separator = matchSeparator();
      if (separator) {
        items.push({expr, separator});
        let repeated = this.isOperator(separator) ? matchSeparator() : undefined;
        while (repeated) {
          items.push({expr: empty(), separator: repeated});
          repeated = this.isOperator(repeated) ? matchSeparator() : undefined;
        }
      } else if (this.isExpressionStart()) {
        items.push({expr, separator: ' '});
      } else {
        items.push({expr, separator: ''});
        break;
      }
    }
    return {kind: 'print', fileNumber, items};
  }

  private parseInput(): Statement {
    let questionMark = !this.matchOperator(';');
    const fileNumber = this.parseFileNumber();
    let prompt: string | undefined;
    if (this.current().type === TokenType.STRING) {
      prompt = this.advance().text;
      if (this.matchOperator(',')) {
        questionMark = false;
      } else {
        this.expectOperator(';', "Expected ';' after prompt");
      }
    }
    return {kind: 'input', fileNumber, prompt, questionMark, targets: this.parseLValueList()};
  }

  private parseLineInput(): Statement {
    this.matchOperator(';');
    const fileNumber = this.parseFileNumber();
    let prompt: string | undefined;
    if (this.current().type === TokenType.STRING) {
      prompt = this.advance().text;
      if (!this.matchOperator(';')) {
        this.matchOperator(',');
      }
    }
    return {kind: 'lineInput', fileNumber, prompt, target: this.parseLValue()};
  }

  private parseLet(): Statement {
    const target = this.parseLValue();
    this.expectOperator('=', "Expected '=' in assignment");
    return {kind: 'let', target, value: this.parseExpression()};
  }

  private parseMidAssign(): Statement {
    this.advance();
    this.expectOperator('(', "Expected '(' after MID$");
    const target = this.parseLValue();
    this.expectOperator(',', "Expected ',' after variable");
    const start = this.parseExpression();
    const length = this.matchOperator(',') ? this.parseExpression() : undefined;
    this.expectOperator(')', "Expected ')' after MID$ arguments");
    this.expectOperator('=', "Expected '=' for MID$ assignment");
    return {kind: 'midAssign', target, start, length, value: this.parseExpression()};
  }

  private parseBranch(): {line?: number, statements?: Statement[]} {
    if (this.current().type === TokenType.NUMBER) {
      return {line: this.parseLineNumber()};
    }
    const statements: Statement[] = [];
    while (!this.atEnd() && !this.isKeyword('else') && this.current().type !== TokenType.REM) {
      statements.push(this.parseStatement());
      if (!this.matchOperator(':')) {
        break;
      }
    }
    return {statements};
  }

  private parseIf(): Statement {
    const condition = this.parseExpression();
    let thenBranch: {line?: number, statements?: Statement[]};
    if (this.matchKeyword('goto')) {
      thenBranch = {line: this.parseLineNumber()};
    } else {
      this.expectKeyword('then', "Expected THEN or GOTO after IF condition");
      thenBranch = this.parseBranch();
    }
    if (thenBranch.line !== undefined && this.isOperator(':') && this.isKeyword('else', this.peek())) {
      this.advance();
    }
    let elseBranch: {line?: number, statements?: Statement[]} = {};
    if (this.matchKeyword('else')) {
      elseBranch = this.parseBranch();
    }
    return {
      kind: 'if',
      condition,
      thenLine: thenBranch.line,
      thenStatements: thenBranch.statements,
      elseLine: elseBranch.line,
      elseStatements: elseBranch.statements,
    };
  }

  private parseFor(): Statement {
    const variable = this.parseVariable().name;
    this.expectOperator('=', "Expected '=' in FOR");
    const start = this.parseExpression();
    this.expectKeyword('to', "Expected TO in FOR");
    const end = this.parseExpression();
    const step = this.matchKeyword('step') ? this.parseExpression() : undefined;
    return {kind: 'for', variable, start, end, step};
  }

  private parseNext(): Statement {
    const variables: string[] = [];
    if (this.current().type === TokenType.IDENTIFIER) {
      variables.push(...this.parseNameList());
    }
    return {kind: 'next', variables};
  }

  private parseOn(): Statement {
    if (this.matchKeyword('error')) {
      const gosub = this.matchKeyword('gosub');
      if (!gosub) {
        this.expectKeyword('goto', "Expected GOTO or GOSUB after ON ERROR");
      }
      return {kind: 'onError', line: this.parseLineNumber(), gosub};
    }
    const selector = this.parseExpression();
    const gosub = this.matchKeyword('gosub');
    if (!gosub) {
      this.expectKeyword('goto', "Expected GOTO or GOSUB after ON expression");
    }
    const lines: number[] = [];
    do {
      lines.push(this.parseLineNumber());
    } while (this.matchOperator(','));
    return {kind: 'on', selector, lines, gosub};
  }

  private parseData(): Statement {
    const token = this.current();
    if (token.type !== TokenType.DATA) {
      return {kind: 'data', values: []};
    }
    this.advance();
    return {kind: 'data', values: parseDataItems(token.text)};
  }

  private parseDim(): Statement {
    const arrays: {name: string, bounds: Expr[]}[] = [];
    do {
      const name = this.parseName();
      this.expectOperator('(', "Expected '(' in DIM");
      const bounds = this.parseExpressionList();
      this.expectOperator(')', "Expected ')' in DIM");
      arrays.push({name, bounds});
    } while (this.matchOperator(','));
    return {kind: 'dim', arrays};
  }

  private parseDefFn(): Statement {
    let name: string;
    if (this.matchKeyword('fn')) {
      name = this.functionName('fn' + this.expectIdentifier().text);
    } else if (this.current().type === TokenType.IDENTIFIER && this.current().text.startsWith('fn')) {
      name = this.functionName(this.advance().text);
    } else {
      throw this.error("Expected FN after DEF");
    }
    const params: string[] = [];
    if (this.matchOperator('(')) {
      if (!this.isOperator(')')) {
        params.push(...this.parseNameList());
      }
      this.expectOperator(')', "Expected ')' after parameters");
    }
    this.expectOperator('=', "Expected '=' in DEF FN");
    return {kind: 'defFn', name, params, body: this.parseExpression()};
  }

  private skipLetterRanges() {
    const ranges = parseLetterRanges(this.tokens, this.pos);
    if (ranges.length === 0) {
      throw this.error("Expected letter or letter range");
    }
    while (this.current().type === TokenType.IDENTIFIER || this.isOperator('-') || this.isOperator(',')) {
      this.advance();
    }
  }

  private parseErase(): Statement {
    return {kind: 'erase', names: this.parseNameList()};
  }

  private parseOptionBase(): Statement {
    this.expectKeyword('base', "Expected BASE after OPTION");
    const token = this.current();
    if (token.type !== TokenType.NUMBER || (token.number !== 0 && token.number !== 1)) {
      throw this.error("Expected 0 or 1 after OPTION BASE");
    }
    this.advance();
    return {kind: 'optionBase', base: token.number};
  }

  private parseCall(): Statement {
    const args: Expr[] = [];
    if (this.current().type === TokenType.IDENTIFIER) {
      this.advance();
    } else {
      args.push(this.parseExpression());
    }
    if (this.matchOperator('(')) {
      args.push(...this.parseExpressionList());
      this.expectOperator(')', "Expected ')' after CALL arguments");
    }
    return {kind: 'noop', args};
  }

  private parseResume(): Statement {
    if (this.matchKeyword('next')) {
      return {kind: 'resume', next: true};
    }
    if (this.current().type === TokenType.NUMBER) {
      const line = this.parseLineNumber();
      // RESUME 0 retries the faulting statement.
      return line === 0 ? {kind: 'resume', next: false} : {kind: 'resume', next: false, line};
    }
    return {kind: 'resume', next: false};
  }

  private parseOpen(): Statement {
    const first = this.parseExpression();
    if (this.matchOperator(',')) {
      this.matchOperator('#');
      const fileNumber = this.parseExpression();
      this.expectOperator(',', "Expected ',' before filename");
      const fileName = this.parseExpression();
      const recordLength = this.matchOperator(',') ? this.parseExpression() : undefined;
      return {kind: 'open', mode: first, fileNumber, fileName, recordLength};
    }
    this.expectKeyword('for', "Expected ',' or FOR in OPEN statement");
    const modeToken = this.advance();
    const mode = OPEN_MODES.get(modeToken.text);
    if (!mode) {
      throw this.error("Expected INPUT, OUTPUT, APPEND, or RANDOM", modeToken);
    }
    this.expectKeyword('as', "Expected AS in OPEN");
    this.matchOperator('#');
    const fileNumber = this.parseExpression();
    let recordLength: Expr | undefined;
    if (this.current().type === TokenType.FUNCTION && this.current().text === 'len') {
      this.advance();
      this.expectOperator('=', "Expected '=' after LEN");
      recordLength = this.parseExpression();
    }
    return {kind: 'open', mode: {kind: 'string', value: mode}, fileNumber, fileName: first, recordLength};
  }

  private parseClose(): Statement {
    const fileNumbers: Expr[] = [];
    while (!this.isStatementEnd()) {
      this.matchOperator('#');
      fileNumbers.push(this.parseExpression());
      if (!this.matchOperator(',')) {
        break;
      }
    }
    return {kind: 'close', fileNumbers};
  }

  private parseField(): Statement {
    this.matchOperator('#');
    const fileNumber = this.parseExpression();
    const fields: {width: Expr, target: VariableExpr}[] = [];
    while (this.matchOperator(',')) {
      const width = this.parseExpression();
      this.expectKeyword('as', "Expected AS in FIELD");
      fields.push({width, target: this.parseVariable()});
    }
    return {kind: 'field', fileNumber, fields};
  }

  private parseRecordAccess(kind: 'get' | 'put'): Statement {
    this.matchOperator('#');
    const fileNumber = this.parseExpression();
    const record = this.matchOperator(',') ? this.parseExpression() : undefined;
    return {kind, fileNumber, record};
  }

  private parseJustifiedSet(kind: 'lset' | 'rset'): Statement {
    const target = this.parseLValue();
    this.expectOperator('=', `Expected '=' in ${kind.toUpperCase()}`);
    return {kind, target, value: this.parseExpression()};
  }

  private parseWrite(): Statement {
    const fileNumber = this.parseFileNumber();
    const exprs: Expr[] = [];
    while (this.isExpressionStart()) {
      exprs.push(this.parseExpression());
      if (!this.matchOperator(',') && !this.matchOperator(';')) {
        break;
      }
    }
    return {kind: 'write', fileNumber, exprs};
  }

  private parseChain(): Statement {
    const merge = this.matchKeyword('merge');
    const fileName = this.parseExpression();
    let line: Expr | undefined;
    let all = false;
    let deleteRange: [number, number] | undefined;
    if (this.matchOperator(',')) {
      if (this.isExpressionStart()) {
        line = this.parseExpression();
      }
      while (this.matchOperator(',')) {
        if (this.matchKeyword('all')) {
          all = true;
        } else if (this.matchKeyword('delete')) {
          const from = this.parseLineNumber();
          this.expectOperator('-', "Expected '-' in DELETE range");
          deleteRange = [from, this.parseLineNumber()];
        } else {
          throw this.error("Expected ALL or DELETE");
        }
      }
    }
    return {kind: 'chain', fileName, line, all, merge, deleteRange};
  }

  private parseRun(): Statement {
    if (this.current().type === TokenType.NUMBER) {
      return {kind: 'run', line: this.parseLineNumber(), keepFiles: false};
    }
    if (this.isStatementEnd()) {
      return {kind: 'run', keepFiles: false};
    }
    const fileName = this.parseExpression();
    if (this.matchOperator(',')) {
      if (this.current().type === TokenType.IDENTIFIER && this.current().text === 'r') {
        this.advance();
        return {kind: 'run', fileName, keepFiles: true};
      }
      return {kind: 'run', fileName, line: this.parseLineNumber(), keepFiles: false};
    }
    return {kind: 'run', fileName, keepFiles: false};
  }

  private parseName(): string {
    const token = this.current();
    if (token.type !== TokenType.IDENTIFIER) {
      throw this.error("Expected variable name");
    }
    this.advance();
    return normalizeName(token.text, this.defTypes);
  }

  private expectIdentifier(): Token {
    if (this.current().type !== TokenType.IDENTIFIER) {
      throw this.error("Expected function name after FN");
    }
    return this.advance();
  }

  // The type of FNname follows the name after FN.
  private functionName(text: string): string {
    return 'fn' + normalizeName(text.slice(2), this.defTypes);
  }

  private parseNameList(): string[] {
    const names: string[] = [];
    do {
      names.push(this.parseName());
      // COMMON A() names a whole array.
      if (this.isOperator('(') && this.isOperator(')', this.peek())) {
        this.advance();
        this.advance();
      }
    } while (this.matchOperator(','));
    return names;
  }

  private parseVariable(): VariableExpr {
    return {kind: 'variable', name: this.parseName()};
  }

  private parseLValue(): LValue {
    const name = this.parseName();
    if (this.matchOperator('(')) {
      const indices = this.parseExpressionList();
      this.expectOperator(')', "Expected ')'");
      const array: ArrayExpr = {kind: 'array', name, indices};
      return array;
    }
    return {kind: 'variable', name};
  }

  private parseLValueList(): LValue[] {
    const targets: LValue[] = [];
    do {
      targets.push(this.parseLValue());
    } while (this.matchOperator(','));
    return targets;
  }

  private parseExpressionList(): Expr[] {
    const exprs: Expr[] = [];
    do {
      exprs.push(this.parseExpression());
    } while (this.matchOperator(','));
    return exprs;
  }

  private isExpressionStart(): boolean {
    const token = this.current();
    switch (token.type) {
      case TokenType.NUMBER:
      case TokenType.STRING:
      case TokenType.IDENTIFIER:
      case TokenType.FUNCTION:
        return true;
      case TokenType.OPERATOR:
        return token.text === '(' || token.text === '-' || token.text === '+';
      case TokenType.KEYWORD:
        return ['not', 'err', 'erl', 'fn'].includes(token.text);
    }
    return false;
  }

  // Precedence from lowest to highest: IMP, EQV, XOR, OR, AND, NOT,
  // comparisons, + -, MOD, \, * /, unary + -, ^.
  parseExpression(): Expr {
    return this.parseBinary(0);
  }

  private static readonly LEVELS: {ops: string[], keyword: boolean}[] = [
    {ops: ['imp'], keyword: true},
    {ops: ['eqv'], keyword: true},
    {ops: ['xor'], keyword: true},
    {ops: ['or'], keyword: true},
    {ops: ['and'], keyword: true},
  ];

  private parseBinary(level: number): Expr {
    if (level >= Parser.LEVELS.length) {
      return this.parseNot();
    }
    let left = this.parseBinary(level + 1);
    const {ops} = Parser.LEVELS[level];
    while (this.current().type === TokenType.KEYWORD && ops.includes(this.current().text)) {
      const op = this.advance().text;
      const right = this.parseBinary(level + 1);
      left = binary(op, left, right);
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.matchKeyword('not')) {
      return {kind: 'unary', op: 'not', operand: this.parseNot()};
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    let left = this.parseAdditive();
    while (this.current().type === TokenType.OPERATOR && COMPARISON_OPERATORS.has(this.current().text)) {
      const op = this.advance().text;
      left = binary(op, left, this.parseAdditive());
    }
    return left;
  }

  private parseAdditive(): Expr {
    let left = this.parseMod();
    while (this.isOperator('+') || this.isOperator('-') || this.isOperator('&')) {
      const op = this.advance().text;
      left = binary(op, left, this.parseMod());
    }
    return left;
  }

  private parseMod(): Expr {
    let left = this.parseIntegerDivision();
    while (this.matchKeyword('mod')) {
      left = binary('mod', left, this.parseIntegerDivision());
    }
    return left;
  }

  private parseIntegerDivision(): Expr {
    let left = this.parseMultiplicative();
    while (this.matchOperator('\\')) {
      left = binary('\\', left, this.parseMultiplicative());
    }
    return left;
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    while (this.isOperator('*') || this.isOperator('/')) {
      const op = this.advance().text;
      left = binary(op, left, this.parseUnary());
    }
    return left;
  }

  // Unary minus binds looser than ^, so -2^2 is -4.
  private parseUnary(): Expr {
    if (this.matchOperator('-')) {
      return {kind: 'unary', op: '-', operand: this.parseUnary()};
    }
    if (this.matchOperator('+')) {
      return this.parseUnary();
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const left = this.parsePrimary();
    if (this.matchOperator('^')) {
      return binary('^', left, this.parsePowerOperand());
    }
    return left;
  }

  private parsePowerOperand(): Expr {
    if (this.matchOperator('-')) {
      return {kind: 'unary', op: '-', operand: this.parsePowerOperand()};
    }
    return this.parsePower();
  }

  private parseArguments(): Expr[] {
    if (!this.matchOperator('(')) {
      return [];
    }
    if (this.matchOperator(')')) {
      return [];
    }
    const args = this.parseExpressionList();
    this.expectOperator(')', "Expected ')' after function arguments");
    return args;
  }

  private parsePrimary(): Expr {
    const token = this.current();
    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return {kind: 'number', value: token.number ?? 0};
      case TokenType.STRING:
        this.advance();
        return {kind: 'string', value: token.text};
      case TokenType.FUNCTION:
        this.advance();
        return {kind: 'builtin', name: token.text, args: this.parseArguments()};
      case TokenType.IDENTIFIER: {
        if (token.text.startsWith('fn') && token.text.length > 2) {
          this.advance();
          return {kind: 'fn', name: this.functionName(token.text), args: this.parseArguments()};
        }
        return this.parseLValue();
      }
      case TokenType.KEYWORD:
        if (this.matchKeyword('err')) {
          return {kind: 'variable', name: 'err%'};
        }
        if (this.matchKeyword('erl')) {
          return {kind: 'builtin', name: 'erl', args: []};
        }
        if (this.matchKeyword('fn')) {
          const nameToken = this.expectIdentifier();
          return {kind: 'fn', name: this.functionName('fn' + nameToken.text), args: this.parseArguments()};
        }
        break;
      case TokenType.OPERATOR:
        if (this.matchOperator('(')) {
          const expr = this.parseExpression();
          this.expectOperator(')', "Expected ')' after expression");
          return expr;
        }
        break;
    }
    throw this.error("Missing operand");
  }
}

function binary(op: string, left: Expr, right: Expr): Expr {
  return {kind: 'binary', op: toBinaryOperator(op), left, right};
}

function toBinaryOperator(op: string): BinaryOperator {
  switch (op) {
    case '+': case '-': case '*': case '/': case '\\': case '^': case '&':
    case 'mod':
    case '=': case '<>': case '<': case '>': case '<=': case '>=':
    case 'and': case 'or': case 'xor': case 'eqv': case 'imp':
      return op;
  }
  throw new Error(`unknown operator ${op}`);
}

const DATA_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eEdD][+-]?\d+)?[!#%]?$/;

// Splits the raw text of a DATA statement into values.  Unquoted items that
// look like numbers become numbers; anything else is kept as written.
export function parseDataItems(text: string): Value[] {
  const values: Value[] = [];
  let pos = 0;
  while (pos <= text.length) {
    while (text[pos] === ' ' || text[pos] === '\t') {
      pos++;
    }
    if (text[pos] === '"') {
      const end = text.indexOf('"', pos + 1);
      const close = end < 0 ? text.length : end;
      values.push(string(text.slice(pos + 1, close)));
      const comma = text.indexOf(',', close);
      pos = comma < 0 ? text.length + 1 : comma + 1;
      continue;
    }
    const comma = text.indexOf(',', pos);
    const end = comma < 0 ? text.length : comma;
    const item = text.slice(pos, end).trim();
    if (DATA_NUMBER.test(item)) {
      values.push(double(parseFloat(item.replace(/[!#%]$/, '').replace(/[dD]/, 'e'))));
    } else {
      values.push(string(item));
    }
    pos = end + 1;
  }
  return values;
}
