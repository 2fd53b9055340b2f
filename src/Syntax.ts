import type { DefTypeMap } from "./Types.ts";
import type { Value } from "./Values.ts";

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '\\' | '^' | '&'
  | 'mod'
  | '=' | '<>' | '<' | '>' | '<=' | '>='
  | 'and' | 'or' | 'xor' | 'eqv' | 'imp';

export type UnaryOperator = '-' | '+' | 'not';

export interface NumberExpr {
  kind: 'number';
  value: number;
}

export interface StringExpr {
  kind: 'string';
  value: string;
}

// Names are lowercase and carry their resolved type suffix.
export interface VariableExpr {
  kind: 'variable';
  name: string;
}

export interface ArrayExpr {
  kind: 'array';
  name: string;
  indices: Expr[];
}

export interface UnaryExpr {
  kind: 'unary';
  op: UnaryOperator;
  operand: Expr;
}

export interface BinaryExpr {
  kind: 'binary';
  op: BinaryOperator;
  left: Expr;
  right: Expr;
}

export interface BuiltinCallExpr {
  kind: 'builtin';
  name: string;
  args: Expr[];
}

// Calls to DEF FN functions.
export interface FnCallExpr {
  kind: 'fn';
  name: string;
  args: Expr[];
}

export type Expr =
  | NumberExpr
  | StringExpr
  | VariableExpr
  | ArrayExpr
  | UnaryExpr
  | BinaryExpr
  | BuiltinCallExpr
  | FnCallExpr;

export type LValue =
  | VariableExpr
  | ArrayExpr;

// ';' and ',' are explicit separators, ' ' separates juxtaposed items and ''
// ends the list with a newline.
export type PrintSeparator = ';' | ',' | ' ' | '';

export interface PrintItem {
  expr: Expr;
  separator: PrintSeparator;
}

export type Statement =
  | {kind: 'rem'}
  | {kind: 'print', fileNumber?: Expr, items: PrintItem[]}
  | {kind: 'printUsing', fileNumber?: Expr, format: Expr, exprs: Expr[], newline: boolean}
  | {kind: 'write', fileNumber?: Expr, exprs: Expr[]}
  | {kind: 'input', fileNumber?: Expr, prompt?: string, questionMark: boolean, targets: LValue[]}
  | {kind: 'lineInput', fileNumber?: Expr, prompt?: string, target: LValue}
  | {kind: 'let', target: LValue, value: Expr}
  | {kind: 'if', condition: Expr, thenLine?: number, thenStatements?: Statement[], elseLine?: number, elseStatements?: Statement[]}
  | {kind: 'goto', line: number}
  | {kind: 'gosub', line: number}
  | {kind: 'return', line?: number}
  | {kind: 'on', selector: Expr, lines: number[], gosub: boolean}
  | {kind: 'for', variable: string, start: Expr, end: Expr, step?: Expr}
  | {kind: 'next', variables: string[]}
  | {kind: 'while', condition: Expr}
  | {kind: 'wend'}
  | {kind: 'end'}
  | {kind: 'stop'}
  | {kind: 'data', values: Value[]}
  | {kind: 'read', targets: LValue[]}
  | {kind: 'restore', line?: number}
  | {kind: 'dim', arrays: {name: string, bounds: Expr[]}[]}
  | {kind: 'erase', names: string[]}
  | {kind: 'optionBase', base: number}
  | {kind: 'defFn', name: string, params: string[], body: Expr}
  | {kind: 'defType'}
  | {kind: 'onError', line: number, gosub: boolean}
  | {kind: 'resume', next: boolean, line?: number}
  | {kind: 'error', code: Expr}
  | {kind: 'swap', first: LValue, second: LValue}
  | {kind: 'clear'}
  | {kind: 'cls'}
  | {kind: 'randomize', seed?: Expr}
  | {kind: 'tron'}
  | {kind: 'troff'}
  | {kind: 'width', width: Expr}
  | {kind: 'noop', args: Expr[]}
  | {kind: 'open', mode: Expr, fileNumber: Expr, fileName: Expr, recordLength?: Expr}
  | {kind: 'close', fileNumbers: Expr[]}
  | {kind: 'field', fileNumber: Expr, fields: {width: Expr, target: VariableExpr}[]}
  | {kind: 'get', fileNumber: Expr, record?: Expr}
  | {kind: 'put', fileNumber: Expr, record?: Expr}
  | {kind: 'lset', target: LValue, value: Expr}
  | {kind: 'rset', target: LValue, value: Expr}
  | {kind: 'midAssign', target: LValue, start: Expr, length?: Expr, value: Expr}
  | {kind: 'chain', fileName: Expr, line?: Expr, all: boolean, merge: boolean, deleteRange?: [number, number]}
  | {kind: 'common', names: string[]}
  | {kind: 'kill', fileName: Expr}
  | {kind: 'name', from: Expr, to: Expr}
  | {kind: 'merge', fileName: Expr}
  | {kind: 'run', fileName?: Expr, line?: number, keepFiles: boolean};

export type StatementKind = Statement['kind'];

export interface Line {
  number: number;
  statements: Statement[];
  text: string;
}

export interface Program {
  lines: Line[];
  defTypes: DefTypeMap;
}

export type StatementOf<K extends StatementKind> = Extract<Statement, {kind: K}>;
