import { ILLEGAL_FUNCTION_CALL, RuntimeError, TYPE_MISMATCH } from "../Errors.ts";
import { evaluate, evaluateInteger, evaluateString } from "../Expressions.ts";
import { tryIo } from "../Files.ts";
import type { Printer } from "../Printer.ts";
import type { Expr, StatementOf } from "../Syntax.ts";
import { TypeTag } from "../Types.ts";
import * as values from "../Values.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { getSequentialWriteAccessor } from "./FileSystem.ts";

function getPrinter(fileNumber: Expr | undefined, context: ExecutionContext): Printer {
  if (fileNumber) {
    return tryIo(() => getSequentialWriteAccessor(fileNumber, context));
  }
  return context.console;
}

export function print(statement: StatementOf<'print'>, context: ExecutionContext) {
  const printer = getPrinter(statement.fileNumber, context);
  tryIo(() => {
    if (statement.items.length === 0) {
      printer.print('', true);
      return;
    }
    for (const {expr, separator} of statement.items) {
      printItem(printer, expr, context);
      if (separator === ',') {
        printer.tab();
      } else if (separator === '') {
        printer.print('', true);
      }
    }
  });
}

// TAB and SPC move the print position instead of producing text.
function printItem(printer: Printer, expr: Expr, context: ExecutionContext) {
  if (expr.kind === 'builtin' && (expr.name === 'tab' || expr.name === 'spc') && expr.args.length === 1) {
    const n = evaluateInteger(expr.args[0], context);
    if (expr.name === 'tab') {
      printer.tab(n);
    } else {
      printer.space(n);
    }
    return;
  }
  printer.print(values.formatValue(evaluate(expr, context)), false);
}

// WRITE quotes strings and separates items with commas.
export function write(statement: StatementOf<'write'>, context: ExecutionContext) {
  const printer = getPrinter(statement.fileNumber, context);
  const items = statement.exprs.map((expr) => {
    const value = evaluate(expr, context);
    return values.isString(value) ? `"${value.string}"` : values.formatValue(value).trim();
  });
  tryIo(() => printer.print(items.join(','), true));
}

// Fields in the format are used once each, in order.  Expressions left over
// when the fields run out are not printed.
export function printUsing(statement: StatementOf<'printUsing'>, context: ExecutionContext) {
  const printer = getPrinter(statement.fileNumber, context);
  const templates = parseFormatString(evaluateString(statement.format, context));
  if (!templates.some((t: Template) => t.type !== TemplateType.LITERAL)) {
    throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
  }
  let templateIndex = 0;
  let output = '';
  const printLiterals = () => {
    while (templateIndex < templates.length) {
      const template = templates[templateIndex];
      if (template.type !== TemplateType.LITERAL) {
        return;
      }
      output += template.text;
      templateIndex++;
    }
  };
  printLiterals();
  for (const expr of statement.exprs) {
    if (templateIndex >= templates.length) {
      break;
    }
    const template = templates[templateIndex++];
    const value = evaluate(expr, context);
    if (template.type === TemplateType.NUMBER && values.isNumeric(value)) {
      const number = value.tag === TypeTag.SINGLE ?
        parseFloat(value.number.toPrecision(7)) : value.number;
      output += formatUsingNumberTemplate(number, template);
    } else if (template.type === TemplateType.STRING && values.isString(value)) {
      output += formatUsingStringTemplate(value.string, template);
    } else {
      throw RuntimeError.fromError(TYPE_MISMATCH);
    }
    printLiterals();
  }
  tryIo(() => printer.print(output, statement.newline));
}

export enum TemplateType {
  STRING,
  NUMBER,
  LITERAL
}

// ! is one character wide, \  \ is as wide as the backslashes and the spaces
// between them, & takes the whole string.
export interface StringTemplate {
  type: TemplateType.STRING;
  length?: number;
}

interface LiteralTemplate {
  type: TemplateType.LITERAL;
  text: string;
}

export interface NumberTemplate {
  type: TemplateType.NUMBER;
  signBefore?: boolean;
  signAfter?: boolean;
  minusAfter?: boolean;
  fillWithAsterisks?: boolean;
  dollarSign?: boolean;
  comma?: boolean;
  decimalPoint?: boolean;
  beforeDecimal?: number;
  afterDecimal?: number;
  // Width of the ^^^^ or ^^^^^ exponent field.
  exponent?: number;
}

export type Template =
  | StringTemplate
  | LiteralTemplate
  | NumberTemplate;

export function parseFormatString(format: string): Template[] {
  return new FormatScanner(format).scan();
}

// Number fields:
//   +? ( (** | **$ | $$) #* ,? #* (. #*)?
//      | #+ ,? #* (. #*)?
//      | . #+ )
//   (^^^^ | ^^^^^)? (+ | -)?
// A trailing sign is only read when there is no leading one.
class FormatScanner {
  private pos = 0;
  private templates: Template[] = [];

  constructor(private format: string) {
  }

  scan(): Template[] {
    while (this.pos < this.format.length) {
      const field = this.numberField() ?? this.stringField();
      if (field) {
        this.templates.push(field);
      } else {
        this.literal();
      }
    }
    return this.templates;
  }

  private at(text: string): boolean {
    return this.format.startsWith(text, this.pos);
  }

  private match(text: string): boolean {
    if (!this.at(text)) {
      return false;
    }
    this.pos += text.length;
    return true;
  }

  private hashes(): number {
    const start = this.pos;
    while (this.format[this.pos] === '#') {
      this.pos++;
    }
    return this.pos - start;
  }

  private numberField(): NumberTemplate | undefined {
    const start = this.pos;
    const field: NumberTemplate = {type: TemplateType.NUMBER};
    if (this.match('+')) {
      field.signBefore = true;
    }
    const prefix = ['**$', '**', '$$'].find((text) => this.at(text));
    if (prefix) {
      this.pos += prefix.length;
      if (prefix.includes('*')) {
        field.fillWithAsterisks = true;
      }
      if (prefix.includes('$')) {
        field.dollarSign = true;
      }
      this.integerDigits(field);
      this.decimals(field, false);
    } else if (this.at('#')) {
      this.integerDigits(field);
      this.decimals(field, false);
    } else if (!this.decimals(field, true)) {
      this.pos = start;
      return undefined;
    }
    if (this.match('^^^^^')) {
      field.exponent = 5;
    } else if (this.match('^^^^')) {
      field.exponent = 4;
    }
    if (!field.signBefore) {
      if (this.match('+')) {
        field.signAfter = true;
      } else if (this.match('-')) {
        field.minusAfter = true;
      }
    }
    return field;
  }

  private integerDigits(field: NumberTemplate) {
    let count = this.hashes();
    if (this.match(',')) {
      field.comma = true;
      count += this.hashes();
    }
    if (count > 0) {
      field.beforeDecimal = count;
    }
  }

  private decimals(field: NumberTemplate, requireDigits: boolean): boolean {
    if (!this.at('.') || (requireDigits && this.format[this.pos + 1] !== '#')) {
      return false;
    }
    this.pos++;
    field.decimalPoint = true;
    field.afterDecimal = this.hashes();
    return true;
  }

  private stringField(): StringTemplate | undefined {
    if (this.match('!')) {
      return {type: TemplateType.STRING, length: 1};
    }
    if (this.match('&')) {
      return {type: TemplateType.STRING};
    }
    const backslashes = /^\\ *\\/.exec(this.format.slice(this.pos));
    if (backslashes) {
      this.pos += backslashes[0].length;
      return {type: TemplateType.STRING, length: backslashes[0].length};
    }
    return undefined;
  }

  // _ takes the next character literally.
  private literal() {
    let text = this.format[this.pos++];
    if (text === '_' && this.pos < this.format.length) {
      text = this.format[this.pos++];
    }
    const last = this.templates[this.templates.length - 1];
    if (last && last.type === TemplateType.LITERAL) {
      last.text += text;
    } else {
      this.templates.push({type: TemplateType.LITERAL, text});
    }
  }
}

interface SignificantDigits {
  digits: string;
  // Power of ten of the first digit.
  exponent: number;
}

function significantDigits(number: number, count: number): SignificantDigits {
  const [mantissa, exponent] = Math.abs(number).toExponential(Math.max(count, 1) - 1).split('e');
  return {digits: mantissa.replace('.', ''), exponent: parseInt(exponent, 10)};
}

// Columns taken by the ** and $ prefixes.
function prefixWidth(template: NumberTemplate): number {
  if (template.fillWithAsterisks) {
    return template.dollarSign ? 3 : 2;
  }
  return template.dollarSign ? 2 : 0;
}

export function formatUsingNumberTemplate(number: number, template: NumberTemplate): string {
  const width = (template.beforeDecimal ?? 0) + prefixWidth(template) +
    (template.comma ? 1 : 0) + (template.signBefore ? 1 : 0);
  const places = template.afterDecimal ?? 0;
  const fill = template.fillWithAsterisks ? '*' : ' ';
  return template.exponent ?
    formatExponential(number, template, width, places, fill) :
    formatFixed(number, template, width, places, fill);
}

// Numbers wider than the field are printed whole with a leading %.
function padField(head: string, room: number, fill: string): string {
  return room < 0 ? '%' + head : fill.repeat(room) + head;
}

function formatFixed(number: number, template: NumberTemplate, width: number, places: number, fill: string): string {
  let head = '';
  if (template.signBefore) {
    head = number < 0 ? '-' : '+';
  } else if (!template.signAfter && !template.minusAfter && number < 0) {
    head = '-';
  }
  if (template.dollarSign) {
    head += '$';
  }
  let room = width - head.length;
  let {digits, exponent} = significantDigits(number, room + places);
  let fraction = '';
  if (exponent < 0) {
    if (places > 0) {
      if (room > 0) {
        head += '0';
        room--;
      }
      fraction = smallFraction(digits, exponent, places);
    } else {
      // With no decimal places the value rounds to 1 or 0.
      const units = Number(digits[0]) >= 5 ? '1' : room > 0 ? '0' : '';
      head += units;
      room -= units.length;
    }
  } else {
    const integerDigits = exponent + 1;
    const rounded = significantDigits(number, integerDigits + places);
    // Keep the first rounding when the second one carries into a new digit.
    if (rounded.exponent === exponent) {
      digits = rounded.digits;
    }
    const integerPart = groupDigits(digits.slice(0, integerDigits), template.comma ? ',' : '');
    head += integerPart;
    room -= integerPart.length;
    fraction = digits.slice(integerDigits, integerDigits + places).padEnd(places, '0');
  }
  let result = padField(head, room, fill) + (template.decimalPoint ? '.' : '') + fraction;
  if (template.signAfter) {
    result += number < 0 ? '-' : '+';
  } else if (template.minusAfter) {
    result += number < 0 ? '-' : ' ';
  }
  return result;
}

// Decimal places of a number below 1: 0.05 in two places is "05".
function smallFraction(digits: string, exponent: number, places: number): string {
  const zeros = -exponent - 1;
  if (zeros > places) {
    return '0'.repeat(places);
  }
  if (zeros === places) {
    return '0'.repeat(places - 1) + (Number(digits[0]) >= 5 ? '1' : '0');
  }
  return '0'.repeat(zeros) + digits.slice(0, places - zeros).padEnd(places - zeros, '0');
}

function groupDigits(digits: string, separator: string): string {
  const groups: string[] = [];
  for (let end = digits.length; end > 0; end -= 3) {
    groups.unshift(digits.slice(Math.max(0, end - 3), end));
  }
  return groups.join(separator);
}

function formatExponential(number: number, template: NumberTemplate, width: number, places: number, fill: string): string {
  const exponentDigits = template.exponent === 4 ? 2 : 3;
  const point = template.decimalPoint ? '.' : '';
  if (number === 0) {
    const head = (template.signBefore ? '+' : '') + (template.dollarSign ? '$' : '') + '0';
    return padField(head, width - head.length, fill) + point + '0'.repeat(places) +
      'E+' + '0'.repeat(exponentDigits);
  }
  let head: string;
  if (template.signBefore || template.signAfter || template.minusAfter) {
    head = template.signBefore ? (number > 0 ? '+' : '-') : '';
  } else if (width === 1 && number >= 0) {
    // No room for a leading space.
    head = places > 0 ? '0' : '';
  } else {
    head = number < 0 ? '-' : fill;
  }
  if (template.dollarSign) {
    head += '$';
  }
  let room = width - head.length;
  if (room <= 0 && places === 0) {
    head = '%' + head;
    room = 1;
  }
  const lead = Math.max(room, 0);
  const {digits, exponent} = significantDigits(number, lead + places);
  const shifted = exponent - (lead - 1);
  let result = head + digits.slice(0, lead) + point + digits.slice(lead) +
    'E' + (shifted < 0 ? '-' : '+') + Math.abs(shifted).toString().padStart(exponentDigits, '0');
  if (template.signAfter) {
    result += number < 0 ? '-' : '+';
  } else if (template.minusAfter && number < 0) {
    result += '-';
  }
  return result;
}

export function formatUsingStringTemplate(string: string, template: StringTemplate): string {
  if (!template.length) {
    return string;
  }
  return string.slice(0, template.length).padEnd(template.length, ' ');
}
