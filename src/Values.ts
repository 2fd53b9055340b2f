import { TypeTag } from './Types.ts'
import { floatEqual, roundToNearestEven } from './Math.ts';

export type StringValue = {
  tag: TypeTag.STRING;
  string: string;
};

export type SingleValue = {
  tag: TypeTag.SINGLE;
  number: number;
};

export type DoubleValue = {
  tag: TypeTag.DOUBLE;
  number: number;
};

export type IntegerValue = {
  tag: TypeTag.INTEGER;
  number: number;
}

export type NumericValue =
  | SingleValue
  | DoubleValue
  | IntegerValue;

export type Value =
  | StringValue
  | NumericValue;

export function isString(value: Value): value is StringValue {
  return 'string' in value;
}

export function isNumeric(value: Value): value is NumericValue {
  return 'number' in value;
}

export function string(string: string = ""): StringValue {
  return {tag: TypeTag.STRING, string};
}

export function single(number: number): SingleValue {
  return {tag: TypeTag.SINGLE, number: Math.fround(number)};
}

export function double(number: number): DoubleValue {
  return {tag: TypeTag.DOUBLE, number};
}

// Integers saturate instead of overflowing.
export function integer(number: number): IntegerValue {
  return {tag: TypeTag.INTEGER, number: toInt16(number)};
}

export function boolean(test: boolean): IntegerValue {
  return integer(test ? TRUE : FALSE);
}

export function toInt16(number: number): number {
  if (number >= 32767.5) {
    return 32767;
  }
  if (number <= -32768.5) {
    return -32768;
  }
  if (Number.isNaN(number)) {
    return 0;
  }
  // Adding zero turns -0 into 0.
  return roundToNearestEven(number) + 0;
}

export function toNumber(value: Value): number {
  return isNumeric(value) ? value.number : 0;
}

export function toInteger(value: Value): number {
  return toInt16(toNumber(value));
}

export function toBoolean(value: Value): boolean {
  return isString(value) ? value.string.length > 0 : value.number !== 0;
}

export function defaultValue(tag: TypeTag): Value {
  switch (tag) {
    case TypeTag.INTEGER: return integer(0);
    case TypeTag.SINGLE: return single(0);
    case TypeTag.DOUBLE: return double(0);
    case TypeTag.STRING: return string("");
  }
}

// Converting a number to a string type yields "" rather than a type mismatch.
export function coerce(value: Value, tag: TypeTag): Value {
  switch (tag) {
    case TypeTag.INTEGER: return integer(toNumber(value));
    case TypeTag.SINGLE: return single(toNumber(value));
    case TypeTag.DOUBLE: return double(toNumber(value));
    case TypeTag.STRING: return isString(value) ? value : string("");
  }
}

// Formats numbers the way PRINT and STR$ do: a leading space for values that
// are not negative and a trailing space always.
export function formatValue(value: Value): string {
  if (isString(value)) {
    return value.string;
  }
  const formatted = formatNumber(value);
  return (value.number >= 0 ? ' ' : '') + formatted + ' ';
}

export function formatNumber(value: NumericValue): string {
  const number = value.number;
  if (value.tag === TypeTag.INTEGER || (Number.isInteger(number) && Math.abs(number) < 1e10)) {
    return (number + 0).toString();
  }
  const fixed = number.toFixed(6);
  if (fixed.includes('e') || !fixed.includes('.')) {
    return fixed;
  }
  return fixed.replace(/0+$/, '').replace(/\.$/, '');
}

// Compares two values, returning -1, 0 or 1.  Numbers within the float
// tolerance compare equal.
export function compare(a: Value, b: Value): number {
  if (isString(a) && isString(b)) {
    return a.string < b.string ? -1 : a.string > b.string ? 1 : 0;
  }
  const left = toNumber(a);
  const right = toNumber(b);
  if (floatEqual(left, right)) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function typeOfValue(value: Value): TypeTag {
  return value.tag;
}

export const
  TRUE = -1,
  FALSE = 0;
