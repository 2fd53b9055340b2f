import { DUPLICATE_DEFINITION, ILLEGAL_FUNCTION_CALL, RuntimeError, SUBSCRIPT_OUT_OF_RANGE } from "./Errors.ts";
import { TypeTag, typeOfSuffix } from "./Types.ts";
import { coerce, defaultValue, Value } from "./Values.ts";

// Arrays used before any DIM get this upper bound on every axis.
export const DEFAULT_ARRAY_BOUND = 10;

export interface ArrayVariable {
  type: TypeTag;
  base: number;
  // Upper bounds, one per dimension.
  bounds: number[];
  // Row-major storage.
  values: Value[];
}

// Names reaching the variable store are normalized and end in a type suffix.
export function typeOfVariable(name: string): TypeTag {
  return typeOfSuffix(name.slice(-1)) ?? TypeTag.SINGLE;
}

export class Variables {
  scalars: Map<string, Value> = new Map();
  arrays: Map<string, ArrayVariable> = new Map();

  get(name: string): Value {
    return this.scalars.get(name) ?? defaultValue(typeOfVariable(name));
  }

  set(name: string, value: Value) {
    this.scalars.set(name, coerce(value, typeOfVariable(name)));
  }

  has(name: string): boolean {
    return this.scalars.has(name);
  }

  delete(name: string) {
    this.scalars.delete(name);
  }

  hasArray(name: string): boolean {
    return this.arrays.has(name);
  }

  dim(name: string, bounds: number[], base: number): ArrayVariable {
    if (this.arrays.has(name)) {
      throw RuntimeError.fromError(DUPLICATE_DEFINITION);
    }
    let size = 1;
    for (const bound of bounds) {
      if (!Number.isInteger(bound) || bound < base) {
        throw RuntimeError.fromError(SUBSCRIPT_OUT_OF_RANGE);
      }
      size *= bound + 1 - base;
    }
    const type = typeOfVariable(name);
    const array: ArrayVariable = {
      type,
      base,
      bounds: [...bounds],
      values: Array.from({length: size}, () => defaultValue(type)),
    };
    this.arrays.set(name, array);
    return array;
  }

  erase(name: string) {
    if (!this.arrays.delete(name)) {
      throw RuntimeError.fromError(ILLEGAL_FUNCTION_CALL);
    }
  }

  getElement(name: string, indices: number[], base: number): Value {
    const array = this.lookupArray(name, indices.length, base);
    return array.values[offsetOf(array, indices)];
  }

  setElement(name: string, indices: number[], base: number, value: Value) {
    const array = this.lookupArray(name, indices.length, base);
    array.values[offsetOf(array, indices)] = coerce(value, array.type);
  }

  clear() {
    this.scalars.clear();
    this.arrays.clear();
  }

  private lookupArray(name: string, dimensions: number, base: number): ArrayVariable {
    return this.arrays.get(name) ??
      this.dim(name, new Array(dimensions).fill(DEFAULT_ARRAY_BOUND), base);
  }
}

function offsetOf(array: ArrayVariable, indices: number[]): number {
  if (indices.length !== array.bounds.length) {
    throw RuntimeError.fromError(SUBSCRIPT_OUT_OF_RANGE);
  }
  let offset = 0;
  for (let i = 0; i < indices.length; i++) {
    const index = indices[i];
    const bound = array.bounds[i];
    if (index < array.base || index > bound) {
      throw RuntimeError.fromError(SUBSCRIPT_OUT_OF_RANGE);
    }
    offset = offset * (bound + 1 - array.base) + (index - array.base);
  }
  return offset;
}
