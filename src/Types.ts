export enum TypeTag {
  INTEGER,
  SINGLE,
  DOUBLE,
  STRING,
}

export interface Type {
  tag: TypeTag;
}

export type DefTypeMap = Map<string, TypeTag>;

const SUFFIXES: Map<string, TypeTag> = new Map([
  ['%', TypeTag.INTEGER],
  ['!', TypeTag.SINGLE],
  ['#', TypeTag.DOUBLE],
  ['$', TypeTag.STRING],
]);

export function typeOfSuffix(suffix: string): TypeTag | undefined {
  return SUFFIXES.get(suffix);
}

export function suffixOfType(tag: TypeTag): string {
  switch (tag) {
    case TypeTag.INTEGER: return '%';
    case TypeTag.SINGLE: return '!';
    case TypeTag.DOUBLE: return '#';
    case TypeTag.STRING: return '$';
  }
}

export function hasTypeSuffix(name: string): boolean {
  return SUFFIXES.has(name.slice(-1));
}

// Variables without a sigil default to SINGLE unless a DEFtype statement
// covers their first letter.
export function defaultTypeOf(name: string, defTypes: DefTypeMap): TypeTag {
  return defTypes.get(name.charAt(0).toLowerCase()) ?? TypeTag.SINGLE;
}

// Lowercases a name and appends the suffix for its resolved type, so that
// "A" and "a!" refer to the same variable under the default map.
export function normalizeName(name: string, defTypes: DefTypeMap): string {
  const lower = name.toLowerCase();
  if (hasTypeSuffix(lower)) {
    return lower;
  }
  return lower + suffixOfType(defaultTypeOf(lower, defTypes));
}
