/**
 * Runtime type descriptors for vars.
 *
 * A var's semantic type is a zod schema. The schema drives indexing and
 * attribute resolution on the expression side, default values and setter
 * validation on the state side.
 */

import { z } from 'zod';

export type VarType = z.ZodTypeAny;

export type TypeKind =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'date'
  | 'null'
  | 'array'
  | 'tuple'
  | 'set'
  | 'record'
  | 'object'
  | 'map'
  | 'literal'
  | 'enum'
  | 'union'
  | 'unresolved'
  | 'other';

/**
 * Strip wrappers that do not change the shape of a value
 * (optional, nullable, default, effects, readonly, branded).
 */
export function unwrapType(type: VarType): VarType {
  let current: VarType = type;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodReadonly) {
      current = current._def.innerType;
    } else if (current instanceof z.ZodBranded) {
      current = current.unwrap();
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else {
      return current;
    }
  }
}

export function typeKind(type: VarType): TypeKind {
  const t = unwrapType(type);
  if (t instanceof z.ZodString) return 'string';
  if (t instanceof z.ZodNumber) return 'number';
  if (t instanceof z.ZodBoolean) return 'boolean';
  if (t instanceof z.ZodBigInt) return 'bigint';
  if (t instanceof z.ZodDate) return 'date';
  if (t instanceof z.ZodNull || t instanceof z.ZodUndefined) return 'null';
  if (t instanceof z.ZodArray) return 'array';
  if (t instanceof z.ZodTuple) return 'tuple';
  if (t instanceof z.ZodSet) return 'set';
  if (t instanceof z.ZodRecord) return 'record';
  if (t instanceof z.ZodObject) return 'object';
  if (t instanceof z.ZodMap) return 'map';
  if (t instanceof z.ZodLiteral) return 'literal';
  if (t instanceof z.ZodEnum || t instanceof z.ZodNativeEnum) return 'enum';
  if (t instanceof z.ZodUnion || t instanceof z.ZodDiscriminatedUnion) {
    return 'union';
  }
  if (t instanceof z.ZodAny || t instanceof z.ZodUnknown) return 'unresolved';
  return 'other';
}

export function isUnresolvedType(type: VarType): boolean {
  return typeKind(type) === 'unresolved';
}

export function isSequenceType(type: VarType): boolean {
  const kind = typeKind(type);
  return kind === 'array' || kind === 'tuple' || kind === 'string';
}

export function isMappingType(type: VarType): boolean {
  const kind = typeKind(type);
  return kind === 'record' || kind === 'object' || kind === 'map';
}

export function isNumericType(type: VarType): boolean {
  const t = unwrapType(type);
  if (t instanceof z.ZodNumber) return true;
  return t instanceof z.ZodLiteral && typeof t.value === 'number';
}

export function isStringType(type: VarType): boolean {
  const t = unwrapType(type);
  if (t instanceof z.ZodString || t instanceof z.ZodEnum) return true;
  return t instanceof z.ZodLiteral && typeof t.value === 'string';
}

/**
 * Type of an element read out of a sequence type. For tuples, a literal
 * position selects the item type; negative positions count from the end.
 */
export function elementType(type: VarType, position?: number): VarType {
  const t = unwrapType(type);
  if (t instanceof z.ZodArray) return t.element;
  if (t instanceof z.ZodString) return z.string();
  if (t instanceof z.ZodTuple) {
    const items: VarType[] = t.items;
    if (position !== undefined) {
      const idx = position < 0 ? items.length + position : position;
      const item = items[idx];
      if (item) return item;
    }
    return z.unknown();
  }
  return z.unknown();
}

/**
 * Type of a value read out of a mapping type under `key`.
 */
export function valueType(type: VarType, key?: string | number): VarType {
  const t = unwrapType(type);
  if (t instanceof z.ZodRecord || t instanceof z.ZodMap) return t.valueSchema;
  if (t instanceof z.ZodObject) {
    if (key === undefined) return z.unknown();
    const shape: Record<string, VarType> = t.shape;
    return shape[String(key)] ?? z.unknown();
  }
  return z.unknown();
}

/**
 * Type of a named field, or null when the type does not expose it.
 */
export function fieldType(type: VarType, name: string): VarType | null {
  const t = unwrapType(type);
  if (!(t instanceof z.ZodObject)) return null;
  const shape: Record<string, VarType> = t.shape;
  return Object.prototype.hasOwnProperty.call(shape, name)
    ? (shape[name] ?? null)
    : null;
}

/**
 * Stable textual signature of a type, used for var equality and dedup keys.
 */
export function describeType(type: VarType): string {
  if (type instanceof z.ZodOptional) {
    return `optional<${describeType(type.unwrap())}>`;
  }
  if (type instanceof z.ZodNullable) {
    return `nullable<${describeType(type.unwrap())}>`;
  }
  const t = unwrapType(type);
  const kind = typeKind(t);
  if (t instanceof z.ZodArray) return `array<${describeType(t.element)}>`;
  if (t instanceof z.ZodSet) return `set<${describeType(t._def.valueType)}>`;
  if (t instanceof z.ZodTuple) {
    const items: VarType[] = t.items;
    return `tuple<${items.map(describeType).join(',')}>`;
  }
  if (t instanceof z.ZodRecord || t instanceof z.ZodMap) {
    return `${kind}<${describeType(t.valueSchema)}>`;
  }
  if (t instanceof z.ZodObject) {
    const shape: Record<string, VarType> = t.shape;
    const fields = Object.keys(shape)
      .sort()
      .map((k) => `${k}:${describeType(shape[k] ?? z.unknown())}`);
    return `object{${fields.join(',')}}`;
  }
  if (t instanceof z.ZodLiteral) return `literal<${JSON.stringify(t.value)}>`;
  if (t instanceof z.ZodEnum) {
    const options: string[] = t.options;
    return `enum<${options.join('|')}>`;
  }
  if (t instanceof z.ZodUnion) {
    const options: VarType[] = t.options;
    return `union<${options.map(describeType).join('|')}>`;
  }
  if (kind === 'unresolved') return 'any';
  return kind;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Infer a type descriptor for a JSON-like literal.
 */
export function inferType(value: unknown): VarType {
  if (value === null || value === undefined) return z.null();
  switch (typeof value) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'bigint':
      return z.bigint();
    default:
      break;
  }
  if (value instanceof Date) return z.date();
  if (Array.isArray(value)) {
    if (value.length === 0) return z.array(z.unknown());
    const first = inferType(value[0]);
    const signature = describeType(first);
    const homogeneous = value.every(
      (item) => describeType(inferType(item)) === signature
    );
    return z.array(homogeneous ? first : z.unknown());
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    const shape: Record<string, VarType> = {};
    for (const [key, item] of Object.entries(value)) {
      shape[key] = inferType(item);
    }
    return z.object(shape);
  }
  return z.unknown();
}

// zod hands out the same default instance on every call.
function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof Set) return new Set([...value].map(cloneValue));
  if (value instanceof Map) {
    return new Map(
      [...value].map(([k, v]: [unknown, unknown]) => [k, cloneValue(v)])
    );
  }
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, cloneValue(v)])
    );
  }
  return value;
}

/**
 * Default value for a var of the given type: a copy of the schema's own
 * default when it declares one, otherwise the empty value of its kind.
 */
export function defaultForType(type: VarType): unknown {
  if (type instanceof z.ZodDefault) {
    const value: unknown = type._def.defaultValue();
    return cloneValue(value);
  }
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) {
    return null;
  }
  switch (typeKind(type)) {
    case 'string':
      return '';
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'array':
    case 'tuple':
      return [];
    case 'record':
    case 'object':
      return {};
    case 'set':
      return new Set();
    case 'map':
      return new Map();
    default:
      return null;
  }
}
