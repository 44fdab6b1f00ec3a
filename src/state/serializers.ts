/**
 * Serializer registry
 *
 * Turns var values into JSON for deltas. Primitives, arrays, plain objects
 * and Vars are built in; Date, Set and Map are registered by default; other
 * classes are resolved through the nearest registered prototype. A value
 * with no serializer fails with SerializationError instead of being dropped.
 */

import { SerializationError } from '../common/errors';
import { Var } from '../vars/var';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Recurse = (value: unknown, key?: string | number) => JsonValue;

type AnyConstructor<T> = abstract new (...args: never[]) => T;

interface SerializerEntry {
  serialize(value: object, recurse: Recurse): JsonValue;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function childPath(path: string, key: string | number): string {
  return typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`;
}

export class SerializerRegistry {
  private readonly entries = new Map<object, SerializerEntry>();

  /**
   * Register a serializer for instances of `ctor` and its subclasses.
   * A later registration for the same class replaces the earlier one.
   */
  register<T extends object>(
    ctor: AnyConstructor<T>,
    serialize: (value: T, recurse: Recurse) => JsonValue
  ): this {
    const proto: object = ctor.prototype;
    const entry: SerializerEntry = { serialize };
    this.entries.set(proto, entry);
    return this;
  }

  has(ctor: AnyConstructor<object>): boolean {
    const proto: object = ctor.prototype;
    return this.entries.has(proto);
  }

  /** Copy of this registry that can be extended independently. */
  clone(): SerializerRegistry {
    const copy = new SerializerRegistry();
    for (const [proto, entry] of this.entries) copy.entries.set(proto, entry);
    return copy;
  }

  serialize(value: unknown, path = 'value'): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') {
      if (Number.isFinite(value)) return value;
      throw new SerializationError(
        'number',
        path,
        `Non-finite number ${value} has no JSON form`
      );
    }
    if (typeof value === 'bigint') return value.toString();
    if (typeof value !== 'object') {
      throw new SerializationError(typeof value, path);
    }

    const recurse: Recurse = (child, key) =>
      this.serialize(child, key === undefined ? path : childPath(path, key));

    if (value instanceof Var) return value.fullName;
    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => recurse(item, i));
    }
    if (isPlainObject(value)) {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = recurse(item, key);
      }
      return out;
    }

    let proto: unknown = Object.getPrototypeOf(value);
    while (typeof proto === 'object' && proto !== null) {
      const entry = this.entries.get(proto);
      if (entry) return entry.serialize(value, recurse);
      proto = Object.getPrototypeOf(proto);
    }
    throw new SerializationError(value.constructor?.name ?? 'Object', path);
  }
}

export function createSerializerRegistry(): SerializerRegistry {
  return new SerializerRegistry()
    .register(Date, (d) => d.toISOString())
    .register(Set, (s, recurse) =>
      [...s].map((item: unknown, i) => recurse(item, i))
    )
    .register(Map, (m, recurse) => {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of m) out[String(key)] = recurse(item, String(key));
      return out;
    });
}

export const defaultSerializers = createSerializerRegistry();
