/**
 * Var: an immutable symbolic expression evaluated on the client.
 *
 * A Var is text (a JS expression), a zod type descriptor, an owning state
 * qualifier and two flags. Every operation returns a new Var; nothing here
 * ever touches a concrete value.
 *
 * @example
 * ```ts
 * Var.create(1).add(2).toString();            // '(1 + 2)'
 * Var.create([1, 2, 3]).index(-1).toString(); // '[1,2,3].at(-1)'
 * ```
 */

import { z } from 'zod';
import { VarAttributeError, VarTypeError } from '../common/errors';
import {
  formatString,
  hasTopLevelOperator,
  jsonDumps,
  wrap,
} from '../common/format';
import type { NameAllocator } from './names';
import {
  describeType,
  elementType,
  fieldType,
  inferType,
  isMappingType,
  isNumericType,
  isSequenceType,
  isStringType,
  isUnresolvedType,
  valueType,
  type VarType,
} from './types';

export interface VarInit {
  expr: string;
  type?: VarType;
  state?: string;
  isLocal?: boolean;
  isString?: boolean;
}

export interface CreateOptions {
  /** Keep string text raw; it renders as a template literal. */
  isString?: boolean;
  isLocal?: boolean;
}

export interface OperationOptions {
  /** Put the other operand on the left. */
  flip?: boolean;
  /** Override the result type. */
  type?: VarType;
}

/** A `.slice(start, stop)` index for sequence vars. */
export class VarSlice {
  constructor(
    readonly start?: number | Var,
    readonly stop?: number | Var
  ) {}

  render(): string {
    const start = renderBound(this.start, '0');
    const stop = renderBound(this.stop, 'undefined');
    return `${start}, ${stop}`;
  }
}

function renderBound(bound: number | Var | undefined, fallback: string): string {
  if (bound === undefined) return fallback;
  if (bound instanceof Var) return bound.fullName;
  if (!Number.isInteger(bound)) {
    throw new VarTypeError(`Slice bounds must be integers, got ${bound}`);
  }
  return String(bound);
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'Object';
  }
  return typeof value;
}

function isJsonLike(value: unknown): boolean {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      break;
    default:
      return false;
  }
  if (Array.isArray(value)) return value.every(isJsonLike);
  if ('toJSON' in value && typeof value.toJSON === 'function') return true;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isJsonLike);
}

export class Var {
  readonly expr: string;
  readonly type: VarType;
  readonly state: string;
  readonly isLocal: boolean;
  readonly isString: boolean;

  constructor(init: VarInit) {
    this.expr = init.expr;
    this.type = init.type ?? z.unknown();
    this.state = init.state ?? '';
    this.isLocal = init.isLocal ?? true;
    this.isString = init.isString ?? false;
  }

  /**
   * Wrap a literal, or pass an existing Var through unchanged.
   * Throws VarTypeError for values with no JSON representation.
   */
  static create(value: unknown, options: CreateOptions = {}): Var {
    if (value instanceof Var) return value;
    const isLocal = options.isLocal ?? true;

    if (value === null || value === undefined) {
      return new Var({ expr: 'null', type: z.null(), isLocal });
    }

    if (typeof value === 'string' && options.isString) {
      return new Var({
        expr: value,
        type: z.string(),
        isLocal,
        isString: true,
      });
    }

    const expr = isJsonLike(value) ? jsonDumps(value) : null;
    if (expr === null) {
      throw new VarTypeError(
        `Unsupported type ${typeName(value)} for Var.create: value is not JSON encodable`
      );
    }
    return new Var({ expr, type: inferType(value), isLocal });
  }

  /** An unquoted expression, e.g. a reference to a state var or a client global. */
  static raw(
    expr: string,
    type: VarType = z.unknown(),
    options: { state?: string; isLocal?: boolean } = {}
  ): Var {
    return new Var({
      expr,
      type,
      state: options.state ?? '',
      isLocal: options.isLocal ?? !options.state,
    });
  }

  static slice(start?: number | Var, stop?: number | Var): VarSlice {
    return new VarSlice(start, stop);
  }

  get fullName(): string {
    return this.isLocal || !this.state ? this.expr : `${this.state}.${this.expr}`;
  }

  toString(): string {
    return this.fullName;
  }

  /** JSX form: braces around references, template literal for raw strings. */
  toJsx(): string {
    if (this.isString) {
      return this.isLocal
        ? formatString(this.fullName)
        : formatString(`\${${this.fullName}}`);
    }
    return this.isLocal ? this.fullName : wrap(this.fullName, '{');
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Var &&
      other.expr === this.expr &&
      other.state === this.state &&
      other.isLocal === this.isLocal &&
      describeType(other.type) === describeType(this.type)
    );
  }

  /** Dedup key: equal vars produce equal keys. */
  key(): string {
    return JSON.stringify([
      this.expr,
      describeType(this.type),
      this.state,
      this.isLocal,
    ]);
  }

  to(type: VarType): Var {
    return new Var({
      expr: this.expr,
      type,
      state: this.state,
      isLocal: this.isLocal,
      isString: this.isString,
    });
  }

  // Arithmetic

  add(other: unknown, options?: OperationOptions): Var {
    return this.binary('+', other, options);
  }

  sub(other: unknown, options?: OperationOptions): Var {
    return this.binary('-', other, options);
  }

  mul(other: unknown, options?: OperationOptions): Var {
    return this.binary('*', other, options);
  }

  div(other: unknown, options?: OperationOptions): Var {
    return this.binary('/', other, options, { wrapRight: true });
  }

  floorDiv(other: unknown, options?: OperationOptions): Var {
    return this.binary('/', other, options, {
      wrapRight: true,
      fn: 'Math.floor',
    });
  }

  mod(other: unknown, options?: OperationOptions): Var {
    return this.binary('%', other, options, { wrapRight: true });
  }

  pow(other: unknown, options?: OperationOptions): Var {
    return this.binary(',', other, options, { fn: 'Math.pow' });
  }

  // Logical

  and(other: unknown, options?: OperationOptions): Var {
    return this.binary('&&', other, { type: z.boolean(), ...options });
  }

  or(other: unknown, options?: OperationOptions): Var {
    return this.binary('||', other, { type: z.boolean(), ...options });
  }

  // Comparison

  lt(other: unknown, options?: OperationOptions): Var {
    return this.binary('<', other, { type: z.boolean(), ...options });
  }

  le(other: unknown, options?: OperationOptions): Var {
    return this.binary('<=', other, { type: z.boolean(), ...options });
  }

  gt(other: unknown, options?: OperationOptions): Var {
    return this.binary('>', other, { type: z.boolean(), ...options });
  }

  ge(other: unknown, options?: OperationOptions): Var {
    return this.binary('>=', other, { type: z.boolean(), ...options });
  }

  eq(other: unknown, options?: OperationOptions): Var {
    return this.binary('==', other, { type: z.boolean(), ...options });
  }

  neq(other: unknown, options?: OperationOptions): Var {
    return this.binary('!=', other, { type: z.boolean(), ...options });
  }

  // Unary

  neg(): Var {
    return this.unary(`-(${this.fullName})`, this.type);
  }

  abs(): Var {
    return this.unary(`Math.abs(${this.fullName})`, this.type);
  }

  not(): Var {
    return this.unary(`!${this.fullName}`, z.boolean());
  }

  length(): Var {
    if (!isSequenceType(this.type)) {
      throw new VarTypeError(
        `Cannot get the length of var '${this.fullName}' of type ${describeType(this.type)}; only arrays, tuples and strings have a length`
      );
    }
    return this.unary(`${this.fullName}.length`, z.number());
  }

  toJsonString(): Var {
    return this.unary(`JSON.stringify(${this.fullName})`, z.string());
  }

  /**
   * Index into a sequence (`.at(i)`, `.slice(a, b)`) or a mapping (`[key]`).
   */
  index(i: unknown): Var {
    if (isUnresolvedType(this.type)) {
      throw new VarTypeError(
        `Cannot index into var '${this.fullName}' because its type is unresolved. ` +
          'Annotate the var with a concrete type, e.g. z.array(z.string()) or z.record(z.number()).'
      );
    }

    if (isSequenceType(this.type)) {
      if (i instanceof VarSlice) {
        return this.derive(`${this.expr}.slice(${i.render()})`, this.type);
      }
      if (typeof i === 'number') {
        if (!Number.isInteger(i)) {
          throw new VarTypeError(
            `Var '${this.fullName}' must be indexed with an integer or a slice, got ${i}`
          );
        }
        return this.derive(`${this.expr}.at(${i})`, elementType(this.type, i));
      }
      if (i instanceof Var && isNumericType(i.type)) {
        return this.derive(
          `${this.expr}.at(${i.fullName})`,
          elementType(this.type)
        );
      }
      throw new VarTypeError(
        `Var '${this.fullName}' must be indexed with an integer, an integer var or a slice, got ${describeIndex(i)}`
      );
    }

    if (isMappingType(this.type)) {
      if (typeof i === 'string') {
        return this.derive(
          `${this.expr}[${JSON.stringify(i)}]`,
          valueType(this.type, i)
        );
      }
      if (typeof i === 'number' && Number.isFinite(i)) {
        return this.derive(`${this.expr}[${i}]`, valueType(this.type, i));
      }
      if (i instanceof Var && (isStringType(i.type) || isNumericType(i.type))) {
        return this.derive(`${this.expr}[${i.fullName}]`, valueType(this.type));
      }
      throw new VarTypeError(
        `Var '${this.fullName}' must be indexed with a string or number key, got ${describeIndex(i)}`
      );
    }

    throw new VarTypeError(
      `Var '${this.fullName}' of type ${describeType(this.type)} does not support indexing`
    );
  }

  attr(name: string): Var {
    const type = fieldType(this.type, name);
    if (type === null) {
      throw new VarAttributeError(
        `Var '${this.fullName}' of type ${describeType(this.type)} has no attribute '${name}'. ` +
          'The var may have been annotated wrongly; declare its type with z.object({...}) including this field.'
      );
    }
    return this.derive(`${this.expr}.${name}`, type);
  }

  /**
   * Render `x.map((arg, i) => body)`. The callback receives Vars for the
   * element and its position and returns the body (a Var or a literal).
   */
  foreach(fn: (item: Var, index: Var) => unknown, names: NameAllocator): Var {
    const item = Var.raw(names.next(), elementType(this.type));
    const body = Var.create(fn(item, Var.raw('i', z.number())));
    return this.unary(
      `${this.fullName}.map((${item.expr}, i) => ${body.fullName})`,
      z.array(body.type)
    );
  }

  private derive(expr: string, type: VarType): Var {
    return new Var({
      expr,
      type,
      state: this.state,
      isLocal: this.isLocal,
    });
  }

  private unary(expr: string, type: VarType): Var {
    return new Var({ expr, type, isLocal: this.isLocal });
  }

  private binary(
    op: string,
    other: unknown,
    options: OperationOptions = {},
    render: { fn?: string; wrapRight?: boolean } = {}
  ): Var {
    const operand = Var.create(other);
    const [left, right] = options.flip ? [operand, this] : [this, operand];
    let rightText = right.fullName;
    if (render.wrapRight && hasTopLevelOperator(rightText)) {
      rightText = `(${rightText})`;
    }
    const body =
      op === ','
        ? `${left.fullName}, ${rightText}`
        : `${left.fullName} ${op} ${rightText}`;
    const expr = render.fn ? `${render.fn}(${body})` : wrap(body, '(');
    return new Var({
      expr,
      type: options.type ?? this.type,
      isLocal: this.isLocal && operand.isLocal,
    });
  }
}

function describeIndex(i: unknown): string {
  if (i instanceof Var) return `var of type ${describeType(i.type)}`;
  return typeName(i);
}
