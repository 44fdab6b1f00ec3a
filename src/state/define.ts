/**
 * State definitions
 *
 * A definition is the static description of one state node: its zod-typed
 * plain vars, computed vars, event handlers, background handlers and parent.
 * Definitions are immutable; every builder call returns a new definition
 * whose type carries the added member.
 *
 * @example
 * ```ts
 * const Counter = defineState('counter', { count: z.number() })
 *   .computed('double', (s) => s.count * 2)
 *   .event('increment', (s) => {
 *     s.count += 1;
 *   })
 *   .event('add', { amount: z.number() }, (s, { amount }) => {
 *     s.count += amount;
 *   });
 * ```
 */

import { z } from 'zod';
import { EventPayloadError, StateDefinitionError } from '../common/errors';
import {
  createEventRef,
  isClientEventName,
  type EventRef,
  type EventYield,
  type RouterData,
} from '../events/event';
import { formatIssues, validatePayload } from '../events/payload';
import { Var } from '../vars/var';
import { defaultForType, type VarType } from '../vars/types';

export type VarsShape = Record<string, VarType>;
export type ComputedShape = Record<string, unknown>;
export type EventsShape = Record<string, object>;

export type Values<V extends VarsShape> = {
  -readonly [K in keyof V]: z.output<V[K]>;
};

export type ViewHelpers = {
  /** Full dotted name of the state node behind this view. */
  readonly $name: string;
  readonly $token: string;
  readonly $router: RouterData;
  /** View of another state node in the same client tree. */
  $state<
    V2 extends VarsShape,
    C2 extends ComputedShape,
    E2 extends EventsShape,
  >(
    def: StateDefinition<V2, C2, E2>
  ): StateView<V2, C2>;
  /** Restore the defaults of every plain var in this node's subtree. */
  $reset(): void;
};

export type StateView<
  V extends VarsShape,
  C extends ComputedShape,
> = Values<V> & Readonly<C> & ViewHelpers;

export type BackgroundView<
  V extends VarsShape,
  C extends ComputedShape,
> = Readonly<Values<V>> &
  Readonly<C> &
  ViewHelpers & {
    /**
     * Run `fn` with exclusive, writable access to fresh state. A delta is
     * flushed to the client when `fn` settles.
     */
    exclusive<R>(fn: (self: StateView<V, C>) => R | Promise<R>): Promise<R>;
  };

export type HandlerOutput =
  | EventYield
  | Promise<EventYield>
  | Generator<EventYield, EventYield, unknown>
  | AsyncGenerator<EventYield, EventYield, unknown>;

export type HandlerIterator =
  | Generator<EventYield, EventYield, unknown>
  | AsyncGenerator<EventYield, EventYield, unknown>;

/** Generator handlers are driven step by step; everything else is awaited. */
export function isHandlerIterator(
  output: HandlerOutput
): output is HandlerIterator {
  return (
    typeof output === 'object' &&
    output !== null &&
    'next' in output &&
    typeof output.next === 'function'
  );
}

export type BackgroundOutput =
  | Promise<EventYield>
  | AsyncGenerator<EventYield, EventYield, unknown>;

/** Payload accepted when building a spec: each argument may also be a Var. */
export type EventPayload<T> = { [K in keyof T]: T[K] | Var };
export type NoArgs = Record<string, never>;
export type ArgsPayload<A extends z.ZodRawShape> = EventPayload<
  z.input<z.ZodObject<A>>
>;

/** Provides views over the node a handler or computed var runs against. */
export interface ViewSource {
  view<V extends VarsShape, C extends ComputedShape>(): StateView<V, C>;
  backgroundView<V extends VarsShape, C extends ComputedShape>(): BackgroundView<
    V,
    C
  >;
  set(name: string, value: unknown): void;
}

export interface DepRef {
  state: string;
  name: string;
}

export interface ComputedEntry {
  readonly name: string;
  readonly type: VarType;
  readonly cache: boolean;
  /** Explicit dependencies; null means discover them from the getter. */
  readonly deps: readonly DepRef[] | null;
  readonly source: string;
  compute(views: ViewSource): unknown;
}

export type PreparedHandler = (views: ViewSource) => HandlerOutput;

export interface HandlerEntry {
  readonly name: string;
  readonly fullName: string;
  readonly background: boolean;
  readonly argNames: readonly string[];
  /** Validate bound arguments; throws EventPayloadError. */
  prepare(args: Record<string, unknown>): PreparedHandler;
}

export interface ComputedOptions {
  /** Keep the value until a dependency changes (default true). */
  cache?: boolean;
  /** Vars the getter reads. Names are local; Vars may belong to other states. */
  deps?: ReadonlyArray<string | Var>;
  type?: VarType;
}

/** What the registry and the runtime need from a definition. */
export interface StateDefinitionLike {
  readonly name: string;
  readonly fullName: string;
  readonly parentName: string | null;
  readonly shape: VarsShape;
  readonly computedVars: ReadonlyMap<string, ComputedEntry>;
  readonly handlers: ReadonlyMap<string, HandlerEntry>;
  defaults(): Record<string, unknown>;
}

export const SETVAR = 'setvar';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED = new Set([
  'exclusive',
  'constructor',
  'toString',
  'toJSON',
  'hydrate',
]);

function checkIdentifier(kind: string, name: string, state: string): void {
  if (!IDENTIFIER_RE.test(name)) {
    throw new StateDefinitionError(
      `Invalid ${kind} name '${name}' in state '${state}': names must be identifiers without '$'`
    );
  }
  if (RESERVED.has(name)) {
    throw new StateDefinitionError(
      `'${name}' is reserved and cannot be used as a ${kind} name in state '${state}'`
    );
  }
}

interface DefinitionParts<V extends VarsShape> {
  name: string;
  parentName: string | null;
  shape: V;
  computedVars: ReadonlyMap<string, ComputedEntry>;
  handlers: ReadonlyMap<string, HandlerEntry>;
}

const SETVAR_ARGS = z.object({ var: z.string(), value: z.unknown() });

export class StateDefinition<
  V extends VarsShape,
  C extends ComputedShape,
  E extends EventsShape,
> implements StateDefinitionLike
{
  readonly name: string;
  readonly fullName: string;
  readonly parentName: string | null;
  readonly shape: V;
  readonly computedVars: ReadonlyMap<string, ComputedEntry>;
  readonly handlers: ReadonlyMap<string, HandlerEntry>;

  /** @internal use defineState() */
  constructor(parts: DefinitionParts<V>) {
    this.name = parts.name;
    this.parentName = parts.parentName;
    this.fullName = parts.parentName
      ? `${parts.parentName}.${parts.name}`
      : parts.name;
    this.shape = parts.shape;
    this.computedVars = parts.computedVars;
    this.handlers = parts.handlers;
  }

  defaults(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, type] of Object.entries(this.shape)) {
      out[name] = defaultForType(type);
    }
    return out;
  }

  /** Reference Var for a plain or computed var, owned by this state. */
  var<K extends (keyof V | keyof C) & string>(name: K): Var {
    const shape: VarsShape = this.shape;
    const plain = Object.prototype.hasOwnProperty.call(shape, name)
      ? shape[name]
      : undefined;
    const type = plain ?? this.computedVars.get(name)?.type;
    if (type === undefined) {
      throw new StateDefinitionError(
        `State '${this.fullName}' has no var named '${name}'`
      );
    }
    return Var.raw(name, type, { state: this.fullName });
  }

  /** Handler reference; call it to build an EventSpec. */
  ref<K extends keyof E & string>(name: K): EventRef<E[K]> {
    const entry = this.handlers.get(name);
    if (!entry) {
      throw new StateDefinitionError(
        `State '${this.fullName}' has no event handler named '${name}'`
      );
    }
    return createEventRef<E[K]>(this.fullName, name, entry.argNames);
  }

  /** Reference to the built-in `setvar` handler, pre-bound to `name`. */
  setter<K extends keyof V & string>(
    name: K
  ): EventRef<{ value: z.input<V[K]> | Var }> {
    if (!Object.prototype.hasOwnProperty.call(this.shape, name)) {
      throw new StateDefinitionError(
        `State '${this.fullName}' has no plain var named '${name}'`
      );
    }
    return createEventRef<{ value: z.input<V[K]> | Var }>(
      this.fullName,
      SETVAR,
      ['value'],
      { var: name }
    );
  }

  computed<N extends string, T>(
    name: N,
    get: (self: StateView<V, C>) => T,
    options: ComputedOptions = {}
  ): StateDefinition<V, C & Record<N, T>, E> {
    this.checkFree('computed var', name);
    const entry: ComputedEntry = {
      name,
      type: options.type ?? z.unknown(),
      cache: options.cache ?? true,
      deps: options.deps ? options.deps.map((d) => this.depRef(d)) : null,
      source: get.toString(),
      compute: (views) => get(views.view<V, C>()),
    };
    const computedVars = new Map(this.computedVars);
    computedVars.set(name, entry);
    return new StateDefinition<V, C & Record<N, T>, E>({
      ...this.parts(),
      computedVars,
    });
  }

  event<N extends string>(
    name: N,
    fn: (self: StateView<V, C>) => HandlerOutput
  ): StateDefinition<V, C, E & Record<N, NoArgs>>;
  event<N extends string, A extends z.ZodRawShape>(
    name: N,
    args: A,
    fn: (self: StateView<V, C>, args: z.output<z.ZodObject<A>>) => HandlerOutput
  ): StateDefinition<V, C, E & Record<N, ArgsPayload<A>>>;
  event<N extends string, A extends z.ZodRawShape>(
    name: N,
    argsOrFn: A | ((self: StateView<V, C>) => HandlerOutput),
    fn?: (self: StateView<V, C>, args: z.output<z.ZodObject<A>>) => HandlerOutput
  ):
    | StateDefinition<V, C, E & Record<N, NoArgs>>
    | StateDefinition<V, C, E & Record<N, ArgsPayload<A>>> {
    this.checkFree('event handler', name);
    const fullName = `${this.fullName}.${name}`;

    if (typeof argsOrFn === 'function') {
      const run = argsOrFn;
      return this.withHandler<N, NoArgs>({
        name,
        fullName,
        background: false,
        argNames: [],
        prepare: () => (views) => run(views.view<V, C>()),
      });
    }

    const handle = this.requireFn(name, fn);
    const schema = z.object(argsOrFn);
    return this.withHandler<N, ArgsPayload<A>>({
      name,
      fullName,
      background: false,
      argNames: Object.keys(argsOrFn),
      prepare: (args) => {
        const parsed = validatePayload(fullName, schema, args);
        return (views) => handle(views.view<V, C>(), parsed);
      },
    });
  }

  /**
   * Background handlers run outside the per-client lock. They read a
   * snapshot and may only mutate state inside `self.exclusive(...)`.
   */
  background<N extends string>(
    name: N,
    fn: (self: BackgroundView<V, C>) => BackgroundOutput
  ): StateDefinition<V, C, E & Record<N, NoArgs>>;
  background<N extends string, A extends z.ZodRawShape>(
    name: N,
    args: A,
    fn: (
      self: BackgroundView<V, C>,
      args: z.output<z.ZodObject<A>>
    ) => BackgroundOutput
  ): StateDefinition<V, C, E & Record<N, ArgsPayload<A>>>;
  background<N extends string, A extends z.ZodRawShape>(
    name: N,
    argsOrFn: A | ((self: BackgroundView<V, C>) => BackgroundOutput),
    fn?: (
      self: BackgroundView<V, C>,
      args: z.output<z.ZodObject<A>>
    ) => BackgroundOutput
  ):
    | StateDefinition<V, C, E & Record<N, NoArgs>>
    | StateDefinition<V, C, E & Record<N, ArgsPayload<A>>> {
    this.checkFree('event handler', name);
    const fullName = `${this.fullName}.${name}`;

    if (typeof argsOrFn === 'function') {
      const run = argsOrFn;
      return this.withHandler<N, NoArgs>({
        name,
        fullName,
        background: true,
        argNames: [],
        prepare: () => (views) => run(views.backgroundView<V, C>()),
      });
    }

    const handle = this.requireFn(name, fn);
    const schema = z.object(argsOrFn);
    return this.withHandler<N, ArgsPayload<A>>({
      name,
      fullName,
      background: true,
      argNames: Object.keys(argsOrFn),
      prepare: (args) => {
        const parsed = validatePayload(fullName, schema, args);
        return (views) => handle(views.backgroundView<V, C>(), parsed);
      },
    });
  }

  private parts(): DefinitionParts<V> {
    return {
      name: this.name,
      parentName: this.parentName,
      shape: this.shape,
      computedVars: this.computedVars,
      handlers: this.handlers,
    };
  }

  private withHandler<N extends string, P extends object>(
    entry: HandlerEntry
  ): StateDefinition<V, C, E & Record<N, P>> {
    const handlers = new Map(this.handlers);
    handlers.set(entry.name, entry);
    return new StateDefinition<V, C, E & Record<N, P>>({
      ...this.parts(),
      handlers,
    });
  }

  private requireFn<F>(name: string, fn: F | undefined): F {
    if (fn === undefined) {
      throw new StateDefinitionError(
        `Handler '${this.fullName}.${name}' declares arguments but no function`
      );
    }
    return fn;
  }

  private checkFree(kind: string, name: string): void {
    checkIdentifier(kind, name, this.fullName);
    if (
      Object.prototype.hasOwnProperty.call(this.shape, name) ||
      this.computedVars.has(name) ||
      this.handlers.has(name)
    ) {
      throw new StateDefinitionError(
        `'${name}' is already defined on state '${this.fullName}'`
      );
    }
  }

  private depRef(dep: string | Var): DepRef {
    if (typeof dep === 'string') return { state: this.fullName, name: dep };
    // Reference vars render as `name` (plus accessors); the root segment is the var.
    const name = dep.expr.split(/[.[]/, 1)[0] ?? dep.expr;
    return { state: dep.state || this.fullName, name };
  }
}

/**
 * Start a state definition.
 *
 * Vars whose name starts with `_` are backend-only: they are persisted but
 * never sent to the client.
 */
export function defineState<V extends VarsShape>(
  name: string,
  vars: V,
  options: { parent?: StateDefinitionLike } = {}
): StateDefinition<V, Record<never, never>, Record<typeof SETVAR, NoArgs>> {
  if (!IDENTIFIER_RE.test(name)) {
    throw new StateDefinitionError(
      `Invalid state name '${name}': names must be identifiers`
    );
  }
  if (isClientEventName(name)) {
    throw new StateDefinitionError(
      `Invalid state name '${name}': names starting with '_' are reserved for client events`
    );
  }
  const parentName = options.parent?.fullName ?? null;
  const fullName = parentName ? `${parentName}.${name}` : name;
  for (const key of Object.keys(vars)) {
    checkIdentifier('var', key, fullName);
  }

  const setvar: HandlerEntry = {
    name: SETVAR,
    fullName: `${fullName}.${SETVAR}`,
    background: false,
    argNames: ['var', 'value'],
    prepare: (args) => {
      const handler = `${fullName}.${SETVAR}`;
      const parsed = validatePayload(handler, SETVAR_ARGS, args);
      const schema = Object.prototype.hasOwnProperty.call(vars, parsed.var)
        ? vars[parsed.var]
        : undefined;
      if (!schema) {
        throw new EventPayloadError(
          handler,
          `'${parsed.var}' is not a plain var of state '${fullName}'`
        );
      }
      if (parsed.var.startsWith('_')) {
        throw new EventPayloadError(
          handler,
          `'${parsed.var}' is backend-only and cannot be set by the client`
        );
      }
      const result = schema.safeParse(parsed.value);
      if (!result.success) {
        throw new EventPayloadError(
          handler,
          `value: ${formatIssues(result.error)}`
        );
      }
      const value: unknown = result.data;
      return (views) => {
        views.set(parsed.var, value);
      };
    },
  };

  return new StateDefinition<
    V,
    Record<never, never>,
    Record<typeof SETVAR, NoArgs>
  >({
    name,
    parentName,
    shape: vars,
    computedVars: new Map(),
    handlers: new Map([[SETVAR, setvar]]),
  });
}

/** Any definition, whatever its vars, computed vars and events. */
export type AnyStateDefinition = StateDefinitionLike;
