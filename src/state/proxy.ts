/**
 * Handler views
 *
 * Handlers and computed getters never see a StateNode; they get a view: a
 * proxy exposing plain vars (read/write), computed vars (read) and the `$`
 * helpers. Arrays, plain objects, maps and sets read through a mutable view
 * are wrapped so that in-place mutation (`s.items.push(x)`) marks the owning
 * var dirty. Read-only views reject every write with ImmutableStateError.
 */

import { ImmutableStateError } from '../common/errors';
import { invariant } from '../dev/invariant';
import type {
  BackgroundView,
  ComputedShape,
  StateDefinitionLike,
  StateView,
  VarsShape,
  ViewSource,
} from './define';
import type { StateNode } from './node';

export type ExclusiveRunner = <R>(
  fn: (views: ViewSource) => R | Promise<R>
) => Promise<R>;

export interface ViewOptions {
  mode: 'mutable' | 'readonly';
  /** ImmutableStateError message for rejected writes. */
  readonlyReason?: string;
  /** Present on background views: runs `self.exclusive(fn)`. */
  exclusive?: ExclusiveRunner;
}

const HELPERS = new Set([
  '$name',
  '$token',
  '$router',
  '$state',
  '$reset',
  'exclusive',
  'toJSON',
]);

const COLLECTION_MUTATORS = new Set(['set', 'add', 'delete', 'clear']);

// proxy -> raw value, so writes never store a proxy
const rawTargets = new WeakMap<object, object>();

interface TrackContext {
  guard(): void;
  changed(): void;
  proxies: WeakMap<object, object>;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isTrackable(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    (Array.isArray(value) ||
      isPlainObject(value) ||
      value instanceof Map ||
      value instanceof Set)
  );
}

function objectHandler(ctx: TrackContext): ProxyHandler<object> {
  return {
    get(target, prop, receiver) {
      const value: unknown = Reflect.get(target, prop, receiver);
      return typeof prop === 'symbol' ? value : track(value, ctx);
    },
    set(target, prop, value: unknown) {
      ctx.guard();
      const ok = Reflect.set(target, prop, untrack(value));
      ctx.changed();
      return ok;
    },
    deleteProperty(target, prop) {
      ctx.guard();
      const ok = Reflect.deleteProperty(target, prop);
      ctx.changed();
      return ok;
    },
  };
}

function collectionHandler(ctx: TrackContext): ProxyHandler<object> {
  return {
    get(target, prop) {
      const value: unknown = Reflect.get(target, prop, target);
      if (typeof value !== 'function') return value;
      if (typeof prop === 'string' && COLLECTION_MUTATORS.has(prop)) {
        return (...args: unknown[]) => {
          ctx.guard();
          const result: unknown = value.apply(target, args.map(untrack));
          ctx.changed();
          return result === target ? ctx.proxies.get(target) : result;
        };
      }
      if (prop === 'get') {
        return (key: unknown) => {
          const result: unknown = value.call(target, key);
          return track(result, ctx);
        };
      }
      const bound: unknown = value.bind(target);
      return bound;
    },
  };
}

function track(value: unknown, ctx: TrackContext): unknown {
  if (!isTrackable(value)) return value;
  const cached = ctx.proxies.get(value);
  if (cached) return cached;
  const handler =
    value instanceof Map || value instanceof Set
      ? collectionHandler(ctx)
      : objectHandler(ctx);
  const proxy = new Proxy(value, handler);
  ctx.proxies.set(value, proxy);
  rawTargets.set(proxy, value);
  return proxy;
}

/** Strip tracking proxies from a value before it is stored. */
export function untrack(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  const raw = rawTargets.get(value);
  if (raw) return raw;
  if (Array.isArray(value)) {
    const mapped = value.map(untrack);
    return mapped.some((item, i) => item !== value[i]) ? mapped : value;
  }
  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    const mapped = entries.map(([key, item]) => [key, untrack(item)] as const);
    return mapped.some(([, item], i) => item !== entries[i]?.[1])
      ? Object.fromEntries(mapped)
      : value;
  }
  return value;
}

function createView<T extends object>(
  resolve: () => StateNode,
  options: ViewOptions
): T {
  const proxiesByVar = new Map<string, WeakMap<object, object>>();

  const guard = (): void => {
    if (options.mode === 'readonly') {
      throw new ImmutableStateError(
        options.readonlyReason ?? 'State is read-only here'
      );
    }
  };

  const contextFor = (name: string): TrackContext => {
    let proxies = proxiesByVar.get(name);
    if (!proxies) {
      proxies = new WeakMap();
      proxiesByVar.set(name, proxies);
    }
    return {
      guard,
      changed: () => resolve().markDirty(name),
      proxies,
    };
  };

  const exclusive = (fn: unknown): Promise<unknown> => {
    const runner = options.exclusive;
    invariant(runner !== undefined, 'exclusive() is only available in background handlers');
    if (typeof fn !== 'function') {
      throw new TypeError('exclusive() expects a function');
    }
    return runner((views) => {
      const result: unknown = fn(views.view());
      return result;
    });
  };

  const helper = (prop: string): unknown => {
    switch (prop) {
      case '$name':
        return resolve().fullName;
      case '$token':
        return resolve().token;
      case '$router':
        return resolve().context.router;
      case '$state':
        return (def: StateDefinitionLike) =>
          createView<object>(() => resolve().root.getSubstate(def.fullName), {
            mode: options.mode,
            readonlyReason: options.readonlyReason,
          });
      case '$reset':
        return () => {
          guard();
          resolve().reset();
        };
      case 'exclusive':
        return options.exclusive ? exclusive : undefined;
      case 'toJSON':
        return () => {
          const node = resolve();
          return Object.fromEntries(
            [...node.varNames(), ...node.computedNames()].map((name) => [
              name,
              node.get(name),
            ])
          );
        };
      default:
        return undefined;
    }
  };

  const read = (prop: string): unknown => {
    if (HELPERS.has(prop)) return helper(prop);
    const node = resolve();
    if (node.isPlainVar(prop)) return track(node.get(prop), contextFor(prop));
    if (node.isComputedVar(prop)) return node.get(prop);
    return undefined;
  };

  const isMember = (prop: string): boolean => {
    const node = resolve();
    return node.isPlainVar(prop) || node.isComputedVar(prop);
  };

  const handler: ProxyHandler<object> = {
    get(_target, prop) {
      if (typeof prop === 'symbol' || prop === 'then') return undefined;
      return read(prop);
    },
    set(_target, prop, value: unknown) {
      if (typeof prop === 'symbol') return false;
      guard();
      resolve().set(prop, untrack(value));
      return true;
    },
    deleteProperty(_target, prop) {
      throw new ImmutableStateError(
        `Vars cannot be deleted (tried '${String(prop)}')`
      );
    },
    has(_target, prop) {
      if (typeof prop === 'symbol') return false;
      return isMember(prop) || HELPERS.has(prop);
    },
    ownKeys() {
      const node = resolve();
      return [...node.varNames(), ...node.computedNames()];
    },
    getOwnPropertyDescriptor(_target, prop) {
      if (typeof prop === 'symbol' || !isMember(prop)) return undefined;
      return {
        configurable: true,
        enumerable: true,
        writable: options.mode === 'mutable' && resolve().isPlainVar(prop),
        value: read(prop),
      };
    },
  };

  // Every member of T is answered by the handler above.
  return new Proxy<object>({}, handler) as T;
}

/**
 * Views over the node returned by `resolve`. `resolve` is called on every
 * access, so a background task's view follows the tree it last reloaded.
 */
export function createViewSource(
  resolve: () => StateNode,
  options: ViewOptions
): ViewSource {
  return {
    view<V extends VarsShape, C extends ComputedShape>(): StateView<V, C> {
      return createView<StateView<V, C>>(resolve, {
        mode: options.mode,
        readonlyReason: options.readonlyReason,
      });
    },
    backgroundView<
      V extends VarsShape,
      C extends ComputedShape,
    >(): BackgroundView<V, C> {
      invariant(
        options.exclusive !== undefined,
        'Background views need an exclusive runner'
      );
      return createView<BackgroundView<V, C>>(resolve, options);
    },
    set(name, value) {
      if (options.mode === 'readonly') {
        throw new ImmutableStateError(
          options.readonlyReason ?? 'State is read-only here'
        );
      }
      resolve().set(name, untrack(value));
    },
  };
}
