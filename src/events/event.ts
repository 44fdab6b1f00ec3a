/**
 * Events, event specs and handler references.
 *
 * An `Event` is one inbound request from a client. An `EventSpec` names a
 * handler plus its arguments: concrete values when a handler returns or
 * yields it on the server, Vars when it is compiled into a client trigger.
 * Specs whose handler name starts with `_` are client events: they are
 * forwarded to the client in order instead of being dispatched.
 */

import type { ErrorInfo } from '../common/errors';

export interface RouterData {
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  clientIp: string | null;
  sessionId: string | null;
}

export function emptyRouterData(): RouterData {
  return { path: '/', query: {}, headers: {}, clientIp: null, sessionId: null };
}

/** One inbound event, created at the transport boundary and never persisted. */
export interface Event {
  token: string;
  name: string;
  payload: Record<string, unknown> | unknown[];
  routerData: RouterData;
}

export class EventSpec {
  readonly args: Readonly<Record<string, unknown>>;

  constructor(
    readonly handler: string,
    args: Record<string, unknown> = {}
  ) {
    this.args = Object.freeze({ ...args });
  }

  get isClientEvent(): boolean {
    return isClientEventName(this.handler);
  }
}

/**
 * Callable reference to a handler: `ref()` or `ref({ amount: 5 })` builds a
 * spec for it.
 */
export interface EventRef<P extends object = Record<string, never>> {
  (payload?: P): EventSpec;
  readonly name: string;
  readonly state: string;
  readonly fullName: string;
  readonly argNames: readonly string[];
}

/** Any handler reference, whatever its payload type. */
export type AnyEventRef = EventRef<never>;

const refs = new WeakSet<object>();

/**
 * Build a handler reference. `bound` arguments are fixed and merged under
 * the caller's payload.
 */
export function createEventRef<P extends object>(
  state: string,
  name: string,
  argNames: readonly string[],
  bound: Record<string, unknown> = {}
): EventRef<P> {
  const fullName = `${state}.${name}`;
  const call = (payload?: P): EventSpec => {
    const args: Record<string, unknown> = payload
      ? Object.fromEntries(Object.entries(payload))
      : {};
    return new EventSpec(fullName, { ...bound, ...args });
  };
  const ref = Object.assign(call, {
    state,
    fullName,
    argNames: Object.freeze([...argNames]),
  });
  // Function#name is read-only; define it instead of assigning.
  Object.defineProperty(ref, 'name', { value: name });
  refs.add(ref);
  return ref;
}

export function isEventRef(value: unknown): value is AnyEventRef {
  return typeof value === 'function' && refs.has(value);
}

export function isClientEventName(name: string): boolean {
  return name.startsWith('_');
}

/** A handler return or yield item: a spec or a bare handler reference. */
export type EventLike = EventSpec | AnyEventRef;

export type EventYield = EventLike | readonly EventLike[] | null | undefined | void;

/**
 * Normalize a handler's return/yield value into a list of specs.
 * Throws TypeError for anything that is not an event.
 */
export function normalizeEvents(value: unknown): EventSpec[] {
  if (value === undefined || value === null) return [];
  if (value instanceof EventSpec) return [value];
  if (isEventRef(value)) return [value()];
  if (Array.isArray(value)) {
    return value.flatMap((item: unknown) => {
      if (Array.isArray(item)) {
        throw new TypeError('Nested lists of events are not supported');
      }
      return normalizeEvents(item);
    });
  }
  throw new TypeError(
    `Handlers may only return or yield event specs, handler references or lists of them; got ${typeof value}`
  );
}

// Client events

export function consoleLog(message: string): EventSpec {
  return new EventSpec('_console', { message });
}

export function windowAlert(message: string): EventSpec {
  return new EventSpec('_alert', { message });
}

export function redirect(
  path: string,
  options: { external?: boolean } = {}
): EventSpec {
  return new EventSpec('_redirect', {
    path,
    external: options.external ?? false,
  });
}

export function setClipboard(content: string): EventSpec {
  return new EventSpec('_set_clipboard', { content });
}

export function removeCookie(key: string): EventSpec {
  return new EventSpec('_remove_cookie', { key });
}

export function clearLocalStorage(): EventSpec {
  return new EventSpec('_clear_local_storage');
}

export function removeLocalStorage(key: string): EventSpec {
  return new EventSpec('_remove_local_storage', { key });
}

export function errorEvent(info: ErrorInfo): EventSpec {
  return new EventSpec('_error', { ...info });
}
