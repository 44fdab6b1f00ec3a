/**
 * Client storage vars
 *
 * A var tagged with `clientStorage` holds a value the browser owns (cookie,
 * localStorage or sessionStorage). The server never assumes it knows that
 * value: on hydration the client sends its current value and the runtime
 * applies it before computing the first full state.
 */

import type { VarType } from './types';

export type StorageKind = 'cookie' | 'local' | 'session';

export interface ClientStorageOptions {
  kind: StorageKind;
  /** Storage key on the client; defaults to the var's full name. */
  name?: string;
  /** Cookie attributes. */
  path?: string;
  maxAge?: number;
  sameSite?: 'strict' | 'lax' | 'none';
  secure?: boolean;
  /** localStorage: follow changes made in other tabs. */
  sync?: boolean;
}

const tagged = new WeakMap<VarType, ClientStorageOptions>();

/**
 * Tag a var schema as client storage. Returns a fresh schema instance so the
 * same base schema can back several vars with different storage settings.
 *
 * @example
 * ```ts
 * defineState('app', {
 *   theme: clientStorage(z.string().default('light'), { kind: 'local' }),
 * });
 * ```
 */
export function clientStorage<T extends VarType>(
  schema: T,
  options: ClientStorageOptions
): T {
  const copy = schema.describe(`client ${options.kind} storage`);
  tagged.set(copy, { path: '/', ...options });
  return copy;
}

export function getClientStorage(type: VarType): ClientStorageOptions | null {
  return tagged.get(type) ?? null;
}

/**
 * Client-side description of one storage var, sent on hydration so the
 * client knows which keys to report.
 */
export interface StorageDescriptor {
  state: string;
  var: string;
  key: string;
  kind: StorageKind;
  options: Omit<ClientStorageOptions, 'kind' | 'name'>;
}

export function describeStorage(
  state: string,
  varName: string,
  options: ClientStorageOptions
): StorageDescriptor {
  const { kind, name, ...rest } = options;
  return {
    state,
    var: varName,
    key: name ?? `${state}.${varName}`,
    kind,
    options: rest,
  };
}
