/**
 * State managers
 *
 * Where client trees live between events. The contract is small: get (or
 * create) the tree for a token, store it back, check for it, evict it. One
 * writer per token is enforced by the manager's TokenLock, which callers
 * take around every read-modify-write.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SerializationError } from '../common/errors';
import { logger } from '../dev/logger';
import { TokenLock } from '../runtime/lock';
import type { StateNode, TreeSnapshot } from './node';
import type { StateRegistry } from './registry';
import {
  defaultSerializers,
  type JsonValue,
  type SerializerRegistry,
} from './serializers';

export interface StateManager {
  readonly lock: TokenLock;
  /** The tree for `token`, created with defaults when there is none. */
  getState(token: string): Promise<StateNode>;
  setState(token: string, tree: StateNode): Promise<void>;
  hasState(token: string): Promise<boolean>;
  evict(token: string): Promise<void>;
  /** Read-modify-write under the token lock. */
  modifyState<T>(
    token: string,
    fn: (tree: StateNode) => T | Promise<T>
  ): Promise<T>;
  close(): Promise<void>;
}

export interface StateManagerOptions {
  /** Seconds of inactivity after which a token's state expires. */
  tokenExpiration: number;
  /** Clock in milliseconds. */
  now?: () => number;
}

// Expired tokens are swept on access at most this often.
const SWEEP_INTERVAL_MS = 60_000;

export abstract class BaseStateManager implements StateManager {
  readonly lock = new TokenLock();
  protected readonly now: () => number;
  protected readonly expirationMs: number;
  private lastSweep: number;

  constructor(
    protected readonly registry: StateRegistry,
    options: StateManagerOptions
  ) {
    this.now = options.now ?? Date.now;
    this.expirationMs = options.tokenExpiration * 1000;
    this.lastSweep = this.now();
  }

  abstract getState(token: string): Promise<StateNode>;
  abstract setState(token: string, tree: StateNode): Promise<void>;
  abstract hasState(token: string): Promise<boolean>;
  abstract evict(token: string): Promise<void>;

  async modifyState<T>(
    token: string,
    fn: (tree: StateNode) => T | Promise<T>
  ): Promise<T> {
    return this.lock.run(token, async () => {
      const tree = await this.getState(token);
      const result = await fn(tree);
      await this.setState(token, tree);
      return result;
    });
  }

  async close(): Promise<void> {}

  /** Drop every expired live tree; returns how many were dropped. */
  abstract purgeExpired(): number;

  protected isExpired(touchedAt: number): boolean {
    return this.now() - touchedAt > this.expirationMs;
  }

  protected sweep(): void {
    const now = this.now();
    if (now - this.lastSweep < Math.min(this.expirationMs, SWEEP_INTERVAL_MS)) {
      return;
    }
    this.lastSweep = now;
    const dropped = this.purgeExpired();
    if (dropped > 0) logger.debug(`[Tether] Purged ${dropped} expired token(s)`);
  }
}

interface LiveEntry {
  tree: StateNode;
  touchedAt: number;
}

/** Keeps live trees in process memory. */
export class MemoryStateManager extends BaseStateManager {
  private readonly states = new Map<string, LiveEntry>();

  async getState(token: string): Promise<StateNode> {
    this.sweep();
    const entry = this.live(token);
    if (entry) {
      entry.touchedAt = this.now();
      return entry.tree;
    }
    const tree = this.registry.createTree(token);
    this.states.set(token, { tree, touchedAt: this.now() });
    return tree;
  }

  async setState(token: string, tree: StateNode): Promise<void> {
    this.states.set(token, { tree, touchedAt: this.now() });
  }

  async hasState(token: string): Promise<boolean> {
    return this.live(token) !== null;
  }

  async evict(token: string): Promise<void> {
    this.states.delete(token);
  }

  purgeExpired(): number {
    let dropped = 0;
    for (const [token, entry] of this.states) {
      if (this.isExpired(entry.touchedAt)) {
        this.states.delete(token);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.states.size;
  }

  private live(token: string): LiveEntry | null {
    const entry = this.states.get(token);
    if (!entry) return null;
    if (this.isExpired(entry.touchedAt)) {
      logger.debug(`[Tether] State for token '${token}' expired`);
      this.states.delete(token);
      return null;
    }
    return entry;
  }
}

// Disk persistence

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * JSON form of a plain var value. Dates, sets, maps, bigints and non-finite
 * numbers are tagged so they come back as the same type; plain objects that
 * carry their own `$type` key are tagged too. Other class instances go
 * through `serializers` when given and come back as their JSON form.
 */
export function encodeValue(
  value: unknown,
  path = 'value',
  serializers?: SerializerRegistry
): JsonValue {
  const recurse = (item: unknown, at: string) =>
    encodeValue(item, at, serializers);

  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? value
      : { $type: 'number', value: String(value) };
  }
  if (typeof value === 'bigint') {
    return { $type: 'bigint', value: value.toString() };
  }
  if (typeof value !== 'object') {
    throw new SerializationError(typeof value, path);
  }
  if (value instanceof Date) {
    return { $type: 'date', value: value.toISOString() };
  }
  if (value instanceof Set) {
    return {
      $type: 'set',
      value: [...value].map((item: unknown, i) => recurse(item, `${path}[${i}]`)),
    };
  }
  if (value instanceof Map) {
    return {
      $type: 'map',
      value: [...value].map(([k, v]: [unknown, unknown], i) => [
        recurse(k, `${path}[${i}]`),
        recurse(v, `${path}[${i}]`),
      ]),
    };
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => recurse(item, `${path}[${i}]`));
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = recurse(item, `${path}.${key}`);
    }
    return Object.prototype.hasOwnProperty.call(out, '$type')
      ? { $type: 'object', value: out }
      : out;
  }
  if (serializers) {
    return { $type: 'serialized', value: serializers.serialize(value, path) };
  }
  throw new SerializationError(value.constructor?.name ?? 'Object', path);
}

function decodeEntries(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) out[key] = decodeValue(item);
  return out;
}

export function decodeValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(decodeValue);
  if (typeof value !== 'object' || value === null) return value;

  const record: Record<string, unknown> = { ...value };
  const keys = Object.keys(record);
  if (keys.length === 2 && keys.includes('$type') && keys.includes('value')) {
    const inner = record.value;
    switch (record.$type) {
      case 'number':
        if (typeof inner === 'string') return Number(inner);
        break;
      case 'bigint':
        if (typeof inner === 'string') return BigInt(inner);
        break;
      case 'date':
        if (typeof inner === 'string') return new Date(inner);
        break;
      case 'set':
        if (Array.isArray(inner)) return new Set(inner.map(decodeValue));
        break;
      case 'map':
        if (Array.isArray(inner)) {
          return new Map(
            inner.map((pair: unknown): [unknown, unknown] =>
              Array.isArray(pair)
                ? [decodeValue(pair[0]), decodeValue(pair[1])]
                : [pair, undefined]
            )
          );
        }
        break;
      case 'object':
        if (typeof inner === 'object' && inner !== null && !Array.isArray(inner)) {
          return decodeEntries(inner);
        }
        break;
      case 'serialized':
        return inner;
      default:
        break;
    }
  }
  return decodeEntries(record);
}

function encodeSnapshot(
  snapshot: TreeSnapshot,
  serializers: SerializerRegistry
): string {
  const out: Record<string, Record<string, JsonValue>> = {};
  for (const [state, vars] of Object.entries(snapshot)) {
    const encoded: Record<string, JsonValue> = {};
    for (const [name, value] of Object.entries(vars)) {
      encoded[name] = encodeValue(value, `${state}.${name}`, serializers);
    }
    out[state] = encoded;
  }
  return JSON.stringify(out);
}

function decodeSnapshot(text: string): TreeSnapshot {
  const parsed: unknown = JSON.parse(text);
  const out: TreeSnapshot = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return out;
  }
  for (const [state, vars] of Object.entries(parsed)) {
    if (typeof vars !== 'object' || vars === null) continue;
    const decoded: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(vars)) {
      decoded[name] = decodeValue(value);
    }
    out[state] = decoded;
  }
  return out;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export interface DiskStateManagerOptions extends StateManagerOptions {
  stateDir: string;
  /** Encodes class instances that have no built-in persisted form. */
  serializers?: SerializerRegistry;
}

/**
 * Persists each token's plain vars as one JSON file and keeps the live trees
 * in memory. A file or live tree idle for longer than the token expiration
 * is treated as absent. Persisted values the var schema no longer accepts,
 * and files that cannot be read, fall back to the defaults.
 */
export class DiskStateManager extends BaseStateManager {
  private readonly states = new Map<string, LiveEntry>();
  private readonly serializers: SerializerRegistry;
  readonly stateDir: string;

  constructor(registry: StateRegistry, options: DiskStateManagerOptions) {
    super(registry, options);
    this.stateDir = options.stateDir;
    this.serializers = options.serializers ?? defaultSerializers;
  }

  pathFor(token: string): string {
    return join(this.stateDir, `${encodeURIComponent(token)}.json`);
  }

  async getState(token: string): Promise<StateNode> {
    this.sweep();
    const cached = this.live(token);
    if (cached) {
      cached.touchedAt = this.now();
      return cached.tree;
    }

    const tree = this.registry.createTree(token);
    const snapshot = await this.load(token);
    if (snapshot !== null) tree.restore(snapshot);
    this.states.set(token, { tree, touchedAt: this.now() });
    return tree;
  }

  async setState(token: string, tree: StateNode): Promise<void> {
    this.states.set(token, { tree, touchedAt: this.now() });
    const text = encodeSnapshot(tree.snapshot(), this.serializers);
    await mkdir(this.stateDir, { recursive: true });
    await writeFile(this.pathFor(token), text, 'utf8');
  }

  async hasState(token: string): Promise<boolean> {
    if (this.live(token)) return true;
    return (await this.readFresh(token)) !== null;
  }

  async evict(token: string): Promise<void> {
    this.states.delete(token);
    await rm(this.pathFor(token), { force: true });
  }

  purgeExpired(): number {
    let dropped = 0;
    for (const [token, entry] of this.states) {
      if (this.isExpired(entry.touchedAt)) {
        this.states.delete(token);
        dropped++;
      }
    }
    return dropped;
  }

  /** Live trees held in memory. */
  get size(): number {
    return this.states.size;
  }

  async close(): Promise<void> {
    this.states.clear();
  }

  private live(token: string): LiveEntry | null {
    const entry = this.states.get(token);
    if (!entry) return null;
    if (this.isExpired(entry.touchedAt)) {
      this.states.delete(token);
      return null;
    }
    return entry;
  }

  private async load(token: string): Promise<TreeSnapshot | null> {
    let snapshot: TreeSnapshot;
    try {
      const text = await this.readFresh(token);
      if (text === null) return null;
      snapshot = decodeSnapshot(text);
    } catch (error) {
      logger.error(
        `[Tether] Could not read persisted state for token '${token}'; starting from defaults:`,
        error
      );
      return null;
    }
    return this.accepted(snapshot);
  }

  /** Drop persisted values the var schema rejects. */
  private accepted(snapshot: TreeSnapshot): TreeSnapshot {
    const out: TreeSnapshot = {};
    for (const [state, vars] of Object.entries(snapshot)) {
      const shape = this.registry.get(state)?.shape;
      const kept: Record<string, unknown> = {};
      for (const [name, value] of Object.entries(vars)) {
        const schema = shape?.[name];
        if (schema) {
          const result = schema.safeParse(value);
          if (!result.success) {
            logger.warn(
              `[Tether] Dropping persisted var '${state}.${name}': ${result.error.issues[0]?.message ?? 'invalid value'}`
            );
            continue;
          }
        }
        kept[name] = value;
      }
      out[state] = kept;
    }
    return out;
  }

  private async readFresh(token: string): Promise<string | null> {
    const file = this.pathFor(token);
    try {
      const info = await stat(file);
      if (this.isExpired(info.mtimeMs)) {
        logger.debug(`[Tether] Persisted state for token '${token}' expired`);
        await rm(file, { force: true });
        return null;
      }
      return await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}
