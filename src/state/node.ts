/**
 * State nodes and the dirty tracker.
 *
 * One node per definition per client, linked into a strict tree. Children
 * materialize on first access with default values. Every write marks the
 * var dirty, whether or not the value changed; the registry's dependency map
 * then invalidates dependent computed vars, in this node or any other node of
 * the tree, and adds them to their node's dirty set.
 */

import {
  ComputedVarError,
  StateNotFoundError,
  UnknownVarError,
} from '../common/errors';
import type { RouterData } from '../events/event';
import { logger } from '../dev/logger';
import type { StateDefinitionLike } from './define';
import { createViewSource } from './proxy';
import type { StateRegistry } from './registry';
import {
  defaultSerializers,
  type JsonValue,
  type SerializerRegistry,
} from './serializers';

export interface TreeContext {
  readonly token: string;
  router: RouterData;
}

/** Per-node plain var values, keyed by node full name. */
export type TreeSnapshot = Record<string, Record<string, unknown>>;

/** `{ [stateFullName]: { [varName]: value } }` */
export type Delta = Record<string, Record<string, JsonValue>>;

/** Vars whose name starts with `_` stay on the server. */
export function isBackendVar(name: string): boolean {
  return name.startsWith('_');
}

export class StateNode {
  readonly children = new Map<string, StateNode>();
  readonly dirtyVars = new Set<string>();
  readonly dirtySubstates = new Set<string>();
  private readonly values: Map<string, unknown>;
  private readonly cache = new Map<string, unknown>();

  constructor(
    readonly registry: StateRegistry,
    readonly definition: StateDefinitionLike,
    readonly parent: StateNode | null,
    readonly context: TreeContext
  ) {
    this.values = new Map(Object.entries(definition.defaults()));
  }

  get name(): string {
    return this.definition.name;
  }

  get fullName(): string {
    return this.definition.fullName;
  }

  get token(): string {
    return this.context.token;
  }

  get root(): StateNode {
    return this.parent ? this.parent.root : this;
  }

  isPlainVar(name: string): boolean {
    return this.values.has(name);
  }

  isComputedVar(name: string): boolean {
    return this.definition.computedVars.has(name);
  }

  varNames(): string[] {
    return [...this.values.keys()];
  }

  computedNames(): string[] {
    return [...this.definition.computedVars.keys()];
  }

  get(name: string): unknown {
    if (this.values.has(name)) return this.values.get(name);

    const entry = this.definition.computedVars.get(name);
    if (!entry) {
      throw new UnknownVarError(this.fullName, name, 'is not a var');
    }
    if (entry.cache && this.cache.has(name)) return this.cache.get(name);

    let value: unknown;
    try {
      value = entry.compute(
        createViewSource(() => this, {
          mode: 'readonly',
          readonlyReason: `Computed var '${this.fullName}.${name}' cannot modify state`,
        })
      );
    } catch (error) {
      if (error instanceof ComputedVarError) throw error;
      throw new ComputedVarError(this.fullName, name, error);
    }
    if (entry.cache) this.cache.set(name, value);
    return value;
  }

  /** Overwrite a plain var. Always marks it dirty. */
  set(name: string, value: unknown): void {
    if (!this.values.has(name)) {
      throw new UnknownVarError(
        this.fullName,
        name,
        this.isComputedVar(name)
          ? 'is a read-only computed var'
          : 'is not a plain var'
      );
    }
    this.values.set(name, value);
    this.markDirty(name);
  }

  markDirty(name: string): void {
    this.dirtyVars.add(name);
    this.markAncestors();

    const queue = [...this.registry.dependentsOf(this.fullName, name)];
    const seen = new Set<string>();
    for (let i = 0; i < queue.length; i++) {
      const dep = queue[i];
      if (!dep) continue;
      const key = `${dep.state}#${dep.name}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const node =
        dep.state === this.fullName ? this : this.root.getSubstate(dep.state);
      node.cache.delete(dep.name);
      node.dirtyVars.add(dep.name);
      node.markAncestors();
      queue.push(...this.registry.dependentsOf(dep.state, dep.name));
    }
  }

  private markAncestors(): void {
    let name = this.name;
    let parent = this.parent;
    while (parent) {
      parent.dirtySubstates.add(name);
      name = parent.name;
      parent = parent.parent;
    }
  }

  /** Child by short name, created with defaults on first access. */
  child(name: string): StateNode {
    const existing = this.children.get(name);
    if (existing) return existing;
    const definition = this.registry.get(`${this.fullName}.${name}`);
    if (!definition || definition.parentName !== this.fullName) {
      throw new StateNotFoundError(`${this.fullName}.${name}`);
    }
    const node = new StateNode(this.registry, definition, this, this.context);
    this.children.set(name, node);
    return node;
  }

  /**
   * Resolve a dotted path. A leading segment equal to this node's name is
   * skipped, so both `app.child` and `child` work from the root `app`.
   */
  getSubstate(path: string | readonly string[]): StateNode {
    const parts = typeof path === 'string' ? path.split('.') : [...path];
    if (parts[0] === this.name) parts.shift();
    try {
      return parts.reduce<StateNode>(
        (node, part) => (part ? node.child(part) : node),
        this
      );
    } catch (error) {
      if (error instanceof StateNotFoundError) {
        throw new StateNotFoundError(
          typeof path === 'string' ? path : path.join('.')
        );
      }
      throw error;
    }
  }

  /** Materialize every defined descendant. */
  materializeAll(): void {
    for (const name of this.registry.children(this.fullName)) {
      this.child(name).materializeAll();
    }
  }

  /** Materialized nodes of this subtree, depth first, this node first. */
  *walk(): Generator<StateNode> {
    yield this;
    for (const child of this.children.values()) yield* child.walk();
  }

  /** Restore defaults of every plain var in the subtree, marking them dirty. */
  reset(): void {
    for (const node of this.walk()) {
      for (const [name, value] of Object.entries(node.definition.defaults())) {
        node.set(name, value);
      }
    }
  }

  /** Clear dirty sets in the whole subtree. */
  clean(): void {
    for (const node of this.walk()) {
      node.dirtyVars.clear();
      node.dirtySubstates.clear();
    }
  }

  /**
   * Full serialized state of the subtree: frontend plain vars and computed
   * vars of every node, materializing undefined children on the way.
   */
  dict(serializers: SerializerRegistry = defaultSerializers): Delta {
    this.materializeAll();
    const out: Delta = {};
    for (const node of this.walk()) {
      const vars: Record<string, JsonValue> = {};
      for (const name of [...node.varNames(), ...node.computedNames()]) {
        if (isBackendVar(name)) continue;
        vars[name] = serializers.serialize(
          node.get(name),
          `${node.fullName}.${name}`
        );
      }
      out[node.fullName] = vars;
    }
    return out;
  }

  /** Plain var values of every materialized node, backend vars included. */
  snapshot(): TreeSnapshot {
    const out: TreeSnapshot = {};
    for (const node of this.walk()) {
      out[node.fullName] = Object.fromEntries(node.values);
    }
    return out;
  }

  /**
   * Load a snapshot without marking anything dirty. Nodes or vars that no
   * longer exist are skipped with a warning.
   */
  restore(snapshot: TreeSnapshot): void {
    for (const [fullName, vars] of Object.entries(snapshot)) {
      let node: StateNode;
      try {
        node = this.getSubstate(fullName);
      } catch (error) {
        if (!(error instanceof StateNotFoundError)) throw error;
        logger.warn(`[Tether] Dropping persisted state '${fullName}': ${error.message}`);
        continue;
      }
      for (const [name, value] of Object.entries(vars)) {
        if (!node.values.has(name)) {
          logger.warn(
            `[Tether] Dropping persisted var '${fullName}.${name}': not a plain var`
          );
          continue;
        }
        node.values.set(name, value);
      }
      node.cache.clear();
    }
  }
}
