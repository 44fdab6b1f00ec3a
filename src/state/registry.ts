/**
 * State registry
 *
 * Holds the definitions of one app, checks that they form a single tree and
 * owns the static dependency map: `(state, var)` to the computed vars, in any
 * node of the tree, that read it. The map is built once here and never at
 * access time.
 */

import { StateDefinitionError, StateNotFoundError } from '../common/errors';
import { emptyRouterData, type RouterData } from '../events/event';
import { logger } from '../dev/logger';
import {
  describeStorage,
  getClientStorage,
  type StorageDescriptor,
} from '../vars/storage';
import type {
  DepRef,
  HandlerEntry,
  StateDefinitionLike,
} from './define';
import { discoverDependencies, readsOtherStates } from './dependencies';
import { StateNode } from './node';

export interface ResolvedHandler {
  definition: StateDefinitionLike;
  entry: HandlerEntry;
}

function depKey(state: string, name: string): string {
  return `${state}#${name}`;
}

export class StateRegistry {
  readonly root: StateDefinitionLike;
  private readonly byName = new Map<string, StateDefinitionLike>();
  private readonly childNames = new Map<string, string[]>();
  private readonly dependents = new Map<string, DepRef[]>();
  private readonly storage: StorageDescriptor[] = [];

  constructor(definitions: readonly StateDefinitionLike[]) {
    if (definitions.length === 0) {
      throw new StateDefinitionError('An app needs at least one state');
    }

    let root: StateDefinitionLike | null = null;
    for (const def of definitions) {
      if (this.byName.has(def.fullName)) {
        throw new StateDefinitionError(
          `State '${def.fullName}' is registered twice`
        );
      }
      this.byName.set(def.fullName, def);
      if (def.parentName === null) {
        if (root) {
          throw new StateDefinitionError(
            `Only one root state is allowed; found '${root.fullName}' and '${def.fullName}'`
          );
        }
        root = def;
      }
    }
    if (!root) {
      throw new StateDefinitionError('No root state (a state without parent)');
    }
    this.root = root;

    for (const def of definitions) {
      if (def.parentName === null) continue;
      if (!this.byName.has(def.parentName)) {
        throw new StateDefinitionError(
          `State '${def.fullName}' names parent '${def.parentName}', which is not registered`
        );
      }
      const siblings = this.childNames.get(def.parentName) ?? [];
      siblings.push(def.name);
      this.childNames.set(def.parentName, siblings);
    }

    for (const def of definitions) {
      this.collectDependencies(def);
      for (const [name, type] of Object.entries(def.shape)) {
        const options = getClientStorage(type);
        if (options) {
          this.storage.push(describeStorage(def.fullName, name, options));
        }
      }
    }
  }

  get(fullName: string): StateDefinitionLike | undefined {
    return this.byName.get(fullName);
  }

  require(fullName: string): StateDefinitionLike {
    const def = this.byName.get(fullName);
    if (!def) throw new StateNotFoundError(fullName);
    return def;
  }

  definitions(): IterableIterator<StateDefinitionLike> {
    return this.byName.values();
  }

  children(fullName: string): readonly string[] {
    return this.childNames.get(fullName) ?? [];
  }

  /** Computed vars that read `(state, name)` directly. */
  dependentsOf(state: string, name: string): readonly DepRef[] {
    return this.dependents.get(depKey(state, name)) ?? [];
  }

  storageVars(): readonly StorageDescriptor[] {
    return this.storage;
  }

  /** Split `state.path.handler` and look the handler up. */
  resolveHandler(name: string): ResolvedHandler | null {
    const dot = name.lastIndexOf('.');
    if (dot <= 0) return null;
    const definition = this.byName.get(name.slice(0, dot));
    const entry = definition?.handlers.get(name.slice(dot + 1));
    return definition && entry ? { definition, entry } : null;
  }

  createTree(token: string, router: RouterData = emptyRouterData()): StateNode {
    return new StateNode(this, this.root, null, { token, router });
  }

  private collectDependencies(def: StateDefinitionLike): void {
    const local = new Set([
      ...Object.keys(def.shape),
      ...def.computedVars.keys(),
    ]);

    for (const [name, entry] of def.computedVars) {
      if (entry.deps === null && readsOtherStates(entry.source)) {
        throw new StateDefinitionError(
          `Computed var '${def.fullName}.${name}' reads other states through $state(); declare its deps explicitly`
        );
      }
      const deps =
        entry.deps ??
        discoverDependencies(entry.source, local)
          .filter((dep) => dep !== name)
          .map((dep) => ({ state: def.fullName, name: dep }));

      if (entry.deps === null && deps.length === 0) {
        logger.debug(
          `[Tether] Computed var '${def.fullName}.${name}' has no discovered dependencies; it will only recompute when uncached`
        );
      }

      for (const dep of deps) {
        const owner = this.byName.get(dep.state);
        const exists =
          owner !== undefined &&
          (Object.prototype.hasOwnProperty.call(owner.shape, dep.name) ||
            owner.computedVars.has(dep.name));
        if (!exists) {
          throw new StateDefinitionError(
            `Computed var '${def.fullName}.${name}' depends on unknown var '${dep.state}.${dep.name}'`
          );
        }
        const key = depKey(dep.state, dep.name);
        const list = this.dependents.get(key) ?? [];
        list.push({ state: def.fullName, name });
        this.dependents.set(key, list);
      }
    }
  }
}
