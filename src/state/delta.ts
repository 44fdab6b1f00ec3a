/**
 * Delta builder
 *
 * Walks the dirty parts of a tree, serializes the changed values and clears
 * every dirty set, also when serialization fails. Running it twice without a
 * mutation in between yields an empty delta the second time.
 */

import { isBackendVar, type Delta, type StateNode } from './node';
import { defaultSerializers, type JsonValue, type SerializerRegistry } from './serializers';

export type { Delta };

export function buildDelta(
  root: StateNode,
  serializers: SerializerRegistry = defaultSerializers
): Delta {
  const delta: Delta = {};

  const visit = (node: StateNode): void => {
    if (node.dirtyVars.size > 0) {
      const names = new Set(node.dirtyVars);
      // Uncached computed vars can change with any write to their node.
      for (const [name, entry] of node.definition.computedVars) {
        if (!entry.cache) names.add(name);
      }
      const vars: Record<string, JsonValue> = {};
      for (const name of names) {
        if (isBackendVar(name)) continue;
        vars[name] = serializers.serialize(
          node.get(name),
          `${node.fullName}.${name}`
        );
      }
      if (Object.keys(vars).length > 0) delta[node.fullName] = vars;
    }
    for (const childName of node.dirtySubstates) {
      const child = node.children.get(childName);
      if (child) visit(child);
    }
  };

  try {
    visit(root);
  } finally {
    root.clean();
  }
  return delta;
}

export function isEmptyDelta(delta: Delta): boolean {
  return Object.keys(delta).length === 0;
}
