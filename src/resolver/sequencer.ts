import { CyclicDependencyError, UnknownPluginError } from "../utils/errors.js";
import type { OrderedList, PluginId } from "./types.js";

/**
 * Order a closure so every identifier follows its dependencies.
 *
 * Works in batches: each pass takes every identifier whose remaining
 * dependencies are all emitted, sorts that batch lexicographically and
 * appends it. Batches are never merged, so the output depends only on the
 * map's contents, not on its insertion order.
 *
 * @throws {UnknownPluginError} a dependency is not a key of `closure`
 * @throws {CyclicDependencyError} a pass finds nothing ready
 */
export function sequence(closure: ReadonlyMap<PluginId, readonly PluginId[]>): OrderedList {
  const pending = new Map<PluginId, Set<PluginId>>();
  for (const [id, deps] of closure) {
    for (const dep of deps) {
      if (!closure.has(dep)) {
        throw new UnknownPluginError(dep, id);
      }
    }
    pending.set(id, new Set(deps));
  }

  const result: OrderedList = [];
  while (pending.size > 0) {
    const ready: PluginId[] = [];
    for (const [id, deps] of pending) {
      if (deps.size === 0) ready.push(id);
    }

    if (ready.length === 0) {
      throw new CyclicDependencyError(pending.keys());
    }

    ready.sort();
    for (const id of ready) {
      pending.delete(id);
    }
    for (const deps of pending.values()) {
      for (const id of ready) deps.delete(id);
    }
    result.push(...ready);
  }

  return result;
}

