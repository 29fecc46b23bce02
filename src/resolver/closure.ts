import { UnknownPluginError } from "../utils/errors.js";
import type { ClosureMap, ManifestAccessor, PluginId } from "./types.js";

interface QueueItem {
  id: PluginId;
  requiredBy?: PluginId;
}

/**
 * Expand `seeds` into their transitive closure.
 *
 * An identifier is marked seen when it is enqueued, not when it is
 * processed, so each one is fetched exactly once even on cyclic graphs.
 * Dependency lists are recorded as declared; cycles are left for the
 * sequencer to report.
 */
export function buildClosure(seeds: Iterable<PluginId>, accessor: ManifestAccessor): ClosureMap {
  const closure: ClosureMap = new Map();
  const seen = new Set<PluginId>();
  const queue: QueueItem[] = [];

  for (const id of seeds) {
    if (seen.has(id)) continue;
    seen.add(id);
    queue.push({ id });
  }

  for (let head = 0; head < queue.length; head++) {
    const { id, requiredBy } = queue[head];

    let dependencies: PluginId[];
    try {
      dependencies = [...accessor.fetch(id).require];
    } catch (err) {
      // Name the dependent so a typo in a manifest is easy to find
      if (err instanceof UnknownPluginError && requiredBy !== undefined) {
        throw new UnknownPluginError(err.pluginId, requiredBy);
      }
      throw err;
    }
    closure.set(id, dependencies);

    for (const dep of dependencies) {
      if (seen.has(dep)) continue;
      seen.add(dep);
      queue.push({ id: dep, requiredBy: id });
    }
  }

  return closure;
}
