import { buildClosure } from "./closure.js";
import { sequence } from "./sequencer.js";
import type { ClosureMap, ManifestAccessor, OrderedList, PluginId } from "./types.js";

export interface Resolution {
  closure: ClosureMap;
  order: OrderedList;
}

/** Build the closure of `seeds` and put it in load order. */
export function resolveRequirements(seeds: Iterable<PluginId>, accessor: ManifestAccessor): Resolution {
  const closure = buildClosure(seeds, accessor);
  return { closure, order: sequence(closure) };
}
