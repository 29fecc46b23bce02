import type { Manifest } from "../manifest/schema.js";
import type { ManifestAccessor, ManifestSource, PluginId } from "./types.js";

/** Accessor that resolves the identifier's manifest path, then loads it. */
export function createAccessor(source: ManifestSource): ManifestAccessor {
  return {
    fetch(id: PluginId): Manifest {
      return source.loadManifest(source.resolveProjectFile(id));
    },
  };
}

/**
 * Memoize an accessor for the lifetime of one run, so the publish stage
 * can reuse manifests the closure builder already read.
 */
export function createCachingAccessor(inner: ManifestAccessor): ManifestAccessor {
  const cache = new Map<PluginId, Manifest>();
  return {
    fetch(id: PluginId): Manifest {
      const cached = cache.get(id);
      if (cached) return cached;
      const manifest = inner.fetch(id);
      cache.set(id, manifest);
      return manifest;
    },
  };
}
