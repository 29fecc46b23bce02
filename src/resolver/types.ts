import type { Manifest } from "../manifest/schema.js";

/** Opaque plugin identifier, unique within a registry. */
export type PluginId = string;

/** Direct dependencies of every identifier in a transitive closure. */
export type ClosureMap = Map<PluginId, PluginId[]>;

/** Identifiers ordered so each one follows all of its direct dependencies. */
export type OrderedList = PluginId[];

/** Yields one plugin's manifest. May hit the filesystem on every call. */
export interface ManifestAccessor {
  fetch(id: PluginId): Manifest;
}

/** Collaborators a registry provides to build a {@link ManifestAccessor}. */
export interface ManifestSource {
  resolveProjectFile(id: PluginId): string;
  loadManifest(filePath: string): Manifest;
}
