import path from "node:path";
import { loadManifest, describeIssues, readJsonFile } from "../manifest/loader.js";
import type { Manifest } from "../manifest/schema.js";
import type { ManifestSource, PluginId } from "../resolver/types.js";
import { ManifestParseError, UnknownPluginError } from "../utils/errors.js";
import { registryFileSchema, type PluginKind, type RegistryFile } from "./schema.js";

export interface RegistryEntry {
  id: PluginId;
  /** Absolute path of the plugin's manifest. */
  projectFile: string;
  kind: PluginKind;
}

/** Loaded registry handle. Passed explicitly; there is no process-wide registry. */
export interface Registry {
  file: string;
  entries: ReadonlyMap<PluginId, RegistryEntry>;
}

/** Build a registry from parsed file contents. Project paths resolve against `file`'s directory. */
export function createRegistry(file: string, contents: RegistryFile): Registry {
  const baseDir = path.dirname(path.resolve(file));
  const entries = new Map<PluginId, RegistryEntry>();
  for (const [id, entry] of Object.entries(contents.plugins)) {
    entries.set(id, {
      id,
      projectFile: path.resolve(baseDir, entry.project),
      kind: entry.kind,
    });
  }
  return { file: path.resolve(file), entries };
}

/** Load and validate a registry file. */
export function loadRegistry(file: string): Registry {
  const resolved = path.resolve(file);
  const parsed = registryFileSchema.safeParse(readJsonFile(resolved));
  if (!parsed.success) {
    throw new ManifestParseError(resolved, describeIssues(parsed.error));
  }
  return createRegistry(resolved, parsed.data);
}

function getEntry(registry: Registry, id: PluginId): RegistryEntry {
  const entry = registry.entries.get(id);
  if (!entry) {
    throw new UnknownPluginError(id);
  }
  return entry;
}

export function resolveProjectFile(registry: Registry, id: PluginId): string {
  return getEntry(registry, id).projectFile;
}

/** Libraries take part in ordering but have no loadable entry point. */
export function isLoadable(registry: Registry, id: PluginId): boolean {
  return getEntry(registry, id).kind === "plugin";
}

/** Keep only loadable identifiers, preserving order. */
export function filterLoadable(registry: Registry, ids: readonly PluginId[]): PluginId[] {
  return ids.filter((id) => isLoadable(registry, id));
}

/** Expose a registry through the collaborator interface the resolver consumes. */
export function createRegistrySource(
  registry: Registry,
  load: (filePath: string) => Manifest = loadManifest,
): ManifestSource {
  return {
    resolveProjectFile: (id) => resolveProjectFile(registry, id),
    loadManifest: load,
  };
}
