import path from "node:path";
import type { BuildConfig, Manifest } from "../manifest/schema.js";
import type { ManifestAccessor, OrderedList, PluginId } from "../resolver/types.js";
import { MissingBinaryError } from "../utils/errors.js";

export const DEFAULT_CLASS_NAME_PREFIX = "EngineExtension_";

export interface BuildTarget {
  platform: string;
  buildConfig: BuildConfig;
}

/** What publishing needs from a registry: classification plus manifests. */
export interface PublishRegistry extends ManifestAccessor {
  filterLoadable(ids: readonly PluginId[]): PluginId[];
}

/** One line of the extension list. */
export interface PublishRecord {
  id: PluginId;
  name: string;
  className: string;
  binaryPath: string;
  /** Empty when the plugin ships no assets. */
  assetPath: string;
}

export interface PublishOptions {
  classNamePrefix?: string;
}

/** Pick the manifest's binary for a target, relative to the manifest's directory. */
export function selectBinary(manifest: Manifest, target: BuildTarget): string | undefined {
  const binary = manifest.binary;
  if (binary === undefined || typeof binary === "string") return binary;
  const perPlatform = binary[target.platform];
  if (perPlatform === undefined || typeof perPlatform === "string") return perPlatform;
  return perPlatform[target.buildConfig];
}

/** Derive the load record of one plugin. */
export function toPublishRecord(
  id: PluginId,
  manifest: Manifest,
  target: BuildTarget,
  options: PublishOptions = {},
): PublishRecord {
  const binary = selectBinary(manifest, target);
  if (binary === undefined) {
    throw new MissingBinaryError(id, target.platform, target.buildConfig);
  }

  const manifestDir = path.dirname(manifest.path);
  const binaryPath = path.normalize(path.join(manifestDir, binary));
  const assetPath = manifest.assets ? path.normalize(path.join(manifestDir, manifest.assets)) : "";
  const prefix = options.classNamePrefix ?? DEFAULT_CLASS_NAME_PREFIX;

  return {
    id,
    name: manifest.name,
    className: prefix + path.basename(binaryPath, path.extname(binaryPath)),
    binaryPath,
    assetPath,
  };
}

/**
 * Turn a load order into extension-list records, dropping identifiers the
 * registry does not classify as loadable. Order is preserved.
 */
export function publish(
  ordered: OrderedList,
  registry: PublishRegistry,
  target: BuildTarget,
  options: PublishOptions = {},
): PublishRecord[] {
  return registry
    .filterLoadable(ordered)
    .map((id) => toPublishRecord(id, registry.fetch(id), target, options));
}
