import type { PluginId } from "../resolver/types.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;
export const EXIT_FILE_NOT_FOUND = 600;
export const EXIT_MANIFEST_PARSE = 601;
export const EXIT_UNKNOWN_PLUGIN = 602;
export const EXIT_CYCLIC_DEPENDENCY = 603;
export const EXIT_MISSING_BINARY = 604;
export const EXIT_CONFIG_PARSE = 605;
export const EXIT_FILE_REPLACE = 610;

/** Base class for every error the tool reports to the user. */
export class ExtreqError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = "ExtreqError";
    this.exitCode = exitCode;
  }
}

export class FileNotFoundError extends ExtreqError {
  readonly path: string;

  constructor(filePath: string) {
    super(`'${filePath}' not found.`, EXIT_FILE_NOT_FOUND);
    this.name = "FileNotFoundError";
    this.path = filePath;
  }
}

export class ManifestParseError extends ExtreqError {
  readonly path: string;
  readonly detail?: string;

  constructor(filePath: string, detail?: string) {
    super(
      detail ? `Unable to parse '${filePath}': ${detail}` : `Unable to parse '${filePath}'.`,
      EXIT_MANIFEST_PARSE,
    );
    this.name = "ManifestParseError";
    this.path = filePath;
    this.detail = detail;
  }
}

export class UnknownPluginError extends ExtreqError {
  readonly pluginId: PluginId;

  constructor(pluginId: PluginId, requiredBy?: PluginId) {
    super(
      requiredBy
        ? `Unknown plugin '${pluginId}' (required by '${requiredBy}').`
        : `Unknown plugin '${pluginId}'.`,
      EXIT_UNKNOWN_PLUGIN,
    );
    this.name = "UnknownPluginError";
    this.pluginId = pluginId;
  }
}

/**
 * No valid load order exists. `unresolved` holds every identifier left over,
 * including ones only blocked behind a cycle.
 */
export class CyclicDependencyError extends ExtreqError {
  readonly unresolved: ReadonlySet<PluginId>;

  constructor(unresolved: Iterable<PluginId>) {
    const members = [...unresolved].sort();
    super(`No load order; unresolved due to a cycle: ${members.join(", ")}`, EXIT_CYCLIC_DEPENDENCY);
    this.name = "CyclicDependencyError";
    this.unresolved = new Set(members);
  }
}

export class MissingBinaryError extends ExtreqError {
  readonly pluginId: PluginId;

  constructor(pluginId: PluginId, platform: string, buildConfig: string) {
    super(
      `Plugin '${pluginId}' declares no binary for ${platform}/${buildConfig}.`,
      EXIT_MISSING_BINARY,
    );
    this.name = "MissingBinaryError";
    this.pluginId = pluginId;
  }
}

export class ConfigParseError extends ExtreqError {
  readonly path: string;

  constructor(filePath: string, detail: string) {
    super(`Invalid config '${filePath}': ${detail}`, EXIT_CONFIG_PARSE);
    this.name = "ConfigParseError";
    this.path = filePath;
  }
}

export class FileReplaceError extends ExtreqError {
  readonly path: string;

  readonly detail?: string;

  constructor(filePath: string, detail?: string) {
    super(
      detail
        ? `Unable to write file '${filePath}': ${detail}`
        : `Unable to replace file '${filePath}'. Please remove the file manually.`,
      EXIT_FILE_REPLACE,
    );
    this.name = "FileReplaceError";
    this.path = filePath;
    this.detail = detail;
  }
}

export class UsageError extends ExtreqError {
  constructor(message: string) {
    super(message, EXIT_USAGE);
    this.name = "UsageError";
  }
}
