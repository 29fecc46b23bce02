import fs from "node:fs";
import path from "node:path";
import { loadConfig, type LoadConfigOptions } from "../config/manager.js";
import type { ExtreqConfig } from "../config/schema.js";
import { loadManifest } from "../manifest/loader.js";
import type { Manifest } from "../manifest/schema.js";
import { createRegistrySource, loadRegistry, type Registry } from "../registry/registry.js";
import { createAccessor, createCachingAccessor } from "../resolver/accessor.js";
import { resolveRequirements, type Resolution } from "../resolver/resolve.js";
import type { ManifestAccessor } from "../resolver/types.js";
import { CyclicDependencyError, ExtreqError, FileNotFoundError, UsageError } from "../utils/errors.js";
import { buildErrorReport } from "../publish/report.js";
import * as log from "../utils/logger.js";

export interface ProjectOptions {
  registry?: string;
  format?: "text" | "json";
  verbose?: boolean;
}

/** Everything one resolution run of a project produces. */
export interface ProjectRun {
  projectFile: string;
  project: Manifest;
  config: ExtreqConfig;
  registry: Registry;
  accessor: ManifestAccessor;
  resolution: Resolution;
}

/** Load the project, its config and registry, then resolve its requirements. */
export function resolveProject(
  projectFile: string,
  opts: ProjectOptions,
  env: LoadConfigOptions = {},
): ProjectRun {
  const resolvedFile = path.resolve(projectFile);
  if (!fs.existsSync(resolvedFile)) {
    throw new FileNotFoundError(resolvedFile);
  }

  const project = loadManifest(resolvedFile);
  const config = loadConfig(path.dirname(resolvedFile), env);
  log.debug(`project ${project.name} requires [${project.require.join(", ")}]`);

  const registryFile = opts.registry ? path.resolve(opts.registry) : config.registry;
  if (!registryFile) {
    throw new UsageError(
      "No registry configured. Pass --registry <file>, set EXTREQ_REGISTRY, or run `extreq init`.",
    );
  }
  const registry = loadRegistry(registryFile);
  log.debug(`registry ${registry.file} lists ${registry.entries.size} plugin(s)`);

  const accessor = createCachingAccessor(createAccessor(createRegistrySource(registry)));
  const resolution = resolveRequirements(project.require, accessor);
  log.debug(`resolved ${resolution.order.length} plugin(s)`);

  return { projectFile: resolvedFile, project, config, registry, accessor, resolution };
}

/** Report a tool error on the console and return its exit code. Anything else propagates. */
export function reportError(err: unknown, format: ProjectOptions["format"]): number {
  if (!(err instanceof ExtreqError)) throw err;

  if (format === "json") {
    console.log(JSON.stringify(buildErrorReport(err), null, 2));
    return err.exitCode;
  }

  log.error(err.message);
  if (err instanceof CyclicDependencyError) {
    log.dim("  Remove one of the requirements between these plugins to break the cycle.");
  }
  return err.exitCode;
}
