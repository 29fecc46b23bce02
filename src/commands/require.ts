import path from "node:path";
import chalk from "chalk";
import type { LoadConfigOptions } from "../config/manager.js";
import { isBuildConfig } from "../manifest/schema.js";
import { filterLoadable, isLoadable, type Registry } from "../registry/registry.js";
import { publish, type BuildTarget, type PublishRecord } from "../publish/publish.js";
import { buildJsonReport } from "../publish/report.js";
import { writeExtensionList } from "../publish/writer.js";
import type { OrderedList } from "../resolver/types.js";
import { EXIT_OK, UsageError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import { reportError, resolveProject, type ProjectOptions } from "./project.js";

export interface RequireOptions extends ProjectOptions {
  platform?: string;
  config?: string;
  output?: string;
  dryRun?: boolean;
}

/** Compact listing of the load order, marking entries that are not published. */
export function formatRequireOutput(
  order: OrderedList,
  registry: Registry,
  records: readonly PublishRecord[],
): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(chalk.bold("Extension Requirements"));
  lines.push("");

  if (order.length === 0) {
    lines.push(chalk.dim("  No plugins required."));
  }

  const width = String(order.length).length;
  order.forEach((id, index) => {
    const position = `${String(index + 1).padStart(width)}.`;
    const note = isLoadable(registry, id) ? "" : ` ${chalk.dim("(library, not published)")}`;
    lines.push(`  ${position} ${id}${note}`);
  });

  lines.push("");
  lines.push(`  ${order.length} resolved, ${records.length} published`);
  lines.push("");
  return lines.join("\n");
}

function resolveTarget(opts: RequireOptions, defaults: BuildTarget): BuildTarget {
  const platform = opts.platform ?? defaults.platform;
  const buildConfig = opts.config ?? defaults.buildConfig;
  if (!isBuildConfig(buildConfig)) {
    throw new UsageError(`Unknown build configuration '${buildConfig}'.`);
  }
  return { platform, buildConfig };
}

/**
 * Run `extreq require`: resolve the project's plugins, publish the loadable
 * ones and write the extension list.
 * Returns 0 on success or the error's exit code.
 */
export function runRequire(
  projectFile: string,
  opts: RequireOptions,
  env: LoadConfigOptions = {},
): number {
  log.setVerbose(opts.verbose ?? false);

  try {
    const run = resolveProject(projectFile, opts, env);
    const { registry, accessor, resolution, config } = run;
    const target = resolveTarget(opts, config);

    const records = publish(
      resolution.order,
      { fetch: (id) => accessor.fetch(id), filterLoadable: (ids) => filterLoadable(registry, ids) },
      target,
      { classNamePrefix: config.classNamePrefix },
    );

    const outputFile = opts.output ? path.resolve(opts.output) : config.outputFile;
    if (!opts.dryRun) {
      writeExtensionList(outputFile, records);
    }

    if (opts.format === "json") {
      const report = buildJsonReport({
        projectFile: run.projectFile,
        registry,
        closure: resolution.closure,
        order: resolution.order,
        records,
        target,
        outputFile: opts.dryRun ? undefined : outputFile,
      });
      console.log(JSON.stringify(report, null, 2));
      return EXIT_OK;
    }

    console.log(formatRequireOutput(resolution.order, registry, records));
    if (opts.dryRun) {
      log.info(`Dry run: ${outputFile} not written`);
    } else {
      log.success(`Wrote ${records.length} extension(s) to ${outputFile}`);
    }
    return EXIT_OK;
  } catch (err) {
    return reportError(err, opts.format);
  }
}
