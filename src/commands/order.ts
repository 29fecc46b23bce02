import chalk from "chalk";
import type { LoadConfigOptions } from "../config/manager.js";
import { buildJsonReport } from "../publish/report.js";
import type { ClosureMap, OrderedList } from "../resolver/types.js";
import { EXIT_OK } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import { reportError, resolveProject, type ProjectOptions } from "./project.js";

export type OrderOptions = ProjectOptions;

/** One line per plugin: position, identifier and its direct dependencies. */
export function formatOrderOutput(order: OrderedList, closure: ClosureMap): string {
  const width = String(order.length).length;
  return order
    .map((id, index) => {
      const deps = closure.get(id) ?? [];
      const suffix = deps.length > 0 ? ` ${chalk.dim(`← ${deps.join(", ")}`)}` : "";
      return `  ${String(index + 1).padStart(width)}. ${id}${suffix}`;
    })
    .join("\n");
}

/** Run `extreq order`: print the resolved load order without publishing. */
export function runOrder(projectFile: string, opts: OrderOptions, env: LoadConfigOptions = {}): number {
  log.setVerbose(opts.verbose ?? false);

  try {
    const { projectFile: resolvedFile, project, registry, resolution } = resolveProject(projectFile, opts, env);

    if (opts.format === "json") {
      const report = buildJsonReport({
        projectFile: resolvedFile,
        registry,
        closure: resolution.closure,
        order: resolution.order,
        records: [],
      });
      console.log(JSON.stringify(report, null, 2));
      return EXIT_OK;
    }

    log.heading(`Load order for ${project.name}`);
    if (resolution.order.length === 0) {
      log.dim("  No plugins required.");
    } else {
      console.log(formatOrderOutput(resolution.order, resolution.closure));
    }
    return EXIT_OK;
  } catch (err) {
    return reportError(err, opts.format);
  }
}
