/**
 * Versioned JSON output for `require` and `order`.
 *
 * Machine-readable counterpart of the text output, for build scripts and CI.
 */

import path from "node:path";
import type { Registry } from "../registry/registry.js";
import type { PluginKind } from "../registry/schema.js";
import type { OrderedList, PluginId } from "../resolver/types.js";
import { CyclicDependencyError, type ExtreqError } from "../utils/errors.js";
import type { BuildTarget, PublishRecord } from "./publish.js";

// --- Schema Types ---

export interface OrderEntry {
  id: PluginId;
  kind: PluginKind;
  dependencies: PluginId[];
}

export interface ExtreqReport {
  schemaVersion: "1.0";
  timestamp: string;
  project: string;
  target?: BuildTarget;
  outputFile: string | null;
  summary: {
    resolved: number;
    plugins: number;
    libraries: number;
    published: number;
  };
  order: OrderEntry[];
  records: PublishRecord[];
}

export interface ExtreqErrorReport {
  schemaVersion: "1.0";
  timestamp: string;
  error: {
    name: string;
    message: string;
    exitCode: number;
    unresolved?: PluginId[];
  };
}

// --- Report Builders ---

export function buildJsonReport(input: {
  projectFile: string;
  registry: Registry;
  closure: ReadonlyMap<PluginId, readonly PluginId[]>;
  order: OrderedList;
  records: PublishRecord[];
  target?: BuildTarget;
  outputFile?: string;
}): ExtreqReport {
  const order = input.order.map((id): OrderEntry => ({
    id,
    kind: input.registry.entries.get(id)?.kind ?? "plugin",
    dependencies: [...(input.closure.get(id) ?? [])],
  }));

  return {
    schemaVersion: "1.0",
    timestamp: new Date().toISOString(),
    project: path.basename(input.projectFile),
    target: input.target,
    outputFile: input.outputFile ?? null,
    summary: {
      resolved: order.length,
      plugins: order.filter((entry) => entry.kind === "plugin").length,
      libraries: order.filter((entry) => entry.kind === "library").length,
      published: input.records.length,
    },
    order,
    records: input.records,
  };
}

export function buildErrorReport(err: ExtreqError): ExtreqErrorReport {
  return {
    schemaVersion: "1.0",
    timestamp: new Date().toISOString(),
    error: {
      name: err.name,
      message: err.message,
      exitCode: err.exitCode,
      unresolved: err instanceof CyclicDependencyError ? [...err.unresolved] : undefined,
    },
  };
}
