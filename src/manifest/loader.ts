import fs from "node:fs";
import path from "node:path";
import type { ZodError } from "zod";
import { FileNotFoundError, ManifestParseError } from "../utils/errors.js";
import { manifestFileSchema, type Manifest } from "./schema.js";

/** Render zod issues as `field: message` pairs on one line. */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

/** Read a JSON file, mapping a missing file and bad JSON to tool errors. */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8")) as unknown;
  } catch (err) {
    // EISDIR, EACCES and bad JSON all mean the manifest cannot be used
    throw new ManifestParseError(filePath, err instanceof Error ? err.message : String(err));
  }
}

/** Load and validate a plugin or project manifest. */
export function loadManifest(filePath: string): Manifest {
  const resolved = path.resolve(filePath);
  const parsed = manifestFileSchema.safeParse(readJsonFile(resolved));
  if (!parsed.success) {
    throw new ManifestParseError(resolved, describeIssues(parsed.error));
  }
  return { ...parsed.data, path: resolved };
}
