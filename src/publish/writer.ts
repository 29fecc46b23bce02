import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileReplaceError } from "../utils/errors.js";
import type { PublishRecord } from "./publish.js";

/** `name;className;binaryPath;assetPath` */
export function formatRecord(record: PublishRecord): string {
  return [record.name, record.className, record.binaryPath, record.assetPath].join(";");
}

export function formatExtensionList(records: readonly PublishRecord[]): string {
  return records.map((record) => formatRecord(record) + os.EOL).join("");
}

/**
 * Write the extension list next to the target, then rename it into place.
 * Readers see either the previous file or the complete new one.
 */
export function writeExtensionList(filePath: string, records: readonly PublishRecord[]): void {
  const target = path.resolve(filePath);
  const temp = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.tmp`,
  );

  try {
    fs.writeFileSync(temp, formatExtensionList(records), "utf-8");
    fs.renameSync(temp, target);
  } catch (err) {
    fs.rmSync(temp, { force: true });
    throw new FileReplaceError(target, err instanceof Error ? err.message : String(err));
  }
}
