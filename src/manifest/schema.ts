import { z } from "zod";

export const BUILD_CONFIGS = ["Debug", "Release", "RelWithDebInfo", "MinSizeRel"] as const;

export type BuildConfig = (typeof BUILD_CONFIGS)[number];

export function isBuildConfig(value: string): value is BuildConfig {
  return BUILD_CONFIGS.some((config) => config === value);
}

const relativePath = z.string().min(1);

/**
 * Binary location: one path for every target, or keyed by platform and
 * optionally by build configuration.
 */
export const binarySchema = z.union([
  relativePath,
  z.record(z.string(), z.union([relativePath, z.record(z.string(), relativePath)])),
]);

export const manifestFileSchema = z.object({
  name: z.string().min(1),
  version: z.string().optional(),
  require: z.array(z.string().min(1)).default([]),
  assets: relativePath.optional(),
  binary: binarySchema.optional(),
});

export type BinarySpec = z.infer<typeof binarySchema>;
export type ManifestFile = z.infer<typeof manifestFileSchema>;

export interface Manifest extends ManifestFile {
  /** Absolute path of the file the manifest was read from. */
  path: string;
}
