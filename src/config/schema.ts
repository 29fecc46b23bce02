import { z } from "zod";
import { BUILD_CONFIGS, type BuildConfig } from "../manifest/schema.js";
import { DEFAULT_CLASS_NAME_PREFIX } from "../publish/publish.js";

export interface ExtreqConfig {
  /** Registry file. Relative paths resolve against the project directory. */
  registry?: string;
  platform: string;
  buildConfig: BuildConfig;
  /** Extension list file. Relative paths resolve against the project directory. */
  outputFile: string;
  classNamePrefix: string;
}

export const configFileSchema = z
  .object({
    registry: z.string().min(1),
    platform: z.string().min(1),
    buildConfig: z.enum(BUILD_CONFIGS),
    outputFile: z.string().min(1),
    classNamePrefix: z.string(),
  })
  .partial();

export const DEFAULT_CONFIG: ExtreqConfig = {
  platform: `${process.platform}-${process.arch}`,
  buildConfig: "RelWithDebInfo",
  outputFile: "extensions.txt",
  classNamePrefix: DEFAULT_CLASS_NAME_PREFIX,
};

export const GLOBAL_CONFIG_DIR = ".extreq";
export const GLOBAL_CONFIG_FILE = "config.json";
export const PROJECT_CONFIG_DIR = ".extreq";
export const PROJECT_CONFIG_FILE = "config.json";
