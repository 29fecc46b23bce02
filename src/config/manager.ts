import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  type ExtreqConfig,
  configFileSchema,
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  PROJECT_CONFIG_DIR,
  PROJECT_CONFIG_FILE,
} from "./schema.js";
import { BUILD_CONFIGS, isBuildConfig } from "../manifest/schema.js";
import { describeIssues } from "../manifest/loader.js";
import { ConfigParseError } from "../utils/errors.js";

export function getGlobalConfigPath(home: string = os.homedir()): string {
  return path.join(home, GLOBAL_CONFIG_DIR, GLOBAL_CONFIG_FILE);
}

export function getProjectConfigPath(projectDir: string): string {
  return path.join(projectDir, PROJECT_CONFIG_DIR, PROJECT_CONFIG_FILE);
}

/** Read a config layer. A missing file is an empty layer; a broken one is an error. */
function readConfigFile(filePath: string): Partial<ExtreqConfig> {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8")) as unknown;
  } catch (err) {
    throw new ConfigParseError(filePath, err instanceof Error ? err.message : String(err));
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigParseError(filePath, describeIssues(parsed.error));
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): Partial<ExtreqConfig> {
  const layer: Partial<ExtreqConfig> = {};
  const { EXTREQ_REGISTRY, EXTREQ_PLATFORM, EXTREQ_BUILD_CONFIG } = env;
  if (EXTREQ_REGISTRY) layer.registry = EXTREQ_REGISTRY;
  if (EXTREQ_PLATFORM) layer.platform = EXTREQ_PLATFORM;
  if (EXTREQ_BUILD_CONFIG) {
    if (!isBuildConfig(EXTREQ_BUILD_CONFIG)) {
      throw new ConfigParseError(
        "EXTREQ_BUILD_CONFIG",
        `expected one of ${BUILD_CONFIGS.join(", ")}, got '${EXTREQ_BUILD_CONFIG}'`,
      );
    }
    layer.buildConfig = EXTREQ_BUILD_CONFIG;
  }
  return layer;
}

export interface LoadConfigOptions {
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load merged config: defaults < global < project < env vars.
 * `registry` and `outputFile` come back absolute, resolved against `projectDir`.
 */
export function loadConfig(projectDir: string, opts: LoadConfigOptions = {}): ExtreqConfig {
  const globalCfg = readConfigFile(getGlobalConfigPath(opts.home));
  const projectCfg = readConfigFile(getProjectConfigPath(projectDir));

  const merged: ExtreqConfig = {
    ...DEFAULT_CONFIG,
    ...globalCfg,
    ...projectCfg,
    ...readEnv(opts.env ?? process.env),
  };

  if (merged.registry) {
    merged.registry = path.resolve(projectDir, merged.registry);
  }
  merged.outputFile = path.resolve(projectDir, merged.outputFile);
  return merged;
}

/** Write config to the global config file, merged over what is already there. */
export function saveGlobalConfig(
  config: Partial<ExtreqConfig>,
  home: string = os.homedir(),
): string {
  const filePath = getGlobalConfigPath(home);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const existing = readConfigFile(filePath);
  const merged = { ...existing, ...config };
  fs.writeFileSync(filePath, JSON.stringify(merged, null, 2) + "\n", "utf-8");
  return filePath;
}
