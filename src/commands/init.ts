import path from "node:path";
import readline from "node:readline";
import { saveGlobalConfig } from "../config/manager.js";
import { DEFAULT_CONFIG, type ExtreqConfig } from "../config/schema.js";
import { BUILD_CONFIGS, isBuildConfig } from "../manifest/schema.js";
import * as log from "../utils/logger.js";

export type Prompt = (question: string) => Promise<string>;

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function runInit(ask: Prompt = prompt, home?: string): Promise<void> {
  log.heading("extreq Setup");

  const registryInput = await ask("Registry file (leave blank to skip): ");

  const platformInput = await ask(`Default platform [${DEFAULT_CONFIG.platform}]: `);

  const buildConfigInput = await ask(
    `Build configuration (${BUILD_CONFIGS.join("/")}) [${DEFAULT_CONFIG.buildConfig}]: `,
  );

  const config: Partial<ExtreqConfig> = {};
  if (registryInput) config.registry = path.resolve(registryInput);
  if (platformInput) config.platform = platformInput;
  if (buildConfigInput) {
    if (isBuildConfig(buildConfigInput)) {
      config.buildConfig = buildConfigInput;
    } else {
      log.warn(`Unknown build configuration '${buildConfigInput}', keeping ${DEFAULT_CONFIG.buildConfig}`);
    }
  }

  const filePath = saveGlobalConfig(config, home);
  log.success(`Global config saved to ${filePath}`);
}
