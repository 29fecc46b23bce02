#!/usr/bin/env node

import { Command, Option } from "commander";
import { BUILD_CONFIGS } from "../src/manifest/schema.js";
import { runRequire, type RequireOptions } from "../src/commands/require.js";
import { runOrder, type OrderOptions } from "../src/commands/order.js";
import { runInit } from "../src/commands/init.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["text", "json"]).default("text");

program
  .name("extreq")
  .description("Resolve and order the plugin requirements of a project")
  .version("0.1.0");

program
  .command("require")
  .description("Resolve required plugins and write the extension list")
  .argument("<project-file>", "Project manifest")
  .option("--registry <file>", "Plugin registry file")
  .option("--platform <platform>", "Target platform")
  .addOption(new Option("--config <config>", "Build configuration").choices(BUILD_CONFIGS))
  .option("--output <file>", "Extension list file (default: extensions.txt beside the project)")
  .option("--dry-run", "Resolve and report without writing")
  .addOption(formatOption())
  .option("--verbose", "Print resolution details")
  .action((projectFile: string, opts: RequireOptions) => {
    process.exit(runRequire(projectFile, opts));
  });

program
  .command("order")
  .description("Print the resolved load order without publishing")
  .argument("<project-file>", "Project manifest")
  .option("--registry <file>", "Plugin registry file")
  .addOption(formatOption())
  .option("--verbose", "Print resolution details")
  .action((projectFile: string, opts: OrderOptions) => {
    process.exit(runOrder(projectFile, opts));
  });

program
  .command("init")
  .description("Save default registry, platform and build configuration")
  .action(async () => {
    await runInit();
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
