#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { ConfigurationError, DEFAULT_CONFIG_FILE } from "./config.js";
import { runLifecycle, runSetup } from "./pipeline.js";
import * as log from "./log.js";

function getVersion(): string {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err: unknown) {
    log.debug(`Could not read package version: ${log.errorMessage(err)}`);
  }
  return "0.0.0";
}

interface RunArgs {
  config: string;
  dryRun: boolean;
  verbose: boolean;
  archive: boolean;
}

const program = new Command()
  .name("stale-branch-keeper")
  .description("Notifies owners of stale branches and merge/pull requests, and archives them after a grace period")
  .version(getVersion());

program
  .command("setup")
  .description(`Generate a template ${DEFAULT_CONFIG_FILE} in the current directory`)
  .action(() => {
    runSetup();
  });

program
  .command("run")
  .description("Notify about stale items, post reminder comments and archive expired items")
  .option("-c, --config <path>", "Path to the configuration file", DEFAULT_CONFIG_FILE)
  .option("--dry-run", "Log actions without sending emails or changing anything", false)
  .option("--verbose", "Enable debug logging", false)
  .option("--archive", "Run the archive pass even if enable_auto_archive is false", false)
  .action(async (opts: RunArgs) => {
    await runLifecycle(opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    log.error(`Configuration error: ${err.message}`);
  } else {
    log.error(log.errorMessage(err));
  }
  process.exit(1);
});
