#!/usr/bin/env node
import { loadConfig, type UpdaterConfig } from "./config.js";
import { reportFailure, run } from "./handler.js";

/** Meant to be run by cron or a CI schedule. */
async function main(): Promise<number> {
  let config: UpdaterConfig;
  try {
    config = loadConfig();
  } catch (error) {
    reportFailure(error);
    return 1;
  }
  return run(config);
}

process.exitCode = await main();
