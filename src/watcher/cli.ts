#!/usr/bin/env node
/**
 * Config Dir Watcher CLI
 * Detached process started by the charm on `start`
 *
 * Usage:
 *   cli.js <config-dir> <juju-exec|juju-run> <unit> <charm-dir>
 */

import { createWatcherLogger } from "../lib/logger";
import { runWatcherCli } from "./main";

const logger = createWatcherLogger();

try {
  runWatcherCli(process.argv.slice(2), {
    logger,
    exit: (code) => process.exit(code),
  });
} catch (error) {
  logger.error({ error }, "Fatal error");
  process.exit(2);
}
