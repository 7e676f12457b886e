import type { EventEmitter } from "node:events";
import { parseArgs } from "node:util";
import type { Logger } from "pino";
import type { CommandRunner } from "./dispatch";
import type { RunningWatch, WatcherFactory } from "./watcher";
import { watchConfigDir } from "./watcher";

export const USAGE = "Usage: cli.js <config-dir> <juju-exec|juju-run> <unit> <charm-dir>";

export interface WatcherCliOptions {
  logger: Logger;
  exit: (code: number) => void;
  /** Where SIGINT and SIGTERM arrive (the process by default) */
  signals?: EventEmitter;
  createWatcher?: WatcherFactory;
  runner?: CommandRunner;
}

/**
 * Run the config dir watcher from command-line arguments.
 *
 * Exit codes: 0 after SIGINT/SIGTERM, 1 when the watcher fails, 2 on bad usage.
 */
export function runWatcherCli(
  argv: string[],
  { logger, exit, signals = process, createWatcher, runner }: WatcherCliOptions,
): RunningWatch | undefined {
  let positionals: string[];
  try {
    ({ positionals } = parseArgs({ args: argv, allowPositionals: true, strict: true }));
  } catch (error) {
    logger.error({ error }, USAGE);
    exit(2);
    return undefined;
  }

  const [configDir, runCmd, unit, charmDir] = positionals;
  if (!configDir || !runCmd || !unit || !charmDir) {
    logger.error(USAGE);
    exit(2);
    return undefined;
  }

  const watch = watchConfigDir(
    { configDir, runCmd, unit, charmDir },
    {
      logger,
      createWatcher,
      runner,
      onFatal: () => exit(1),
    },
  );

  const shutdown = () => {
    logger.info("Stopping config dir watcher");
    watch
      .stop()
      .then(() => exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, "Error stopping watcher");
        exit(1);
      });
  };

  signals.on("SIGINT", shutdown);
  signals.on("SIGTERM", shutdown);

  return watch;
}
