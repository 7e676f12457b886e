import chokidar from "chokidar";
import type { Logger } from "pino";
import type { CommandRunner } from "./dispatch";
import { dispatch } from "./dispatch";

export interface WatchTarget {
  configDir: string;
  runCmd: string;
  unit: string;
  charmDir: string;
}

/**
 * Subset of chokidar's FSWatcher used here
 */
export interface DirectoryWatcher {
  on(event: "all", listener: (eventName: string, path: string) => void): unknown;
  on(event: "error", listener: (error: unknown) => void): unknown;
  on(event: "ready", listener: () => void): unknown;
  close(): Promise<void>;
}

export type WatcherFactory = (dir: string) => DirectoryWatcher;

export interface WatchOptions {
  logger: Logger;
  createWatcher?: WatcherFactory;
  runner?: CommandRunner;
  onFatal?: (error: unknown) => void;
}

export interface RunningWatch {
  /** Resolves once the initial scan is done and changes are being reported */
  ready(): Promise<void>;
  /** Resolves once every dispatch queued so far has finished */
  idle(): Promise<void>;
  stop(): Promise<void>;
}

export const defaultWatcherFactory: WatcherFactory = (dir) =>
  chokidar.watch(dir, { ignoreInitial: true, persistent: true });

/**
 * Watch the config dir and fire a dispatch for every change under it.
 * Dispatches run one at a time, in the order the changes were seen.
 */
export function watchConfigDir(
  target: WatchTarget,
  { logger, createWatcher = defaultWatcherFactory, runner, onFatal }: WatchOptions,
): RunningWatch {
  const watcher = createWatcher(target.configDir);
  let tail: Promise<void> = Promise.resolve();

  const ready = new Promise<void>((resolve) => {
    watcher.on("ready", () => {
      logger.info({ configDir: target.configDir }, "Watching Alertmanager config directory");
      resolve();
    });
  });

  watcher.on("all", (eventName, path) => {
    logger.info({ event: eventName, path }, "Change detected, dispatching");

    tail = tail.then(() =>
      dispatch(target.runCmd, target.unit, target.charmDir, runner).catch((error: unknown) => {
        logger.error({ error, path }, "Dispatch of alertmanager_config_file_changed failed");
      }),
    );
  });

  watcher.on("error", (error) => {
    logger.error({ error }, "Watchdog error! Watchdog stopped!");
    void watcher
      .close()
      .catch((closeError: unknown) => {
        logger.error({ error: closeError }, "Failed to close watcher");
      })
      .finally(() => onFatal?.(error));
  });

  return {
    ready: () => ready,
    async idle() {
      let current: Promise<void>;
      do {
        current = tail;
        await current;
      } while (current !== tail);
    },
    async stop() {
      await watcher.close();
    },
  };
}
