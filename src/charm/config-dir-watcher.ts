/**
 * Alertmanager config directory watcher.
 *
 * Starts a detached process (see ../watcher/cli.ts) that fires the custom
 * `alertmanager_config_file_changed` event through juju-exec whenever anything
 * changes under the watched directory. This is how the charm learns that
 * Alertmanager Configurer rewrote the Alertmanager configuration.
 */

import { spawn } from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import { closeSync, existsSync, openSync } from "node:fs";
import { join } from "node:path";
import { config } from "../lib/config";
import { logger } from "../lib/logger";

export const CONFIG_FILE_CHANGED_EVENT = "alertmanager_config_file_changed";
export const WATCHER_SCRIPT = "dist/watcher/cli.js";
export const JUJU_EXEC = "/usr/bin/juju-exec";
export const JUJU_RUN = "/usr/bin/juju-run";

/**
 * Subset of ChildProcess the watchdog needs
 */
export interface SpawnedProcess {
  pid?: number | undefined;
  unref(): void;
}

export type Spawner = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => SpawnedProcess;

export interface WatchdogDeps {
  spawn: Spawner;
  exists: (path: string) => boolean;
  openLog: (path: string) => number;
  closeLog: (fd: number) => void;
}

export interface ConfigDirWatcherOptions {
  configDir: string;
  unitName: string;
  charmDir: string;
  nodeBinary?: string;
  logFile?: string;
  env?: NodeJS.ProcessEnv;
  deps?: Partial<WatchdogDeps>;
}

export interface ConfigDirWatcher {
  startWatchdog(): number | undefined;
}

const defaultDeps: WatchdogDeps = {
  spawn: (command, args, options) => spawn(command, args, options),
  exists: existsSync,
  openLog: (path) => openSync(path, "a"),
  closeLog: closeSync,
};

/**
 * Command used to reach back into the unit from outside a hook
 */
export const jujuExecBinary = (exists: (path: string) => boolean): string =>
  exists(JUJU_EXEC) ? JUJU_EXEC : JUJU_RUN;

export function createConfigDirWatcher({
  configDir,
  unitName,
  charmDir,
  nodeBinary = process.execPath,
  logFile = config.watchdogLogFile,
  env = process.env,
  deps = {},
}: ConfigDirWatcherOptions): ConfigDirWatcher {
  const { spawn: spawnProcess, exists, openLog, closeLog } = { ...defaultDeps, ...deps };

  return {
    startWatchdog() {
      logger.info("Starting alert rules watchdog.");

      // juju-exec refuses to run inside a hook context
      const { JUJU_CONTEXT_ID: _contextId, ...childEnv } = env;

      const args = [
        join(charmDir, WATCHER_SCRIPT),
        configDir,
        jujuExecBinary(exists),
        unitName,
        charmDir,
      ];

      const logFd = openLog(logFile);
      let child: SpawnedProcess;
      try {
        child = spawnProcess(nodeBinary, args, {
          detached: true,
          stdio: ["ignore", logFd, logFd],
          env: childEnv,
        });
      } finally {
        closeLog(logFd);
      }
      child.unref();

      logger.info(
        { pid: child.pid, configDir },
        `Started Alertmanager's config watchdog process with PID ${child.pid}.`,
      );
      return child.pid;
    },
  };
}
