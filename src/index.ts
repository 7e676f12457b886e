/**
 * Alertmanager Configurer charm entry point
 *
 * Run by the charm's `dispatch` script once per Juju event.
 */

import { join } from "node:path";
import {
  createConfigDirWatcher,
  createSettings,
  registerAlertmanagerConfigurerCharm,
} from "./charm";
import { appNameOf, loadHookEnvironment } from "./lib/config";
import { logger } from "./lib/logger";
import { createFileDeferredStore } from "./operator/deferred-store";
import { eventFromEnvironment } from "./operator/events";
import { createFramework } from "./operator/framework";
import type { HookTools } from "./operator/hook-tools";
import { createHookTools } from "./operator/hook-tools";
import { createModel } from "./operator/model";
import { createPebbleClient, pebbleSocketPath } from "./operator/pebble-client";

export const STATE_FILE = ".unit-state.json";

async function main(hookTools: HookTools) {
  const env = loadHookEnvironment();
  const unitName = env.JUJU_UNIT_NAME;
  const charmDir = env.JUJU_CHARM_DIR;

  const model = createModel({
    unitName,
    appName: appNameOf(unitName),
    hookTools,
    pebbleFor: (container) => createPebbleClient(pebbleSocketPath(container)),
  });

  const framework = createFramework({
    model,
    store: createFileDeferredStore(join(charmDir, STATE_FILE)),
  });

  registerAlertmanagerConfigurerCharm(framework, {
    settings: createSettings(charmDir),
    startWatchdog: (configDir) => {
      createConfigDirWatcher({ configDir, unitName, charmDir }).startWatchdog();
    },
  });

  await framework.dispatch(eventFromEnvironment(env));
}

const hookTools = createHookTools();

main(hookTools).catch(async (error: unknown) => {
  logger.error(error, "Dispatch failed");
  const message = error instanceof Error ? error.message : String(error);
  try {
    await hookTools.jujuLog("ERROR", `Dispatch failed: ${message}`);
  } catch (logError) {
    logger.error(logError, "Failed to forward error to juju-log");
  }
  process.exit(1);
});
