import { isDeepStrictEqual } from "node:util";
import { CharmConfigSchema } from "../lib/config";
import { logger } from "../lib/logger";
import type { Framework, HookEvent } from "../operator/framework";
import type { Container } from "../operator/model";
import { ModelError } from "../operator/model";
import { PebbleApiError, PebbleConnectionError } from "../operator/pebble-client";
import type { Layer } from "../types/charm";
import {
  activeStatus,
  blockedStatus,
  maintenanceStatus,
  waitingStatus,
} from "../types/charm";
import { CONFIG_FILE_CHANGED_EVENT } from "./config-dir-watcher";
import { alertmanagerConfigurerLayer, dummyHttpServerLayer } from "./layers";
import type { AlertmanagerConfigurerSettings } from "./settings";
import type { RemoteConfigurationProvider } from "./remote-configuration";
import {
  CONFIGURATION_BROKEN_EVENT,
  ConfigReadError,
  createRemoteConfigurationProvider,
  loadConfigFile,
  parseAlertmanagerConfig,
} from "./remote-configuration";

export const ALERTMANAGER_CONFIGURER_RELATION = "alertmanager-configurer";

/**
 * Starts the config dir watcher for the given directory
 */
export type WatchdogStarter = (configDir: string) => void;

export interface AlertmanagerConfigurerCharmOptions {
  settings: AlertmanagerConfigurerSettings;
  startWatchdog: WatchdogStarter;
}

export interface AlertmanagerConfigurerCharm {
  readonly remoteConfigurationProvider: RemoteConfigurationProvider;
}

/**
 * Alertmanager Configurer operator charm.
 *
 * Runs alertmanager-configurer next to a dummy HTTP server and relays the
 * Alertmanager config it writes to the `alertmanager` relation.
 */
export function registerAlertmanagerConfigurerCharm(
  framework: Framework,
  { settings, startWatchdog }: AlertmanagerConfigurerCharmOptions,
): AlertmanagerConfigurerCharm {
  const { model } = framework;
  const { unit } = model;
  const configurerContainer = unit.getContainer(settings.configurerServiceName);
  const dummyHttpServerContainer = unit.getContainer(settings.dummyHttpServerServiceName);

  const remoteConfigurationProvider = createRemoteConfigurationProvider(framework, {
    alertmanagerConfig: parseAlertmanagerConfig(settings.defaultConfig, "default config"),
    relationName: "alertmanager",
  });

  const isDummyHttpServerRunning = async (): Promise<boolean> => {
    try {
      await dummyHttpServerContainer.getService(settings.dummyHttpServerServiceName);
      return true;
    } catch (error) {
      if (
        error instanceof ModelError ||
        error instanceof PebbleConnectionError ||
        error instanceof PebbleApiError
      ) {
        return false;
      }
      throw error;
    }
  };

  /**
   * Replace the container's layer and restart the service when the plan differs
   */
  const startService = async (container: Container, layer: Layer, serviceName: string) => {
    const plan = await container.getPlan();
    if (isDeepStrictEqual(plan.services, layer.services)) {
      return;
    }

    await unit.setStatus(maintenanceStatus(`Configuring pebble layer for ${serviceName}`));
    await container.addLayer(container.name, layer, { combine: true });
    await container.restart(serviceName);
    logger.info({ service: serviceName }, `Restarted container ${serviceName}`);
  };

  const startAlertmanagerConfigurer = async (event: HookEvent) => {
    if (!(await model.getRelation("alertmanager"))) {
      await unit.setStatus(blockedStatus("Waiting for alertmanager relation to be created"));
      event.defer();
      return;
    }
    if (!(await configurerContainer.canConnect())) {
      await unit.setStatus(
        waitingStatus(`Waiting for ${configurerContainer.name} container to be ready`),
      );
      event.defer();
      return;
    }
    if (!(await isDummyHttpServerRunning())) {
      await unit.setStatus(waitingStatus("Waiting for the dummy HTTP server to be ready"));
      event.defer();
      return;
    }

    const charmConfig = CharmConfigSchema.parse(await model.config());
    await startService(
      configurerContainer,
      alertmanagerConfigurerLayer(settings, charmConfig.multitenant_label),
      settings.configurerServiceName,
    );
    await unit.setStatus(activeStatus());
  };

  framework.observe("start", "on-start", async (event) => {
    if (!(await configurerContainer.canConnect())) {
      await unit.setStatus(
        waitingStatus(`Waiting to be able to connect to ${configurerContainer.name}`),
      );
      event.defer();
      return;
    }

    await configurerContainer.push(settings.configFile, settings.defaultConfig);
    startWatchdog(settings.configDir);
  });

  framework.observe(
    `${settings.configurerServiceName}-pebble-ready`,
    "start-alertmanager-configurer",
    startAlertmanagerConfigurer,
  );

  framework.observe("config-changed", "start-alertmanager-configurer", startAlertmanagerConfigurer);

  framework.observe(
    `${settings.dummyHttpServerServiceName}-pebble-ready`,
    "on-dummy-http-server-pebble-ready",
    async (event) => {
      if (await dummyHttpServerContainer.canConnect()) {
        await startService(
          dummyHttpServerContainer,
          dummyHttpServerLayer(settings),
          settings.dummyHttpServerServiceName,
        );
        return;
      }

      await unit.setStatus(
        waitingStatus(`Waiting for ${dummyHttpServerContainer.name} container to be ready`),
      );
      event.defer();
    },
  );

  framework.observe(
    CONFIG_FILE_CHANGED_EVENT,
    "on-alertmanager-config-file-changed",
    async (event) => {
      try {
        const alertmanagerConfig = await loadConfigFile(settings.configFile);
        await startAlertmanagerConfigurer(event);
        await remoteConfigurationProvider.updateRelationDataBag(alertmanagerConfig);
      } catch (error) {
        if (!(error instanceof ConfigReadError)) {
          throw error;
        }
        logger.error(
          { path: error.path, error: error.message },
          "Error reading Alertmanager config file.",
        );
        await unit.setStatus(blockedStatus("Error reading Alertmanager config file"));
      }
    },
  );

  framework.observe(CONFIGURATION_BROKEN_EVENT, "on-configuration-broken", async () => {
    await unit.setStatus(blockedStatus("Invalid Alertmanager configuration"));
  });

  framework.observe(
    `${ALERTMANAGER_CONFIGURER_RELATION}-relation-joined`,
    "on-alertmanager-configurer-relation-joined",
    async (event) => {
      if (!(await unit.isLeader()) || !event.relation) {
        return;
      }

      // Tell consumers where to find the Alertmanager Configurer API
      await event.relation.setAppData({
        service_name: model.appName,
        port: String(settings.configurerPort),
      });
    },
  );

  return { remoteConfigurationProvider };
}
