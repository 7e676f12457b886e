import type { Layer } from "../types/charm";
import type { AlertmanagerConfigurerSettings } from "./settings";

/**
 * Pebble layer for the Alertmanager Configurer workload container
 */
export function alertmanagerConfigurerLayer(
  settings: AlertmanagerConfigurerSettings,
  multitenantLabel: string,
): Layer {
  return {
    summary: "Alertmanager Configurer layer",
    description: "Pebble config layer for Alertmanager Configurer",
    services: {
      [settings.configurerServiceName]: {
        override: "replace",
        startup: "enabled",
        command:
          "alertmanager_configurer " +
          `-port=${settings.configurerPort} ` +
          `-alertmanager-conf=${settings.configFile} ` +
          `-alertmanagerURL=${settings.dummyHttpServerHost}:${settings.dummyHttpServerPort} ` +
          `-multitenant-label=${multitenantLabel} ` +
          "-delete-route-with-receiver=true ",
      },
    },
  };
}

/**
 * Pebble layer for the dummy HTTP server standing in for Alertmanager's API
 */
export function dummyHttpServerLayer(settings: AlertmanagerConfigurerSettings): Layer {
  return {
    summary: "Dummy HTTP server pebble layer",
    description: "Pebble layer configuration for the dummy HTTP server",
    services: {
      [settings.dummyHttpServerServiceName]: {
        override: "replace",
        startup: "enabled",
        command: "nginx",
      },
    },
  };
}
