import { readFileSync } from "node:fs";
import { join } from "node:path";

export interface AlertmanagerConfigurerSettings {
  configDir: string;
  configFile: string;
  dummyHttpServerServiceName: string;
  dummyHttpServerHost: string;
  dummyHttpServerPort: number;
  configurerServiceName: string;
  configurerPort: number;
  /** Raw YAML pushed to the workload on start */
  defaultConfig: string;
}

export const ALERTMANAGER_CONFIG_DIR = "/etc/alertmanager/";
export const DEFAULT_CONFIG_FILE_NAME = "alertmanager.yml";

/**
 * Settings used in production. The default config ships in the charm root.
 */
export function createSettings(
  charmDir: string,
  overrides: Partial<AlertmanagerConfigurerSettings> = {},
): AlertmanagerConfigurerSettings {
  const configDir = overrides.configDir ?? ALERTMANAGER_CONFIG_DIR;
  return {
    configDir,
    configFile: join(configDir, DEFAULT_CONFIG_FILE_NAME),
    dummyHttpServerServiceName: "dummy-http-server",
    dummyHttpServerHost: "localhost",
    dummyHttpServerPort: 80,
    configurerServiceName: "alertmanager-configurer",
    configurerPort: 9101,
    defaultConfig:
      overrides.defaultConfig ??
      readFileSync(join(charmDir, DEFAULT_CONFIG_FILE_NAME), "utf-8"),
    ...overrides,
  };
}
