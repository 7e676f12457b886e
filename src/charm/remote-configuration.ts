import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../lib/logger";
import type { Framework } from "../operator/framework";

export const DEFAULT_RELATION_NAME = "alertmanager";
export const CONFIGURATION_BROKEN_EVENT = "configuration_broken";

export type AlertmanagerConfig = Record<string, unknown>;

/**
 * Raised when an Alertmanager config or template file cannot be read or parsed
 */
export class ConfigReadError extends Error {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Failed to read configuration from ${path}: ${reason}`);
    this.name = "ConfigReadError";
  }
}

/**
 * Top-level keys Alertmanager accepts. Values are left to Alertmanager.
 */
export const AlertmanagerConfigKeysSchema = z
  .object({
    global: z.unknown(),
    receivers: z.unknown(),
    route: z.unknown(),
    inhibit_rules: z.unknown(),
    // An empty `templates:` key means no templates
    templates: z.array(z.string()).nullish(),
    time_intervals: z.unknown(),
    mute_time_intervals: z.unknown(),
  })
  .strict()
  .refine((config) => Object.keys(config).length > 0, {
    message: "Alertmanager configuration is empty",
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse Alertmanager config YAML into a mapping
 */
export function parseAlertmanagerConfig(text: string, source: string): AlertmanagerConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigReadError(
      source,
      error instanceof Error ? error.message : "invalid YAML",
    );
  }

  if (!isRecord(document)) {
    throw new ConfigReadError(source, "document is not a mapping");
  }
  return document;
}

/**
 * Load an Alertmanager config file from disk
 */
export async function loadConfigFile(path: string): Promise<AlertmanagerConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigReadError(
      path,
      error instanceof Error ? error.message : "cannot read file",
    );
  }
  return parseAlertmanagerConfig(text, path);
}

async function loadTemplates(paths: string[]): Promise<string[]> {
  const templates: string[] = [];
  for (const path of paths) {
    try {
      templates.push(await readFile(path, "utf-8"));
    } catch (error) {
      throw new ConfigReadError(
        path,
        error instanceof Error ? error.message : "cannot read template",
      );
    }
  }
  return templates;
}

export interface RemoteConfigurationProvider {
  readonly relationName: string;
  updateRelationDataBag(config: AlertmanagerConfig): Promise<void>;
}

export interface RemoteConfigurationProviderOptions {
  alertmanagerConfig: AlertmanagerConfig;
  relationName?: string;
}

/**
 * Provider side of the alertmanager_remote_configuration interface.
 *
 * Publishes Alertmanager config (and templates) in the application data bag of
 * every relation with the given name. Emits `configuration_broken` when the
 * config it is given does not look like an Alertmanager config.
 */
export function createRemoteConfigurationProvider(
  framework: Framework,
  { alertmanagerConfig, relationName = DEFAULT_RELATION_NAME }: RemoteConfigurationProviderOptions,
): RemoteConfigurationProvider {
  const { model } = framework;

  const clearRelationData = async () => {
    for (const relation of await model.relations(relationName)) {
      await relation.setAppData({ alertmanager_config: "", alertmanager_templates: "" });
    }
  };

  const updateRelationDataBag = async (config: AlertmanagerConfig) => {
    if (!(await model.unit.isLeader())) {
      return;
    }

    const validation = AlertmanagerConfigKeysSchema.safeParse(config);
    if (!validation.success) {
      logger.warn(
        { relation: relationName, issues: validation.error.issues.map((i) => i.message) },
        "Invalid Alertmanager configuration. Ignoring.",
      );
      await clearRelationData();
      await framework.emit({ name: CONFIGURATION_BROKEN_EVENT });
      return;
    }

    const { templates: _templatePaths, ...alertmanagerConfigWithoutTemplates } = config;
    const templates = await loadTemplates(validation.data.templates ?? []);

    for (const relation of await model.relations(relationName)) {
      await relation.setAppData({
        alertmanager_config: JSON.stringify(alertmanagerConfigWithoutTemplates),
        alertmanager_templates: JSON.stringify(templates),
      });
      logger.debug(
        { relation: relationName, relationId: relation.id },
        "Updated Alertmanager configuration in relation data bag",
      );
    }
  };

  framework.observe(
    `${relationName}-relation-joined`,
    "remote-configuration-provider",
    async () => {
      await updateRelationDataBag(alertmanagerConfig);
    },
  );

  return {
    relationName,
    updateRelationDataBag,
  };
}
