import { z } from "zod";
import { logger } from "./logger";

// Load environment variables
export const config = {
  env: process.env.NODE_ENV || "production",
  isDev: process.env.NODE_ENV === "development",

  // Logging
  logLevel:
    process.env.LOG_LEVEL ||
    (process.env.NODE_ENV === "development" ? "debug" : "info"),

  // Config dir watcher
  watchdogLogFile:
    process.env.WATCHDOG_LOG_FILE ||
    "/var/log/alertmanager-configurer-watchdog.log",
};

/**
 * Variables Juju sets for every dispatch of the charm
 */
export const HookEnvironmentSchema = z.object({
  JUJU_UNIT_NAME: z
    .string({ required_error: "JUJU_UNIT_NAME is not set" })
    .regex(/^[a-z][a-z0-9-]*\/\d+$/, "JUJU_UNIT_NAME must look like <app>/<n>"),
  JUJU_CHARM_DIR: z
    .string({ required_error: "JUJU_CHARM_DIR is not set" })
    .min(1, "JUJU_CHARM_DIR is empty"),
  JUJU_DISPATCH_PATH: z
    .string({ required_error: "JUJU_DISPATCH_PATH is not set" })
    .min(1, "JUJU_DISPATCH_PATH is empty"),
  JUJU_MODEL_NAME: z.string().optional(),
  JUJU_RELATION: z.string().optional(),
  JUJU_RELATION_ID: z.string().optional(),
  JUJU_REMOTE_APP: z.string().optional(),
  JUJU_REMOTE_UNIT: z.string().optional(),
  JUJU_WORKLOAD_NAME: z.string().optional(),
  JUJU_CONTEXT_ID: z.string().optional(),
  JUJU_VERSION: z.string().optional(),
});

export type HookEnvironment = z.infer<typeof HookEnvironmentSchema>;

/**
 * Charm options from config.yaml
 */
export const CharmConfigSchema = z
  .object({
    multitenant_label: z.string().default(""),
  })
  .passthrough();

export type CharmConfig = z.infer<typeof CharmConfigSchema>;

/**
 * Read and validate the hook environment
 */
export function loadHookEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): HookEnvironment {
  const result = HookEnvironmentSchema.safeParse(env);

  if (!result.success) {
    logger.error("Hook environment errors:");
    for (const issue of result.error.issues) {
      logger.error(`  - ${issue.message}`);
    }
    throw new Error("Invalid hook environment");
  }

  logger.debug(
    {
      unit: result.data.JUJU_UNIT_NAME,
      dispatchPath: result.data.JUJU_DISPATCH_PATH,
      model: result.data.JUJU_MODEL_NAME,
    },
    "Hook environment loaded",
  );

  return result.data;
}

/**
 * Application name part of a unit name, e.g. "alertmanager-configurer-k8s/0"
 */
export function appNameOf(unitName: string): string {
  const [appName] = unitName.split("/");
  return appName ?? unitName;
}

export default config;
