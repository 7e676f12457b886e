import { execFile } from "node:child_process";
import { stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { logger } from "../lib/logger";
import type { UnitStatus } from "../types/charm";
import { StatusNameSchema } from "../types/charm";

/**
 * Result from running a hook tool
 */
export interface HookToolExecResult {
  stdout: string;
  stderr?: string;
}

/**
 * Error shape thrown by execFile when a tool exits non-zero
 */
interface ExecFailure extends Error {
  code?: number | string;
  stderr?: string;
}

/**
 * Executor function for running hook tools, with optional stdin
 * Allows dependency injection for testing
 */
export type HookToolExecutor = (
  command: string,
  args: string[],
  input?: string,
) => Promise<HookToolExecResult>;

/**
 * Error thrown when a hook tool fails or prints something unexpected
 */
export class HookToolError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | string | undefined,
    readonly stderr: string,
    message?: string,
  ) {
    super(message ?? `${command} failed: ${stderr.trim() || "no output"}`);
    this.name = "HookToolError";
  }
}

export type JujuLogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "CRITICAL";

/**
 * Typed view of the Juju hook tools used by the charm
 */
export interface HookTools {
  statusSet(status: UnitStatus): Promise<void>;
  statusGet(): Promise<UnitStatus>;
  isLeader(): Promise<boolean>;
  configGet(): Promise<Record<string, unknown>>;
  relationIds(relationName: string): Promise<number[]>;
  relationGet(
    relationName: string,
    relationId: number,
    owner: string,
    app: boolean,
  ): Promise<Record<string, string>>;
  relationSet(
    relationName: string,
    relationId: number,
    data: Record<string, string>,
    app: boolean,
  ): Promise<void>;
  jujuLog(level: JujuLogLevel, message: string): Promise<void>;
}

const StatusGetOutputSchema = z.object({
  status: StatusNameSchema,
  message: z.string().default(""),
});

const RelationIdsOutputSchema = z.array(z.string());
const RelationDataOutputSchema = z.record(z.string()).nullable();
const ConfigOutputSchema = z.record(z.unknown()).nullable();

/**
 * Default executor using Node.js child_process.execFile
 */
function defaultExecutor(
  command: string,
  args: string[],
  input?: string,
): Promise<HookToolExecResult> {
  return new Promise((resolve, reject) => {
    const child = execFile(command, args, (error, stdout, stderr) => {
      if (error) {
        reject(Object.assign(error, { stderr }));
        return;
      }
      resolve({ stdout, stderr });
    });
    child.stdin?.end(input ?? "");
  });
}

const relationRef = (relationName: string, relationId: number) =>
  `${relationName}:${relationId}`;

/**
 * Parse a relation reference such as "alertmanager:3" into its id
 */
export function parseRelationId(ref: string): number {
  const match = /^(?:[a-z0-9_-]+:)?(\d+)$/i.exec(ref);
  const id = match?.[1];
  if (!id) {
    throw new Error(`Invalid relation id: ${ref}`);
  }
  return Number.parseInt(id, 10);
}

/**
 * Create hook tools backed by an executor (defaults to execFile)
 */
export function createHookTools(
  executor: HookToolExecutor = defaultExecutor,
): HookTools {
  const run = async (command: string, args: string[], input?: string): Promise<string> => {
    try {
      const { stdout } = await executor(command, args, input);
      return stdout;
    } catch (error: unknown) {
      const err = error as ExecFailure;
      throw new HookToolError(command, err.code, err.stderr || err.message || "");
    }
  };

  const runJson = async <T>(
    command: string,
    args: string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> => {
    const stdout = await run(command, args);
    let parsed: unknown;
    try {
      parsed = stdout.trim() === "" ? null : JSON.parse(stdout);
    } catch {
      throw new HookToolError(command, 0, "", `${command} printed invalid JSON`);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new HookToolError(
        command,
        0,
        "",
        `${command} printed unexpected output: ${result.error.message}`,
      );
    }
    return result.data;
  };

  return {
    async statusSet(status) {
      logger.debug({ status: status.name, message: status.message }, "Setting unit status");
      await run("status-set", [status.name, status.message]);
    },

    async statusGet() {
      const output = await runJson(
        "status-get",
        ["--format=json", "--include-data"],
        StatusGetOutputSchema,
      );
      return { name: output.status, message: output.message };
    },

    async isLeader() {
      return await runJson("is-leader", ["--format=json"], z.boolean());
    },

    async configGet() {
      const output = await runJson(
        "config-get",
        ["--format=json", "--all"],
        ConfigOutputSchema,
      );
      return output ?? {};
    },

    async relationIds(relationName) {
      const refs = await runJson(
        "relation-ids",
        ["--format=json", relationName],
        RelationIdsOutputSchema.nullable(),
      );
      return (refs ?? []).map(parseRelationId);
    },

    async relationGet(relationName, relationId, owner, app) {
      const args = ["-r", relationRef(relationName, relationId), "--format=json"];
      if (app) {
        args.push("--app");
      }
      args.push("-", owner);
      const data = await runJson("relation-get", args, RelationDataOutputSchema);
      return data ?? {};
    },

    async relationSet(relationName, relationId, data, app) {
      const args = ["-r", relationRef(relationName, relationId)];
      if (app) {
        args.push("--app");
      }
      // Values can be larger than a single command-line argument may be
      args.push("--file", "-");
      await run("relation-set", args, stringifyYaml(data, { lineWidth: 0 }));
    },

    async jujuLog(level, message) {
      await run("juju-log", ["--log-level", level, message]);
    },
  };
}
