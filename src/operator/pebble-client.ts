import { request as httpRequest } from "node:http";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { logger } from "../lib/logger";
import type { Layer, Plan, ServiceInfo } from "../types/charm";
import { PlanSchema, ServiceInfoSchema } from "../types/charm";

/**
 * Raised when the Pebble socket cannot be reached
 */
export class PebbleConnectionError extends Error {
  constructor(
    readonly socketPath: string,
    message: string,
  ) {
    super(message);
    this.name = "PebbleConnectionError";
  }
}

/**
 * Raised when Pebble answers with an error response
 */
export class PebbleApiError extends Error {
  constructor(
    readonly statusCode: number,
    readonly kind: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = "PebbleApiError";
  }
}

/**
 * Raised when an asynchronous change (start, restart...) finishes with an error
 */
export class ChangeError extends Error {
  constructor(
    readonly changeId: string,
    readonly err: string,
  ) {
    super(`Change ${changeId} failed: ${err}`);
    this.name = "ChangeError";
  }
}

export interface SystemInfo {
  version: string;
}

export interface PushOptions {
  makeDirs?: boolean;
  permissions?: number;
}

export interface PebbleClient {
  getSystemInfo(): Promise<SystemInfo>;
  getPlan(): Promise<Plan>;
  addLayer(label: string, layer: Layer, options: { combine: boolean }): Promise<void>;
  getServices(names?: string[]): Promise<ServiceInfo[]>;
  restartServices(names: string[]): Promise<void>;
  push(path: string, content: string, options?: PushOptions): Promise<void>;
}

export interface PebbleClientOptions {
  timeoutMs?: number;
  changeWaitTimeout?: string;
}

const ResponseSchema = z.object({
  type: z.enum(["sync", "async", "error"]),
  "status-code": z.number(),
  status: z.string(),
  result: z.unknown().optional(),
  change: z.string().optional(),
});

type PebbleResponse = z.infer<typeof ResponseSchema>;

const ErrorResultSchema = z.object({
  message: z.string(),
  kind: z.string().optional(),
});

const SystemInfoSchema = z.object({ version: z.string() }).passthrough();

const ChangeSchema = z.object({
  id: z.string(),
  kind: z.string(),
  status: z.string(),
  ready: z.boolean(),
  err: z.string().optional(),
});

const FileResultsSchema = z.array(
  z.object({
    path: z.string(),
    error: ErrorResultSchema.optional(),
  }),
);

interface RequestOptions {
  query?: Record<string, string>;
  body?: Buffer | string;
  contentType?: string;
}

/**
 * Socket path of the Pebble daemon for a workload container
 */
export const pebbleSocketPath = (container: string): string =>
  `/charm/containers/${container}/pebble.socket`;

/**
 * Create a Pebble API client talking to a unix socket
 */
export function createPebbleClient(
  socketPath: string,
  options: PebbleClientOptions = {},
): PebbleClient {
  const { timeoutMs = 30_000, changeWaitTimeout = "30s" } = options;

  const send = (
    method: string,
    path: string,
    { query, body, contentType }: RequestOptions = {},
  ): Promise<{ statusCode: number; text: string }> =>
    new Promise((resolve, reject) => {
      const search = query ? `?${new URLSearchParams(query).toString()}` : "";
      const headers: Record<string, string | number> = {
        Accept: "application/json",
      };
      if (body !== undefined) {
        headers["Content-Type"] = contentType || "application/json";
        headers["Content-Length"] = Buffer.byteLength(body);
      }

      const req = httpRequest(
        { socketPath, path: `${path}${search}`, method, headers },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("end", () =>
            resolve({
              statusCode: res.statusCode ?? 0,
              text: Buffer.concat(chunks).toString("utf-8"),
            }),
          );
          res.on("error", (error) =>
            reject(new PebbleConnectionError(socketPath, error.message)),
          );
        },
      );

      req.setTimeout(timeoutMs, () => {
        req.destroy(new Error(`timed out after ${timeoutMs}ms`));
      });
      req.on("error", (error) =>
        reject(
          new PebbleConnectionError(
            socketPath,
            `Cannot connect to Pebble at ${socketPath}: ${error.message}`,
          ),
        ),
      );

      if (body !== undefined) {
        req.write(body);
      }
      req.end();
    });

  const call = async (
    method: string,
    path: string,
    requestOptions?: RequestOptions,
  ): Promise<PebbleResponse> => {
    const { statusCode, text } = await send(method, path, requestOptions);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new PebbleApiError(statusCode, undefined, `Invalid JSON from Pebble: ${text}`);
    }

    const parsed = ResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PebbleApiError(
        statusCode,
        undefined,
        `Unexpected response from Pebble: ${parsed.error.message}`,
      );
    }

    const response = parsed.data;
    if (response.type === "error") {
      const error = ErrorResultSchema.safeParse(response.result);
      throw new PebbleApiError(
        response["status-code"],
        error.success ? error.data.kind : undefined,
        error.success ? error.data.message : response.status,
      );
    }

    return response;
  };

  const waitChange = async (changeId: string): Promise<void> => {
    const response = await call("GET", `/v1/changes/${changeId}/wait`, {
      query: { timeout: changeWaitTimeout },
    });
    const change = ChangeSchema.parse(response.result);

    if (change.err) {
      throw new ChangeError(change.id, change.err);
    }
    if (!change.ready) {
      throw new ChangeError(change.id, `not ready after ${changeWaitTimeout}`);
    }
  };

  return {
    async getSystemInfo() {
      const response = await call("GET", "/v1/system-info");
      return SystemInfoSchema.parse(response.result);
    },

    async getPlan() {
      const response = await call("GET", "/v1/plan", { query: { format: "yaml" } });
      const text = z.string().parse(response.result);
      return PlanSchema.parse(parseYaml(text) ?? {});
    },

    async addLayer(label, layer, { combine }) {
      await call("POST", "/v1/layers", {
        body: JSON.stringify({
          action: "add",
          combine,
          label,
          format: "yaml",
          layer: stringifyYaml(layer),
        }),
      });
      logger.debug({ socketPath, label, combine }, "Added Pebble layer");
    },

    async getServices(names) {
      const response = await call("GET", "/v1/services", {
        query: names && names.length > 0 ? { names: names.join(",") } : undefined,
      });
      return z.array(ServiceInfoSchema).parse(response.result ?? []);
    },

    async restartServices(names) {
      const response = await call("POST", "/v1/services", {
        body: JSON.stringify({ action: "restart", services: names }),
      });
      if (!response.change) {
        throw new PebbleApiError(
          response["status-code"],
          undefined,
          "Pebble did not return a change id for restart",
        );
      }
      await waitChange(response.change);
    },

    async push(path, content, { makeDirs = true, permissions } = {}) {
      const form = new FormData();
      form.append(
        "request",
        JSON.stringify({
          action: "write",
          files: [
            {
              path,
              "make-dirs": makeDirs,
              ...(permissions !== undefined
                ? { permissions: permissions.toString(8).padStart(3, "0") }
                : {}),
            },
          ],
        }),
      );
      form.append("files", new Blob([content]), path);

      // Let the platform encode the multipart body and pick the boundary
      const encoded = new Response(form);
      const contentType = encoded.headers.get("content-type") ?? "multipart/form-data";
      const body = Buffer.from(await encoded.arrayBuffer());

      const response = await call("POST", "/v1/files", { body, contentType });
      const results = FileResultsSchema.parse(response.result ?? []);
      for (const result of results) {
        if (result.error) {
          throw new PebbleApiError(
            response["status-code"],
            result.error.kind,
            `Cannot push ${result.path}: ${result.error.message}`,
          );
        }
      }
    },
  };
}
