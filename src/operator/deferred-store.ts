import { readFile, rename, writeFile } from "node:fs/promises";
import { z } from "zod";
import { logger } from "../lib/logger";
import type { DeferredNotice } from "../types/charm";
import { DeferredNoticeSchema } from "../types/charm";

/**
 * Storage for events deferred between dispatches
 */
export interface DeferredStore {
  load(): Promise<DeferredNotice[]>;
  save(notices: DeferredNotice[]): Promise<void>;
}

const StoredStateSchema = z.object({
  deferred: z.array(DeferredNoticeSchema),
});

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * JSON file store, written atomically through a temporary file
 */
export function createFileDeferredStore(path: string): DeferredStore {
  return {
    async load() {
      let text: string;
      try {
        text = await readFile(path, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) {
          return [];
        }
        throw error;
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        logger.warn({ path }, "Stored state is not valid JSON, starting empty");
        return [];
      }

      const result = StoredStateSchema.safeParse(json);
      if (!result.success) {
        logger.warn(
          { path, error: result.error.message },
          "Stored state failed validation, starting empty",
        );
        return [];
      }
      return result.data.deferred;
    },

    async save(notices) {
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify({ deferred: notices }, null, 2), "utf-8");
      await rename(tmp, path);
    },
  };
}

/**
 * In-memory store for tests and one-off runs
 */
export function createMemoryDeferredStore(
  initial: DeferredNotice[] = [],
): DeferredStore & { notices: DeferredNotice[] } {
  const store = {
    notices: [...initial],
    async load() {
      return [...store.notices];
    },
    async save(notices: DeferredNotice[]) {
      store.notices = [...notices];
    },
  };
  return store;
}
