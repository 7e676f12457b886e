import type { HookEnvironment } from "../lib/config";
import type { EventSnapshot } from "../types/charm";
import { EventSnapshotSchema } from "../types/charm";
import { parseRelationId } from "./hook-tools";

/**
 * Event name from a dispatch path such as "hooks/alertmanager-relation-joined"
 */
export function eventNameFromDispatchPath(dispatchPath: string): string {
  const segments = dispatchPath.split("/").filter((s) => s.length > 0);
  const name = segments[segments.length - 1];
  if (!name) {
    throw new Error(`Invalid dispatch path: ${dispatchPath}`);
  }
  return name;
}

/**
 * Build the snapshot of the event Juju is dispatching
 */
export function eventFromEnvironment(env: HookEnvironment): EventSnapshot {
  return EventSnapshotSchema.parse({
    name: eventNameFromDispatchPath(env.JUJU_DISPATCH_PATH),
    relationName: env.JUJU_RELATION || undefined,
    relationId: env.JUJU_RELATION_ID ? parseRelationId(env.JUJU_RELATION_ID) : undefined,
    remoteApp: env.JUJU_REMOTE_APP || undefined,
    remoteUnit: env.JUJU_REMOTE_UNIT || undefined,
    workloadName: env.JUJU_WORKLOAD_NAME || undefined,
  });
}

/**
 * Short label for log lines
 */
export const describeEvent = (event: EventSnapshot): string =>
  event.relationId !== undefined
    ? `${event.name} (${event.relationName}:${event.relationId})`
    : event.name;
