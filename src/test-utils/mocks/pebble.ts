/**
 * In-memory Pebble for testing
 */

import type { PebbleClient } from "../../operator/pebble-client";
import { PebbleApiError, PebbleConnectionError } from "../../operator/pebble-client";
import type { Layer, Plan, Service, ServiceInfo } from "../../types/charm";

export interface FakePebble extends PebbleClient {
  connected: boolean;
  layers: Array<{ label: string; layer: Layer }>;
  running: Set<string>;
  files: Map<string, string>;
  restarts: string[][];
  plan(): Plan;
}

export function createFakePebble(
  container: string,
  { connected = true }: { connected?: boolean } = {},
): FakePebble {
  const ensureConnected = () => {
    if (!pebble.connected) {
      throw new PebbleConnectionError(
        `/charm/containers/${container}/pebble.socket`,
        `Cannot connect to Pebble at /charm/containers/${container}/pebble.socket: connect ENOENT`,
      );
    }
  };

  const computePlan = (): Plan => {
    const services: Record<string, Service> = {};
    for (const { layer } of pebble.layers) {
      for (const [name, service] of Object.entries(layer.services)) {
        const existing = services[name];
        services[name] =
          service.override === "merge" && existing
            ? { ...existing, ...service }
            : { ...service };
      }
    }
    return { services };
  };

  const pebble: FakePebble = {
    connected,
    layers: [],
    running: new Set(),
    files: new Map(),
    restarts: [],

    plan: computePlan,

    async getSystemInfo() {
      ensureConnected();
      return { version: "1.10.0" };
    },

    async getPlan() {
      ensureConnected();
      return computePlan();
    },

    async addLayer(label, layer, { combine }) {
      ensureConnected();
      const existing = pebble.layers.find((l) => l.label === label);
      if (!existing) {
        pebble.layers.push({ label, layer: structuredClone(layer) });
        return;
      }
      if (!combine) {
        throw new PebbleApiError(400, undefined, `layer "${label}" already exists`);
      }
      existing.layer = {
        ...existing.layer,
        ...layer,
        services: { ...existing.layer.services, ...structuredClone(layer.services) },
      };
    },

    async getServices(names) {
      ensureConnected();
      const plan = computePlan();
      return Object.entries(plan.services)
        .filter(([name]) => !names || names.length === 0 || names.includes(name))
        .map(
          ([name, service]): ServiceInfo => ({
            name,
            startup: service.startup ?? "disabled",
            current: pebble.running.has(name) ? "active" : "inactive",
          }),
        );
    },

    async restartServices(names) {
      ensureConnected();
      const plan = computePlan();
      for (const name of names) {
        if (!plan.services[name]) {
          throw new PebbleApiError(400, undefined, `service "${name}" does not exist`);
        }
      }
      pebble.restarts.push([...names]);
      for (const name of names) {
        pebble.running.add(name);
      }
    },

    async push(path, content) {
      ensureConnected();
      pebble.files.set(path, content);
    },
  };

  return pebble;
}
