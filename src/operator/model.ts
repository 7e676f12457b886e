import { logger } from "../lib/logger";
import type { Layer, Plan, ServiceInfo, UnitStatus } from "../types/charm";
import type { HookTools } from "./hook-tools";
import type { PebbleClient } from "./pebble-client";
import { PebbleApiError, PebbleConnectionError } from "./pebble-client";

/**
 * Raised when the model does not hold what the charm asked for
 */
export class ModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelError";
  }
}

export interface Container {
  readonly name: string;
  canConnect(): Promise<boolean>;
  getPlan(): Promise<Plan>;
  addLayer(label: string, layer: Layer, options: { combine: boolean }): Promise<void>;
  restart(...services: string[]): Promise<void>;
  getService(name: string): Promise<ServiceInfo>;
  push(path: string, content: string): Promise<void>;
}

export interface Relation {
  readonly id: number;
  readonly name: string;
  readonly remoteApp: string | undefined;
  getAppData(): Promise<Record<string, string>>;
  setAppData(data: Record<string, string>): Promise<void>;
}

export interface Unit {
  readonly name: string;
  readonly appName: string;
  isLeader(): Promise<boolean>;
  setStatus(status: UnitStatus): Promise<void>;
  getStatus(): Promise<UnitStatus>;
  getContainer(name: string): Container;
}

export interface Model {
  readonly unit: Unit;
  readonly appName: string;
  getRelation(name: string): Promise<Relation | undefined>;
  relations(name: string): Promise<Relation[]>;
  getRelationById(name: string, id: number, remoteApp?: string): Relation;
  config(): Promise<Record<string, unknown>>;
}

export interface ModelOptions {
  unitName: string;
  appName: string;
  hookTools: HookTools;
  pebbleFor: (container: string) => PebbleClient;
}

/**
 * Container backed by the Pebble client of a workload container
 */
export function createContainer(name: string, pebble: PebbleClient): Container {
  return {
    name,

    async canConnect() {
      try {
        await pebble.getSystemInfo();
        return true;
      } catch (error) {
        if (error instanceof PebbleConnectionError || error instanceof PebbleApiError) {
          logger.debug({ container: name, error: error.message }, "Cannot connect to Pebble");
          return false;
        }
        throw error;
      }
    },

    getPlan: () => pebble.getPlan(),

    addLayer: (label, layer, options) => pebble.addLayer(label, layer, options),

    restart: (...services) => pebble.restartServices(services),

    async getService(serviceName) {
      const services = await pebble.getServices([serviceName]);
      const service = services.find((s) => s.name === serviceName);
      if (!service) {
        throw new ModelError(`service ${serviceName} not found`);
      }
      return service;
    },

    push: (path, content) => pebble.push(path, content, { makeDirs: true }),
  };
}

/**
 * Create the model view of the running unit
 */
export function createModel({
  unitName,
  appName,
  hookTools,
  pebbleFor,
}: ModelOptions): Model {
  let lastStatus: UnitStatus | null = null;
  let leader: boolean | null = null;
  let charmConfig: Record<string, unknown> | null = null;
  const containers = new Map<string, Container>();

  const relation = (name: string, id: number, remoteApp?: string): Relation => ({
    id,
    name,
    remoteApp,
    getAppData: () => hookTools.relationGet(name, id, appName, true),
    setAppData: (data) => hookTools.relationSet(name, id, data, true),
  });

  const relations = async (name: string): Promise<Relation[]> => {
    const ids = await hookTools.relationIds(name);
    return ids.map((id) => relation(name, id));
  };

  const unit: Unit = {
    name: unitName,
    appName,

    async isLeader() {
      // Leadership is stable for the length of a hook
      if (leader === null) {
        leader = await hookTools.isLeader();
      }
      return leader;
    },

    async setStatus(status) {
      await hookTools.statusSet(status);
      lastStatus = status;
    },

    async getStatus() {
      return lastStatus ?? (await hookTools.statusGet());
    },

    getContainer(name) {
      let container = containers.get(name);
      if (!container) {
        container = createContainer(name, pebbleFor(name));
        containers.set(name, container);
      }
      return container;
    },
  };

  return {
    unit,
    appName,

    async getRelation(name) {
      const [first] = await relations(name);
      return first;
    },

    relations,

    getRelationById: relation,

    async config() {
      if (charmConfig === null) {
        charmConfig = await hookTools.configGet();
      }
      return charmConfig;
    },
  };
}
