/**
 * In-memory Juju hook tools for testing
 */

import type { HookTools, JujuLogLevel } from "../../operator/hook-tools";
import { HookToolError } from "../../operator/hook-tools";
import type { UnitStatus } from "../../types/charm";
import { unknownStatus } from "../../types/charm";

export interface FakeRelation {
  id: number;
  name: string;
  remoteApp: string;
  units: string[];
  /** Data bags keyed by owner (unit or application name) */
  data: Map<string, Record<string, string>>;
}

export interface FakeHookTools extends HookTools {
  leader: boolean;
  charmConfig: Record<string, unknown>;
  statusHistory: UnitStatus[];
  relations: Map<number, FakeRelation>;
  logs: Array<{ level: JujuLogLevel; message: string }>;
  addRelation(name: string, remoteApp: string): FakeRelation;
}

export interface FakeHookToolsOptions {
  appName: string;
  leader?: boolean;
  config?: Record<string, unknown>;
}

export function createFakeHookTools({
  appName,
  leader = true,
  config = {},
}: FakeHookToolsOptions): FakeHookTools {
  let nextRelationId = 0;

  const getRelation = (relationName: string, relationId: number): FakeRelation => {
    const relation = tools.relations.get(relationId);
    if (!relation || relation.name !== relationName) {
      throw new HookToolError(
        "relation-get",
        2,
        `ERROR invalid value "${relationName}:${relationId}" for option -r: relation not found`,
      );
    }
    return relation;
  };

  const tools: FakeHookTools = {
    leader,
    charmConfig: { ...config },
    statusHistory: [],
    relations: new Map(),
    logs: [],

    addRelation(name, remoteApp) {
      const relation: FakeRelation = {
        id: nextRelationId++,
        name,
        remoteApp,
        units: [],
        data: new Map(),
      };
      tools.relations.set(relation.id, relation);
      return relation;
    },

    async statusSet(status) {
      tools.statusHistory.push(status);
    },

    async statusGet() {
      return tools.statusHistory[tools.statusHistory.length - 1] ?? unknownStatus();
    },

    async isLeader() {
      return tools.leader;
    },

    async configGet() {
      return { ...tools.charmConfig };
    },

    async relationIds(relationName) {
      return [...tools.relations.values()]
        .filter((r) => r.name === relationName)
        .map((r) => r.id);
    },

    async relationGet(relationName, relationId, owner) {
      const relation = getRelation(relationName, relationId);
      return { ...(relation.data.get(owner) ?? {}) };
    },

    async relationSet(relationName, relationId, data, app) {
      const relation = getRelation(relationName, relationId);
      if (app && !tools.leader) {
        throw new HookToolError(
          "relation-set",
          1,
          "ERROR cannot write relation settings: unit is not the leader",
        );
      }

      const owner = app ? appName : `${appName}/0`;
      const bag = { ...(relation.data.get(owner) ?? {}) };
      for (const [key, value] of Object.entries(data)) {
        if (value === "") {
          delete bag[key];
        } else {
          bag[key] = value;
        }
      }
      relation.data.set(owner, bag);
    },

    async jujuLog(level, message) {
      tools.logs.push({ level, message });
    },
  };

  return tools;
}
