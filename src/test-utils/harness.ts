/**
 * Drives the Alertmanager Configurer charm through Juju events in-process
 */

import type { Mock } from "vitest";
import { vi } from "vitest";
import type { AlertmanagerConfigurerSettings } from "../charm";
import { createSettings, registerAlertmanagerConfigurerCharm } from "../charm";
import { createMemoryDeferredStore } from "../operator/deferred-store";
import { createFramework } from "../operator/framework";
import { createModel } from "../operator/model";
import type { DeferredNotice, EventSnapshot, Plan, UnitStatus } from "../types/charm";
import { unknownStatus } from "../types/charm";
import { TEST_DEFAULT_CONFIG, TEST_MULTITENANT_LABEL } from "./fixtures/alertmanager-configs";
import type { FakeHookTools } from "./mocks/hook-tools";
import { createFakeHookTools } from "./mocks/hook-tools";
import type { FakePebble } from "./mocks/pebble";
import { createFakePebble } from "./mocks/pebble";

export const TEST_APP_NAME = "alertmanager-configurer-k8s";
export const TEST_UNIT_NAME = `${TEST_APP_NAME}/0`;
export const TEST_CHARM_DIR = "/var/lib/juju/agents/unit-alertmanager-configurer-k8s-0/charm";

export interface HarnessOptions {
  leader?: boolean;
  config?: Record<string, unknown>;
  settings?: Partial<AlertmanagerConfigurerSettings>;
  /** Whether Pebble answers in every container from the start */
  canConnect?: boolean;
}

export interface Harness {
  hookTools: FakeHookTools;
  settings: AlertmanagerConfigurerSettings;
  startWatchdog: Mock<(configDir: string) => void>;
  pebble(container: string): FakePebble;
  dispatch(event: EventSnapshot): Promise<void>;
  emit(name: string): Promise<void>;
  addRelation(name: string, remoteApp: string): Promise<number>;
  addRelationUnit(relationId: number, remoteUnit: string): Promise<void>;
  containerPebbleReady(container: string): Promise<void>;
  setCanConnect(container: string, value: boolean): void;
  status(): UnitStatus;
  relationData(relationId: number, owner: string): Record<string, string>;
  plan(container: string): Plan;
  deferred(): DeferredNotice[];
}

export function createHarness({
  leader = true,
  config = { multitenant_label: TEST_MULTITENANT_LABEL },
  settings: settingsOverrides = {},
  canConnect = true,
}: HarnessOptions = {}): Harness {
  const hookTools = createFakeHookTools({ appName: TEST_APP_NAME, leader, config });
  const pebbles = new Map<string, FakePebble>();
  const store = createMemoryDeferredStore();
  const startWatchdog = vi.fn<(configDir: string) => void>();
  const settings = createSettings(TEST_CHARM_DIR, {
    defaultConfig: TEST_DEFAULT_CONFIG,
    ...settingsOverrides,
  });

  const pebble = (container: string): FakePebble => {
    let fake = pebbles.get(container);
    if (!fake) {
      fake = createFakePebble(container, { connected: canConnect });
      pebbles.set(container, fake);
    }
    return fake;
  };

  // Every dispatch gets a fresh model and framework, like a new hook process
  const dispatch = async (event: EventSnapshot) => {
    const model = createModel({
      unitName: TEST_UNIT_NAME,
      appName: TEST_APP_NAME,
      hookTools,
      pebbleFor: pebble,
    });
    const framework = createFramework({ model, store });
    registerAlertmanagerConfigurerCharm(framework, { settings, startWatchdog });
    await framework.dispatch(event);
  };

  const relationOf = (relationId: number) => {
    const relation = hookTools.relations.get(relationId);
    if (!relation) {
      throw new Error(`No relation with id ${relationId}`);
    }
    return relation;
  };

  return {
    hookTools,
    settings,
    startWatchdog,
    pebble,
    dispatch,

    emit: (name) => dispatch({ name }),

    async addRelation(name, remoteApp) {
      const relation = hookTools.addRelation(name, remoteApp);
      await dispatch({
        name: `${name}-relation-created`,
        relationName: name,
        relationId: relation.id,
        remoteApp,
      });
      return relation.id;
    },

    async addRelationUnit(relationId, remoteUnit) {
      const relation = relationOf(relationId);
      relation.units.push(remoteUnit);
      await dispatch({
        name: `${relation.name}-relation-joined`,
        relationName: relation.name,
        relationId,
        remoteApp: relation.remoteApp,
        remoteUnit,
      });
    },

    async containerPebbleReady(container) {
      pebble(container).connected = true;
      await dispatch({ name: `${container}-pebble-ready`, workloadName: container });
    },

    setCanConnect(container, value) {
      pebble(container).connected = value;
    },

    status: () =>
      hookTools.statusHistory[hookTools.statusHistory.length - 1] ?? unknownStatus(),

    relationData: (relationId, owner) => ({ ...(relationOf(relationId).data.get(owner) ?? {}) }),

    plan: (container) => pebble(container).plan(),

    deferred: () => [...store.notices],
  };
}
