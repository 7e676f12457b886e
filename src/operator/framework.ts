import { logger } from "../lib/logger";
import type { DeferredNotice, EventSnapshot } from "../types/charm";
import type { DeferredStore } from "./deferred-store";
import { describeEvent } from "./events";
import type { Model, Relation } from "./model";

/**
 * Event as seen by an observer
 */
export interface HookEvent {
  readonly snapshot: EventSnapshot;
  readonly relation: Relation | undefined;
  /** Ask to see this event again on the next dispatch */
  defer(): void;
}

export type EventHandler = (event: HookEvent) => Promise<void>;

interface Observer {
  id: string;
  handler: EventHandler;
}

/**
 * Registry - holds the observers of every event name
 */
interface Registry {
  observers: Map<string, Observer[]>;
}

export interface Framework {
  readonly model: Model;
  observe(eventName: string, observerId: string, handler: EventHandler): void;
  emit(snapshot: EventSnapshot): Promise<void>;
  dispatch(snapshot: EventSnapshot): Promise<void>;
}

export interface FrameworkOptions {
  model: Model;
  store: DeferredStore;
}

const createRegistry = (): Registry => ({
  observers: new Map(),
});

/**
 * Create the framework that routes one dispatch to the charm's observers
 */
export function createFramework({ model, store }: FrameworkOptions): Framework {
  const registry = createRegistry();
  // Notices deferred during the current dispatch
  let pending: DeferredNotice[] = [];

  const toHookEvent = (snapshot: EventSnapshot, onDefer: () => void): HookEvent => ({
    snapshot,
    relation:
      snapshot.relationName !== undefined && snapshot.relationId !== undefined
        ? model.getRelationById(snapshot.relationName, snapshot.relationId, snapshot.remoteApp)
        : undefined,
    defer: onDefer,
  });

  const runObserver = async (snapshot: EventSnapshot, observer: Observer) => {
    let deferred = false;
    await observer.handler(
      toHookEvent(snapshot, () => {
        deferred = true;
      }),
    );

    if (deferred) {
      logger.debug(
        { event: describeEvent(snapshot), observer: observer.id },
        "Deferring event",
      );
      pending.push({ event: snapshot, observer: observer.id });
    }
  };

  const emit = async (snapshot: EventSnapshot) => {
    const observers = registry.observers.get(snapshot.name) ?? [];
    if (observers.length === 0) {
      logger.debug({ event: describeEvent(snapshot) }, "No observers for event");
      return;
    }

    for (const observer of observers) {
      await runObserver(snapshot, observer);
    }
  };

  const reemitDeferred = async (notices: DeferredNotice[]) => {
    for (const notice of notices) {
      const observer = registry.observers
        .get(notice.event.name)
        ?.find((o) => o.id === notice.observer);

      if (!observer) {
        logger.warn(
          { event: describeEvent(notice.event), observer: notice.observer },
          "Dropping deferred event without an observer",
        );
        continue;
      }

      logger.debug(
        { event: describeEvent(notice.event), observer: notice.observer },
        "Re-emitting deferred event",
      );
      await runObserver(notice.event, observer);
    }
  };

  return {
    model,

    observe(eventName, observerId, handler) {
      const observers = registry.observers.get(eventName) ?? [];
      if (observers.some((o) => o.id === observerId)) {
        throw new Error(`Observer ${observerId} already registered for ${eventName}`);
      }
      observers.push({ id: observerId, handler });
      registry.observers.set(eventName, observers);
    },

    emit,

    async dispatch(snapshot) {
      pending = [];
      const notices = await store.load();

      await reemitDeferred(notices);

      logger.info({ event: describeEvent(snapshot) }, `Emitting ${snapshot.name}`);
      await emit(snapshot);

      await store.save(pending);
      logger.debug({ deferred: pending.length }, "Dispatch complete");
    },
  };
}
