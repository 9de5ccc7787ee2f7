import {
  resolveInitiativeConfig,
  type InitiativeConfig,
} from "../../config/initiative";
import {
  consoleInitiativeLogger,
  type InitiativeLogger,
} from "../../utils/debug";
import { buildPreview } from "./preview";
import { createReactionWindow } from "./reactionWindow";
import {
  createResourceTimer,
  type ResourceTimer,
  type ResourceTimerOptions,
} from "./resourceTimer";
import {
  canStartCasting,
  insertSorted,
  isCastComplete,
} from "./stateMachine";
import type {
  ActionRequest,
  ActorId,
  ActorVitals,
  CastingState,
  ExecutedAction,
  PendingAction,
  PreviewEntry,
  ReactionRequest,
  ReactionWindowView,
} from "./types";

export type ActionSchedulerOptions = {
  config?: Partial<InitiativeConfig>;
  logger?: InitiativeLogger;
};

type ActorEntry = {
  pool: ResourceTimer;
  queue: PendingAction[];
  vitals: ActorVitals | null;
};

export type ActionScheduler = ReturnType<typeof createActionScheduler>;

const assertValidCost = (cost: number) => {
  if (!Number.isInteger(cost) || cost < 0) {
    throw new Error(`Action cost must be a non-negative integer, got ${cost}`);
  }
};

const assertValidCastDuration = (castDuration: number) => {
  if (!Number.isFinite(castDuration) || castDuration < 0) {
    throw new Error(`Cast duration must be a finite non-negative number, got ${castDuration}`);
  }
};

/**
 * Initiative queue. Owns one pool and one ordered queue per actor plus the
 * shared reaction window. Every mutation of that state happens inside
 * `tick`; `enqueue`, `queueReaction` and `dequeueAll` only add or remove queue
 * entries between ticks.
 */
export function createActionScheduler({
  config: overrides = {},
  logger = consoleInitiativeLogger,
}: ActionSchedulerOptions = {}) {
  const config = resolveInitiativeConfig(overrides);
  const actors = new Map<ActorId, ActorEntry>();
  const reactionWindow = createReactionWindow();
  let clock = 0;
  let sequence = 0;

  const requireActor = (actorId: ActorId): ActorEntry => {
    const entry = actors.get(actorId);
    if (!entry) {
      throw new Error(`Unknown actor "${actorId}"`);
    }
    return entry;
  };

  const registerActor = (
    actorId: ActorId,
    poolOverrides: ResourceTimerOptions = {}
  ): ResourceTimer => {
    if (actors.has(actorId)) {
      throw new Error(`Actor "${actorId}" is already registered`);
    }
    const pool = createResourceTimer({
      capacity: config.capacity,
      capacityCeiling: config.capacityCeiling,
      startingAmount: config.startingAmount,
      regenerationRate: config.baseRegenerationRate,
      momentumCap: config.momentumCap,
      momentumStackLimit: config.momentumStackLimit,
      resonanceTolerance: config.resonanceTolerance,
      favorBound: config.favorBound,
      ...poolOverrides,
    });
    actors.set(actorId, { pool, queue: [], vitals: null });
    return pool;
  };

  const removeActor = (actorId: ActorId) => actors.delete(actorId);

  const isAdmissible = (pool: ResourceTimer, cost: number) => {
    if (cost > pool.capacity) return false;
    if (pool.canAfford(cost)) return true;
    if (!(pool.regenerationRate > 0)) return false;
    const timeToAfford = (cost - pool.currentAmount) / pool.regenerationRate;
    return timeToAfford <= config.enqueueHorizon;
  };

  const enqueue = (actorId: ActorId, request: ActionRequest): boolean => {
    const entry = requireActor(actorId);
    const { intent, cost, priority = "normal", castDuration = 0 } = request;
    assertValidCost(cost);
    assertValidCastDuration(castDuration);

    if (!isAdmissible(entry.pool, cost)) {
      logger.debug("enqueue rejected", {
        actorId,
        kind: intent.kind,
        cost,
        currentAmount: entry.pool.currentAmount,
      });
      return false;
    }

    sequence += 1;
    insertSorted(entry.queue, {
      id: sequence,
      actorId,
      intent,
      priority,
      cost,
      castDuration,
      queuedAt: clock,
      state: { phase: "queued" },
    });
    logger.debug("action queued", { actorId, id: sequence, kind: intent.kind });
    return true;
  };

  const queueReaction = (actorId: ActorId, request: ReactionRequest) => {
    requireActor(actorId);
    const trigger = reactionWindow.triggeringAction();
    if (!trigger) {
      return false;
    }
    return enqueue(actorId, {
      intent: {
        ...request.intent,
        respondsTo: request.intent.respondsTo ?? trigger.id,
      },
      cost: request.cost,
      priority: "instant",
      castDuration: request.castDuration ?? 0,
    });
  };

  const beginCast = (action: PendingAction, pool: ResourceTimer) => {
    const resonance = pool.resonanceLevel(action.cost);
    if (!pool.spend(action.cost)) {
      logger.warn("spend failed after affordability check", {
        actorId: action.actorId,
        id: action.id,
        cost: action.cost,
        currentAmount: pool.currentAmount,
      });
      return;
    }
    if (action.intent.kind === "playCard") {
      pool.updateMomentum(action.cost);
    }
    action.state = {
      phase: "casting",
      castStartedAt: clock,
      cast: {
        resonance,
        momentumStacks: pool.momentumStacks,
        momentumReduction: pool.momentumReduction(),
      },
    };
    logger.debug("cast started", {
      actorId: action.actorId,
      id: action.id,
      castDuration: action.castDuration,
    });
  };

  const execute = (
    action: PendingAction,
    state: CastingState,
    pool: ResourceTimer
  ): ExecutedAction => {
    const { intent } = action;
    const opensWindow =
      intent.kind === "playCard" &&
      action.priority !== "instant" &&
      config.reactionWindowDuration > 0 &&
      !reactionWindow.isOpen();

    const executed: ExecutedAction = Object.freeze({
      id: action.id,
      actorId: action.actorId,
      intent: Object.freeze({ ...intent }),
      priority: action.priority,
      cost: action.cost,
      castDuration: action.castDuration,
      queuedAt: action.queuedAt,
      castStartedAt: state.castStartedAt,
      cast: Object.freeze({ ...state.cast }),
      executedAt: clock,
      openedReactionWindow: opensWindow,
    });

    if (intent.kind === "playCard" && intent.alignment) {
      pool.applyAlignment(intent.alignment);
    }
    if (opensWindow) {
      reactionWindow.open(executed, config.reactionWindowDuration);
      logger.debug("reaction window opened", {
        trigger: executed.id,
        duration: config.reactionWindowDuration,
      });
    }
    logger.debug("action executed", { actorId: action.actorId, id: action.id });
    return executed;
  };

  const walkQueue = (entry: ActorEntry, executed: ExecutedAction[]) => {
    const { queue, pool } = entry;
    let index = 0;
    while (index < queue.length) {
      const action = queue[index];
      const { state } = action;
      switch (state.phase) {
        case "queued":
          if (canStartCasting(action, pool, reactionWindow.isOpen())) {
            beginCast(action, pool);
          }
          index += 1;
          break;
        case "casting":
          if (!isCastComplete(action, clock)) {
            index += 1;
            break;
          }
          // The successor shifts into `index`; do not advance.
          queue.splice(index, 1);
          executed.push(execute(action, state, pool));
          break;
      }
    }
  };

  const tick = (deltaTime: number): ExecutedAction[] => {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) {
      throw new Error(`Tick delta must be a finite non-negative number, got ${deltaTime}`);
    }
    clock += deltaTime;

    actors.forEach(({ pool, vitals }) => {
      if (vitals) {
        pool.setRegenerationRate(
          pool.dynamicRegenerationRate(vitals.healthRatio, vitals.hasBlessing)
        );
      }
      pool.regenerate(deltaTime);
    });

    if (reactionWindow.tick(deltaTime)) {
      logger.debug("reaction window closed");
    }

    const executed: ExecutedAction[] = [];
    actors.forEach((entry) => walkQueue(entry, executed));
    return executed;
  };

  const dequeueAll = (actorId: ActorId) => {
    const { queue } = requireActor(actorId);
    const removed = queue.length;
    const unrefunded = queue.filter((action) => action.state.phase === "casting");
    if (unrefunded.length > 0) {
      logger.debug("cleared casting actions without refund", {
        actorId,
        ids: unrefunded.map((action) => action.id),
      });
    }
    queue.length = 0;
    return removed;
  };

  const previewState = (actorId: ActorId): PreviewEntry[] => {
    const { queue, pool } = requireActor(actorId);
    return buildPreview(queue, pool, reactionWindow.isOpen(), clock);
  };

  const inspectQueue = (actorId: ActorId): ReadonlyArray<Readonly<PendingAction>> =>
    requireActor(actorId).queue.map((action) => ({
      ...action,
      state: { ...action.state },
    }));

  const updateVitals = (actorId: ActorId, vitals: ActorVitals) => {
    requireActor(actorId).vitals = { ...vitals };
  };

  const clearVitals = (actorId: ActorId) => {
    const entry = requireActor(actorId);
    entry.vitals = null;
    entry.pool.setRegenerationRate(entry.pool.baseRegenerationRate);
  };

  const windowView: ReactionWindowView = reactionWindow.view;

  return {
    config,
    registerActor,
    removeActor,
    hasActor: (actorId: ActorId) => actors.has(actorId),
    actorIds: () => Array.from(actors.keys()),
    getPool: (actorId: ActorId) => requireActor(actorId).pool,
    updateVitals,
    clearVitals,
    enqueue,
    queueReaction,
    tick,
    dequeueAll,
    previewState,
    inspectQueue,
    reactionWindow: () => windowView,
    now: () => clock,
  };
}
