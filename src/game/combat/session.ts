import type {
  ActionRequest,
  ActionScheduler,
  ActorId,
  ExecutedAction,
  ReactionRequest,
  ResourceTimer,
  ResourceTimerOptions,
} from "../../engine/initiative";
import type { InitiativeStatsTracker } from "../../stats/tracker";
import {
  buildExecutionLines,
  buildQueueLine,
  buildWindowClosedLine,
} from "../logging/initiativeLog";

export type ResolverContext = {
  scheduler: ActionScheduler;
  pool: ResourceTimer;
};

/** Consumes executed actions and applies their effects to combat state. */
export interface EffectResolver {
  resolve: (action: ExecutedAction, context: ResolverContext) => void;
}

export type CombatSessionOptions = {
  scheduler: ActionScheduler;
  resolver: EffectResolver;
  log?: (line: string) => void;
  stats?: InitiativeStatsTracker;
};

export type CombatSession = ReturnType<typeof createCombatSession>;

/**
 * Frame-level orchestrator around one scheduler: forwards commits, ticks once
 * per frame and routes each executed action to the effect resolver in the
 * order the scheduler returned them.
 */
export function createCombatSession({
  scheduler,
  resolver,
  log = () => {},
  stats,
}: CombatSessionOptions) {
  const register = (actorId: ActorId, overrides?: ResourceTimerOptions) =>
    scheduler.registerActor(actorId, overrides);

  const commit = (actorId: ActorId, request: ActionRequest) => {
    const accepted = scheduler.enqueue(actorId, request);
    stats?.recordEnqueue(actorId, accepted);
    log(buildQueueLine(scheduler.now(), actorId, request, accepted));
    return accepted;
  };

  const react = (actorId: ActorId, request: ReactionRequest) => {
    const accepted = scheduler.queueReaction(actorId, request);
    stats?.recordEnqueue(actorId, accepted);
    log(
      buildQueueLine(
        scheduler.now(),
        actorId,
        { ...request, priority: "instant" },
        accepted
      )
    );
    return accepted;
  };

  const advance = (deltaTime: number): ExecutedAction[] => {
    const gate = scheduler.reactionWindow();
    const triggerBefore = gate.triggeringAction();
    const executed = scheduler.tick(deltaTime);

    if (triggerBefore && gate.triggeringAction() !== triggerBefore) {
      log(buildWindowClosedLine(scheduler.now()));
    }

    executed.forEach((action) => {
      stats?.recordExecution(action);
      buildExecutionLines(action).forEach((line) => log(line));
      resolver.resolve(action, {
        scheduler,
        pool: scheduler.getPool(action.actorId),
      });
    });
    return executed;
  };

  const cancel = (actorId: ActorId) => {
    const removed = scheduler.dequeueAll(actorId);
    stats?.recordCancel(actorId, removed);
    return removed;
  };

  return {
    scheduler,
    register,
    commit,
    react,
    advance,
    cancel,
    preview: (actorId: ActorId) => scheduler.previewState(actorId),
  };
}
