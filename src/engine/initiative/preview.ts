import type { ResourceTimer } from "./resourceTimer";
import {
  isBlockedByReaction,
  remainingCastTime,
  resolveStage,
} from "./stateMachine";
import type { PendingAction, PreviewEntry, PreviewStatus } from "./types";

const timeToAfford = (action: PendingAction, pool: ResourceTimer) => {
  const missing = action.cost - pool.currentAmount;
  if (missing <= 0) return 0;
  if (pool.paused || action.cost > pool.capacity || !(pool.regenerationRate > 0)) {
    return Infinity;
  }
  return missing / pool.regenerationRate;
};

const describeAction = (
  action: PendingAction,
  pool: ResourceTimer,
  clock: number
): { status: PreviewStatus; timeRemaining: number } => {
  const stage = resolveStage(action, clock);
  switch (stage) {
    case "ready":
      return { status: "ready", timeRemaining: 0 };
    case "casting":
      return {
        status: "casting",
        timeRemaining: remainingCastTime(action, clock),
      };
    case "queued":
      if (pool.canAfford(action.cost)) {
        return { status: "readyToCast", timeRemaining: action.castDuration };
      }
      return {
        status: "waitingForSand",
        timeRemaining: timeToAfford(action, pool) + action.castDuration,
      };
  }
};

/** Read-only projection of one actor's queue for gauges and timers. */
export const buildPreview = (
  queue: readonly PendingAction[],
  pool: ResourceTimer,
  windowOpen: boolean,
  clock: number
): PreviewEntry[] =>
  queue.map((action) => {
    const { status, timeRemaining } = describeAction(action, pool, clock);
    return {
      id: action.id,
      kind: action.intent.kind,
      priority: action.priority,
      cost: action.cost,
      castDuration: action.castDuration,
      status,
      timeRemaining,
      blockedByReaction:
        action.state.phase === "queued" &&
        isBlockedByReaction(action, windowOpen),
    };
  });
