import type { ResourceTimer } from "./resourceTimer";
import {
  PRIORITY_RANK,
  TIME_EPSILON,
  type PendingAction,
} from "./types";

/**
 * Queued -> Casting -> Ready -> Executed.
 *
 * Only Queued and Casting are stored on the action; Ready is a Casting action
 * whose cast time has run out against the scheduler clock. Executed actions
 * leave the queue, so they never show up here.
 */
export type ActionStage = "queued" | "casting" | "ready";

export const isCastComplete = (action: PendingAction, clock: number) => {
  const { state } = action;
  if (state.phase !== "casting") {
    return false;
  }
  if (action.priority === "instant" || action.castDuration <= 0) {
    return true;
  }
  return clock - state.castStartedAt + TIME_EPSILON >= action.castDuration;
};

export const resolveStage = (
  action: PendingAction,
  clock: number
): ActionStage => {
  switch (action.state.phase) {
    case "queued":
      return "queued";
    case "casting":
      return isCastComplete(action, clock) ? "ready" : "casting";
  }
};

export const isBlockedByReaction = (
  action: PendingAction,
  windowOpen: boolean
) => windowOpen && action.priority !== "instant";

export const canStartCasting = (
  action: PendingAction,
  pool: ResourceTimer,
  windowOpen: boolean
) =>
  action.state.phase === "queued" &&
  pool.canAfford(action.cost) &&
  !isBlockedByReaction(action, windowOpen);

export const remainingCastTime = (action: PendingAction, clock: number) => {
  const { state } = action;
  if (state.phase === "queued") return action.castDuration;
  if (isCastComplete(action, clock)) return 0;
  return Math.max(0, action.castDuration - (clock - state.castStartedAt));
};

export const compareActions = (a: PendingAction, b: PendingAction) =>
  PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
  a.queuedAt - b.queuedAt ||
  a.id - b.id;

/** Inserts keeping `(priority, queuedAt, id)` order; equal keys stay FIFO. */
export const insertSorted = (queue: PendingAction[], action: PendingAction) => {
  const index = queue.findIndex((item) => compareActions(action, item) < 0);
  if (index === -1) {
    queue.push(action);
  } else {
    queue.splice(index, 0, action);
  }
};
