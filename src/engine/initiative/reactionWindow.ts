import {
  TIME_EPSILON,
  type ExecutedAction,
  type ReactionWindowView,
} from "./types";

type OpenWindow = {
  triggeringAction: ExecutedAction;
  remainingDuration: number;
};

export type ReactionWindow = ReturnType<typeof createReactionWindow>;

/**
 * Single global interrupt gate. While open, only instant-priority actions may
 * begin casting. The first trigger wins: opening an already open window does
 * not reset or extend it.
 */
export function createReactionWindow() {
  let current: OpenWindow | null = null;

  const open = (triggeringAction: ExecutedAction, duration: number) => {
    if (current || !(duration > 0)) {
      return false;
    }
    current = { triggeringAction, remainingDuration: duration };
    return true;
  };

  /** Returns true on the tick that closed the window. */
  const tick = (deltaTime: number) => {
    if (!current) return false;
    current.remainingDuration -= deltaTime;
    if (current.remainingDuration <= TIME_EPSILON) {
      current = null;
      return true;
    }
    return false;
  };

  const view: ReactionWindowView = {
    isOpen: () => current !== null,
    remaining: () => (current ? Math.max(0, current.remainingDuration) : 0),
    triggeringAction: () => current?.triggeringAction ?? null,
  };

  return {
    ...view,
    open,
    tick,
    view,
  };
}
