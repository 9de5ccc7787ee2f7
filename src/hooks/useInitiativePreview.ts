import { useEffect, useRef, useState } from "react";
import type {
  ActionScheduler,
  ActorId,
  PreviewEntry,
  ResourceGauge,
} from "../engine/initiative";
import { scheduleAnimationFrame, type FrameScheduler } from "../utils/timers";

export type InitiativePreviewState = {
  entries: PreviewEntry[];
  gauge: ResourceGauge;
  reactionWindow: { open: boolean; remaining: number };
};

type UseInitiativePreviewOptions = {
  scheduleFrame?: FrameScheduler;
};

const readPreview = (
  scheduler: ActionScheduler,
  actorId: ActorId
): InitiativePreviewState => {
  const gate = scheduler.reactionWindow();
  return {
    entries: scheduler.previewState(actorId),
    gauge: scheduler.getPool(actorId).snapshot(),
    reactionWindow: { open: gate.isOpen(), remaining: gate.remaining() },
  };
};

const sameEntries = (a: PreviewEntry[], b: PreviewEntry[]) =>
  a.length === b.length &&
  a.every((entry, index) => {
    const other = b[index];
    return (
      entry.id === other.id &&
      entry.status === other.status &&
      entry.timeRemaining === other.timeRemaining &&
      entry.blockedByReaction === other.blockedByReaction
    );
  });

const sameGauge = (a: ResourceGauge, b: ResourceGauge) =>
  a.currentAmount === b.currentAmount &&
  a.capacity === b.capacity &&
  a.regenerationRate === b.regenerationRate &&
  a.timeUntilNextUnit === b.timeUntilNextUnit &&
  a.momentumStacks === b.momentumStacks &&
  a.favorScore === b.favorScore &&
  a.paused === b.paused;

const samePreview = (a: InitiativePreviewState, b: InitiativePreviewState) =>
  a.reactionWindow.open === b.reactionWindow.open &&
  a.reactionWindow.remaining === b.reactionWindow.remaining &&
  sameGauge(a.gauge, b.gauge) &&
  sameEntries(a.entries, b.entries);

/**
 * Polls one actor's queue preview once per animation frame. The scheduler is
 * only read; whoever owns it keeps calling `tick`.
 */
export function useInitiativePreview(
  scheduler: ActionScheduler,
  actorId: ActorId,
  { scheduleFrame = scheduleAnimationFrame }: UseInitiativePreviewOptions = {}
): InitiativePreviewState {
  const [preview, setPreview] = useState(() => readPreview(scheduler, actorId));
  const latestRef = useRef(preview);

  useEffect(() => {
    let cancelFrame: (() => void) | null = null;

    const refresh = () => {
      const next = readPreview(scheduler, actorId);
      if (!samePreview(latestRef.current, next)) {
        latestRef.current = next;
        setPreview(next);
      }
    };

    const loop = () => {
      refresh();
      cancelFrame = scheduleFrame(loop);
    };

    refresh();
    cancelFrame = scheduleFrame(loop);
    return () => {
      cancelFrame?.();
      cancelFrame = null;
    };
  }, [scheduler, actorId, scheduleFrame]);

  return preview;
}
