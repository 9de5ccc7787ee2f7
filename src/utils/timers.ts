export type CancelFn = () => void;

export type FrameScheduler = (callback: (time: number) => void) => CancelFn;

const FALLBACK_FRAME_MS = 16;

export const scheduleTimeout = (
  callback: () => void,
  durationMs: number
): CancelFn => {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    callback();
    return () => {};
  }
  let cancelled = false;
  const handle = setTimeout(() => {
    if (!cancelled) {
      callback();
    }
  }, durationMs);
  return () => {
    if (!cancelled) {
      cancelled = true;
      clearTimeout(handle);
    }
  };
};

/**
 * requestAnimationFrame where the host has one (browsers, jsdom), otherwise a
 * ~60Hz timeout so the same code keeps ticking under Node.
 */
export const scheduleAnimationFrame: FrameScheduler = (callback) => {
  if (
    typeof globalThis.requestAnimationFrame === "function" &&
    typeof globalThis.cancelAnimationFrame === "function"
  ) {
    const handle = globalThis.requestAnimationFrame(callback);
    let cancelled = false;
    return () => {
      if (!cancelled) {
        cancelled = true;
        globalThis.cancelAnimationFrame(handle);
      }
    };
  }
  return scheduleTimeout(() => callback(Date.now()), FALLBACK_FRAME_MS);
};
