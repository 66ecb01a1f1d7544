export type FrameCallback = (now: number) => void;

/**
 * Source of frames and time for transitions and flings.
 * Times are milliseconds on a monotonic clock.
 */
export interface FrameScheduler {
  now(): number;
  requestFrame(callback: FrameCallback): number;
  cancelFrame(handle: number): void;
}

const FALLBACK_FRAME_MS = 16;

function timerScheduler(): FrameScheduler {
  return {
    now: () => Date.now(),
    requestFrame: (callback) => {
      const id = setTimeout(() => callback(Date.now()), FALLBACK_FRAME_MS);
      return Number(id);
    },
    cancelFrame: (handle) => clearTimeout(handle),
  };
}

/**
 * requestAnimationFrame when the environment has it, a ~60fps timer otherwise
 * (SSR, workers, tests without fake timers).
 */
export function createBrowserScheduler(): FrameScheduler {
  if (typeof window === 'undefined' || typeof window.requestAnimationFrame !== 'function') {
    return timerScheduler();
  }
  return {
    now: () => performance.now(),
    requestFrame: (callback) => window.requestAnimationFrame(callback),
    cancelFrame: (handle) => window.cancelAnimationFrame(handle),
  };
}
