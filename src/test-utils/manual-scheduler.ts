import type { FrameCallback, FrameScheduler } from '@/components/bottom-drawer/lib/frame-scheduler';

/**
 * Scheduler that only moves when told to. Frames requested during a flush run
 * on the next one.
 */
export class ManualScheduler implements FrameScheduler {
  private time = 0;
  private nextHandle = 1;
  private pending = new Map<number, FrameCallback>();

  now(): number {
    return this.time;
  }

  requestFrame(callback: FrameCallback): number {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancelFrame(handle: number): void {
    this.pending.delete(handle);
  }

  get pendingFrames(): number {
    return this.pending.size;
  }

  /** Advance the clock by `ms` and run one frame. */
  advance(ms: number): void {
    this.time += ms;
    const due = Array.from(this.pending.values());
    this.pending.clear();
    due.forEach(callback => callback(this.time));
  }

  /** Step in `frameMs` increments until no frame is pending or `maxFrames` ran. */
  runFrames(frameMs = 16, maxFrames = 1000): number {
    let frames = 0;
    while (this.pending.size > 0 && frames < maxFrames) {
      this.advance(frameMs);
      frames++;
    }
    return frames;
  }
}
