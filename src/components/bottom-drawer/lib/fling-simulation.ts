import type { FrameScheduler } from './frame-scheduler';
import type { ScrollableCollaborator } from './types';
import { debugLog } from './debug';

export const FLING_DRAG = 0.99;
/** px/s below which the fling is considered settled. */
export const FLING_TOLERANCE = 0.1;

/**
 * Exponentially decaying scroll, in the scrollable's offset space.
 *
 * `velocity` is px/s in screen direction: positive when the pointer moved
 * down, which pulls the list back toward its start.
 */
export class FlingSimulation {
  readonly position: number;
  readonly velocity: number;
  readonly drag: number;
  private readonly k: number;

  constructor(position: number, velocity: number, drag = FLING_DRAG) {
    this.position = position;
    this.velocity = velocity;
    this.drag = drag;
    this.k = (1000 * (drag - 1)) / drag;
  }

  get finalPosition(): number {
    return this.position + this.velocity / this.k;
  }

  /** Milliseconds until the velocity decays below the tolerance. */
  get duration(): number {
    if (this.velocity === 0) return 0;
    const seconds = Math.log((-this.k * FLING_TOLERANCE) / Math.abs(this.velocity)) / this.k;
    return seconds > 0 ? seconds * 1000 : 0;
  }

  positionAt(elapsedMs: number): number {
    return this.position + ((Math.pow(this.drag, elapsedMs) - 1) / this.k) * -this.velocity;
  }

  isDone(elapsedMs: number): boolean {
    return elapsedMs >= this.duration;
  }
}

/**
 * Drives a {@link FlingSimulation} on a scrollable, one jump per frame.
 */
export class ScrollFling {
  private handle: number | null = null;
  private startedAt = 0;
  private simulation: FlingSimulation | null = null;

  constructor(
    private readonly scheduler: FrameScheduler,
    private readonly scrollable: ScrollableCollaborator,
  ) {}

  get isRunning(): boolean {
    return this.handle !== null;
  }

  /** Returns false when there is nothing to simulate. */
  start(velocity: number): boolean {
    this.cancel();
    if (velocity === 0) return false;

    const simulation = new FlingSimulation(this.scrollable.offset, velocity);
    if (simulation.duration <= 0) return false;

    debugLog('fling', { velocity, from: simulation.position, to: simulation.finalPosition });
    this.simulation = simulation;
    this.startedAt = this.scheduler.now();
    this.handle = this.scheduler.requestFrame(this.tick);
    return true;
  }

  cancel(): void {
    if (this.handle !== null) {
      this.scheduler.cancelFrame(this.handle);
      this.handle = null;
    }
    this.simulation = null;
  }

  private tick = (now: number): void => {
    this.handle = null;
    const simulation = this.simulation;
    if (!simulation) return;

    // A frame timestamp can predate the call to start()
    const elapsed = Math.max(0, now - this.startedAt);
    const done = simulation.isDone(elapsed);
    this.scrollable.jumpTo(simulation.positionAt(done ? simulation.duration : elapsed));

    if (done || this.scrollable.isOutOfRange) {
      this.simulation = null;
      return;
    }
    this.handle = this.scheduler.requestFrame(this.tick);
  };
}
