import type { Curve } from './curves';
import type { FrameScheduler } from './frame-scheduler';

export interface TweenOptions {
  from: number;
  to: number;
  /** Milliseconds. 0 applies `to` synchronously. */
  duration: number;
  curve: Curve;
  scheduler: FrameScheduler;
  onUpdate: (value: number) => void;
  onComplete?: () => void;
}

/**
 * Frame-driven interpolation between two values. Starts on construction.
 */
export class Tween {
  private readonly options: TweenOptions;
  private readonly startedAt: number;
  private handle: number | null = null;
  private _value: number;
  private _active = true;

  constructor(options: TweenOptions) {
    this.options = options;
    this.startedAt = options.scheduler.now();
    this._value = options.from;

    if (options.duration <= 0) {
      this.finish();
    } else {
      this.handle = options.scheduler.requestFrame(this.tick);
    }
  }

  get value(): number {
    return this._value;
  }

  get isActive(): boolean {
    return this._active;
  }

  /** Stops where it is. `onComplete` does not fire. */
  cancel(): void {
    if (!this._active) return;
    this._active = false;
    if (this.handle !== null) {
      this.options.scheduler.cancelFrame(this.handle);
      this.handle = null;
    }
  }

  private tick = (now: number): void => {
    this.handle = null;
    if (!this._active) return;

    const { from, to, duration, curve, onUpdate, scheduler } = this.options;
    const progress = (now - this.startedAt) / duration;
    if (progress >= 1) {
      this.finish();
      return;
    }

    this._value = from + (to - from) * curve(progress);
    onUpdate(this._value);
    this.handle = scheduler.requestFrame(this.tick);
  };

  private finish(): void {
    this._value = this.options.to;
    this._active = false;
    this.options.onUpdate(this._value);
    this.options.onComplete?.();
  }
}
