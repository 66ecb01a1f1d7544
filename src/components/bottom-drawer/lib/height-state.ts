import type { DrawerStopConfig } from './config';

export interface HeightChange {
  height: number;
  /** height / containerHeight */
  fraction: number;
}

type HeightConfig = Pick<DrawerStopConfig, 'stops' | 'initialStopIndex' | 'rebuildConstraints'>;

/**
 * Drawer height and its bounds, in px.
 *
 * Bounds come from the first layout pass. Later passes only refresh them when
 * `rebuildConstraints` is set, so a container resize otherwise leaves the old
 * bounds in place.
 */
export class HeightState {
  currentHeight = 0;
  minHeight = 0;
  maxHeight = 0;
  containerHeight = 0;
  dragging = false;

  private readonly config: HeightConfig;
  private laidOut = false;
  private lastObservedHeight: number | null = null;

  constructor(config: HeightConfig) {
    this.config = config;
  }

  get hasLayout(): boolean {
    return this.laidOut;
  }

  /** Returns true when the bounds were (re)computed. */
  layout(containerHeight: number): boolean {
    const { stops, initialStopIndex, rebuildConstraints } = this.config;

    if (!this.laidOut) {
      this.applyBounds(containerHeight);
      this.currentHeight = containerHeight * stops[initialStopIndex];
      this.laidOut = true;
      return true;
    }
    if (rebuildConstraints) {
      this.applyBounds(containerHeight);
      return true;
    }
    return false;
  }

  /** Height in px of the stop at `index`. */
  heightOfStop(index: number): number {
    return this.config.stops[index] * this.containerHeight;
  }

  isAtMax(): boolean {
    return this.currentHeight >= this.maxHeight;
  }

  isAtMin(): boolean {
    return this.currentHeight <= this.minHeight;
  }

  clamp(value: number): number {
    if (value < this.minHeight) return this.minHeight;
    if (value > this.maxHeight) return this.maxHeight;
    return value;
  }

  /**
   * The change since the last call, if any. Meant to run once per render pass.
   */
  takeChange(): HeightChange | null {
    if (!this.laidOut || this.currentHeight === this.lastObservedHeight) return null;
    this.lastObservedHeight = this.currentHeight;
    const fraction = this.containerHeight > 0 ? this.currentHeight / this.containerHeight : 0;
    return { height: this.currentHeight, fraction };
  }

  private applyBounds(containerHeight: number): void {
    const { stops } = this.config;
    this.containerHeight = containerHeight;
    this.minHeight = stops[0] * containerHeight;
    this.maxHeight = stops[stops.length - 1] * containerHeight;
  }
}
