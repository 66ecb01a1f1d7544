import type { Curve } from '@/components/bottom-drawer/lib/curves';
import type { ScrollableCollaborator } from '@/components/bottom-drawer/lib/types';

export interface RecordedScrollAnimation {
  offset: number;
  duration: number;
  curve: Curve;
}

/** In-memory scrollable over [0, maxOffset] that records what it was asked to do. */
export class FakeScrollable implements ScrollableCollaborator {
  offset = 0;
  isOutOfRange = false;
  readonly jumps: number[] = [];
  readonly animations: RecordedScrollAnimation[] = [];

  constructor(readonly maxOffset = 1000) {}

  jumpTo(offset: number): void {
    this.jumps.push(offset);
    this.isOutOfRange = offset < 0 || offset > this.maxOffset;
    this.offset = Math.min(this.maxOffset, Math.max(0, offset));
  }

  animateTo(offset: number, duration: number, curve: Curve): void {
    this.animations.push({ offset, duration, curve });
  }
}
