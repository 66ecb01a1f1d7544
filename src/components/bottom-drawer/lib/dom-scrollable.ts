import type { Curve } from './curves';
import type { FrameScheduler } from './frame-scheduler';
import { Tween } from './tween';
import type { ScrollableCollaborator } from './types';

/**
 * Scrollable collaborator over a DOM element's `scrollTop`. The element can be
 * attached after construction; until then every call is a no-op.
 */
export class DomScrollable implements ScrollableCollaborator {
  private element: HTMLElement | null = null;
  private tween: Tween | null = null;
  private outOfRange = false;

  constructor(private readonly scheduler: FrameScheduler) {}

  attach(element: HTMLElement | null): void {
    if (element !== this.element) {
      this.stop();
    }
    this.element = element;
  }

  get offset(): number {
    return this.element?.scrollTop ?? 0;
  }

  get maxOffset(): number {
    if (!this.element) return 0;
    return Math.max(0, this.element.scrollHeight - this.element.clientHeight);
  }

  get isOutOfRange(): boolean {
    return this.outOfRange;
  }

  jumpTo(offset: number): void {
    this.stop();
    this.setOffset(offset);
  }

  animateTo(offset: number, duration: number, curve: Curve): void {
    this.stop();
    const tween = new Tween({
      from: this.offset,
      to: offset,
      duration,
      curve,
      scheduler: this.scheduler,
      onUpdate: value => this.setOffset(value),
      onComplete: () => {
        this.tween = null;
      },
    });
    this.tween = tween.isActive ? tween : null;
  }

  stop(): void {
    this.tween?.cancel();
    this.tween = null;
  }

  private setOffset(offset: number): void {
    const element = this.element;
    if (!element) return;
    const max = this.maxOffset;
    this.outOfRange = offset < 0 || offset > max;
    element.scrollTop = Math.min(max, Math.max(0, offset));
  }
}
