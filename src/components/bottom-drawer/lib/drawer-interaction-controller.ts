import { resolveDrawerConfig, type DrawerStopConfig } from './config';
import { Curves } from './curves';
import { debugLog } from './debug';
import type { BottomDrawerCommandChannel, CommandAnimation, DrawerCommand } from './drawer-command-channel';
import { ScrollFling } from './fling-simulation';
import { createBrowserScheduler, type FrameScheduler } from './frame-scheduler';
import { HeightState } from './height-state';
import { resolveSnapStop } from './snap-resolver';
import { Tween } from './tween';
import type { DragEndDetails, DragStartDetails, DrawerCallbacks, ScrollableCollaborator } from './types';

export interface DrawerInteractionOptions extends DrawerCallbacks {
  config?: Partial<DrawerStopConfig>;
  scrollable: ScrollableCollaborator;
  scheduler?: FrameScheduler;
  /** Height the drawer is actually rendered at. Defaults to {@link DrawerInteractionController.displayHeight}. */
  getRenderedHeight?: () => number;
}

export interface DrawerSnapshot {
  displayHeight: number;
  dragging: boolean;
  externalActionInProgress: boolean;
}

const IMMEDIATE: CommandAnimation = { duration: 0, curve: Curves.linear };

/**
 * Everything the drawer does that is not rendering: height bounds, deciding
 * whether a drag resizes the drawer or scrolls its list, snapping on release,
 * flinging the list, and commands from a {@link BottomDrawerCommandChannel}.
 *
 * Feed it `layout()` once per render pass and the three drag events; render
 * `displayHeight`.
 */
export class DrawerInteractionController {
  readonly config: DrawerStopConfig;

  private readonly heightState: HeightState;
  private readonly scrollable: ScrollableCollaborator;
  private readonly scheduler: FrameScheduler;
  private readonly fling: ScrollFling;
  private readonly renderedHeight: () => number;
  private callbacks: DrawerCallbacks;

  private displayed = 0;
  private heightTween: Tween | null = null;
  private transitionSeq = 0;
  private forceResize = false;
  private externalAction: CommandAnimation | null = null;

  private channel: BottomDrawerCommandChannel | null = null;
  private unsubscribeChannel: (() => void) | null = null;
  private listeners = new Set<() => void>();
  private snapshot: DrawerSnapshot = { displayHeight: 0, dragging: false, externalActionInProgress: false };

  constructor({ config, scrollable, scheduler, getRenderedHeight, ...callbacks }: DrawerInteractionOptions) {
    this.config = resolveDrawerConfig(config);
    this.heightState = new HeightState(this.config);
    this.scrollable = scrollable;
    this.scheduler = scheduler ?? createBrowserScheduler();
    this.fling = new ScrollFling(this.scheduler, scrollable);
    this.renderedHeight = getRenderedHeight ?? (() => this.displayed);
    this.callbacks = callbacks;
  }

  // ----- reads -----

  get displayHeight(): number {
    return this.displayed;
  }

  get currentHeight(): number {
    return this.heightState.currentHeight;
  }

  get minHeight(): number {
    return this.heightState.minHeight;
  }

  get maxHeight(): number {
    return this.heightState.maxHeight;
  }

  get containerHeight(): number {
    return this.heightState.containerHeight;
  }

  get isDragging(): boolean {
    return this.heightState.dragging;
  }

  get isExternalActionInProgress(): boolean {
    return this.externalAction !== null;
  }

  get isFlinging(): boolean {
    return this.fling.isRunning;
  }

  get isAnimating(): boolean {
    return this.heightTween !== null;
  }

  isAtMax(): boolean {
    return this.heightState.isAtMax();
  }

  isAtMin(): boolean {
    return this.heightState.isAtMin();
  }

  getSnapshot = (): DrawerSnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  setCallbacks(callbacks: DrawerCallbacks): void {
    this.callbacks = callbacks;
  }

  // ----- layout -----

  /** One layout pass with the container's available height. */
  layout(containerHeight: number): void {
    const firstPass = !this.heightState.hasLayout;
    this.heightState.layout(containerHeight);

    if (firstPass) {
      this.displayed = this.heightState.currentHeight;
      debugLog('layout', { containerHeight, height: this.displayed });
      if (this.channel?.hasPending) {
        this.handleCommand();
        return;
      }
    }
    this.publish();
  }

  // ----- drag -----

  dragStart({ localY }: DragStartDetails): void {
    if (!this.heightState.hasLayout) return;

    this.cancelMotion();
    const rendered = this.renderedHeight();
    this.heightState.currentHeight = rendered;
    this.displayed = rendered;
    this.heightState.dragging = true;

    const { forceResizeStartDistance } = this.config;
    this.forceResize = forceResizeStartDistance !== null && localY <= forceResizeStartDistance;
    debugLog('drag start', { height: rendered, forceResize: this.forceResize });

    this.callbacks.onDragStart?.();
    this.publish();
  }

  /** `delta` is px along the vertical axis, positive when the pointer moves down. */
  dragUpdate(delta: number): void {
    if (!this.heightState.dragging) return;

    if (this.forceResize) {
      this.resizeBy(delta);
    } else if (delta < 0 && this.heightState.isAtMax()) {
      this.scrollable.jumpTo(this.scrollable.offset - delta);
    } else if (delta > 0 && this.heightState.isAtMax() && this.scrollable.offset > 0) {
      this.scrollable.jumpTo(this.scrollable.offset - delta);
    } else {
      this.resizeBy(delta);
    }
  }

  dragEnd({ velocity }: DragEndDetails): void {
    if (!this.heightState.dragging) return;

    this.heightState.dragging = false;
    this.callbacks.onDragEnd?.();

    if (!this.config.snap) {
      this.publish();
      return;
    }

    const { stops } = this.config;
    const { currentHeight, containerHeight } = this.heightState;
    const stopIndex = resolveSnapStop(stops, currentHeight, containerHeight);
    debugLog('drag end', { velocity, currentHeight, stopIndex });

    if (!this.forceResize && this.heightState.isAtMax()) {
      if (velocity !== 0) {
        this.fling.start(velocity);
      }
      this.reportSnapEnd(stopIndex);
      this.publish();
      return;
    }
    if (this.heightState.isAtMin()) {
      this.reportSnapEnd(stopIndex);
      this.publish();
      return;
    }

    this.heightState.currentHeight = this.heightState.heightOfStop(stopIndex);
    this.animateHeight(() => this.reportSnapEnd(stopIndex));
    this.publish();
  }

  // ----- external commands -----

  attachChannel(channel: BottomDrawerCommandChannel | null): void {
    if (channel === this.channel) return;
    this.unsubscribeChannel?.();
    this.unsubscribeChannel = null;
    this.channel = channel;
    if (!channel) return;

    this.unsubscribeChannel = channel.subscribe(this.handleCommand);
    if (channel.hasPending) {
      this.handleCommand();
    }
  }

  dispose(): void {
    this.cancelMotion();
    this.attachChannel(null);
    this.listeners.clear();
  }

  private handleCommand = (): void => {
    if (!this.channel || !this.heightState.hasLayout) return;
    const command = this.channel.take();
    if (command) {
      this.runCommand(command);
    }
  };

  private runCommand(command: DrawerCommand): void {
    const animation: CommandAnimation = { duration: command.duration, curve: command.curve };
    const lastIndex = this.config.stops.length - 1;

    switch (command.kind) {
      case 'collapse':
        this.fling.cancel();
        this.externalAction = animation;
        this.heightState.currentHeight = this.heightState.minHeight;
        if (command.updateScroll) {
          this.scrollable.animateTo(0, command.duration / 2, command.curve);
        }
        this.animateHeight(() => this.reportSnapEnd(0));
        break;
      case 'expand':
        this.fling.cancel();
        this.externalAction = animation;
        this.heightState.currentHeight = this.heightState.maxHeight;
        this.animateHeight(() => this.reportSnapEnd(lastIndex));
        break;
      case 'scrollTo':
        this.fling.cancel();
        this.scrollable.animateTo(command.position, command.duration / 2, command.curve);
        break;
    }
    this.publish();
  }

  // ----- internals -----

  private resizeBy(delta: number): void {
    this.heightState.currentHeight = this.heightState.clamp(this.heightState.currentHeight - delta);
    this.animateHeight();
    this.publish();
  }

  /**
   * Moves the displayed height to `currentHeight`. An external action's
   * animation wins over the snap animation; drags and disabled snapping jump.
   */
  private animateHeight(onDone?: () => void): void {
    this.heightTween?.cancel();

    const animation = this.externalAction ?? this.snapAnimation();
    const seq = ++this.transitionSeq;
    const tween = new Tween({
      from: this.displayed,
      to: this.heightState.currentHeight,
      duration: animation.duration,
      curve: animation.curve,
      scheduler: this.scheduler,
      onUpdate: value => {
        this.displayed = value;
        if (seq === this.transitionSeq) {
          this.notify();
        }
      },
      onComplete: () => {
        if (seq !== this.transitionSeq) return;
        this.heightTween = null;
        this.externalAction = null;
        onDone?.();
        this.notify();
      },
    });
    this.heightTween = tween.isActive ? tween : null;
  }

  private snapAnimation(): CommandAnimation {
    if (this.heightState.dragging || !this.config.snap) return IMMEDIATE;
    return { duration: this.config.snapAnimationDuration, curve: this.config.snapAnimationCurve };
  }

  private reportSnapEnd(stopIndex: number): void {
    if (this.heightState.dragging || !this.config.snap) return;
    debugLog('snap end', stopIndex);
    this.callbacks.onSnapEnd?.(stopIndex);
  }

  private cancelMotion(): void {
    this.transitionSeq++;
    this.heightTween?.cancel();
    this.heightTween = null;
    this.fling.cancel();
    this.externalAction = null;
  }

  /** Change detection for `onHeightChanged`, then a render notification. */
  private publish(): void {
    const change = this.heightState.takeChange();
    if (change) {
      this.callbacks.onHeightChanged?.(change.height, change.fraction);
    }
    this.notify();
  }

  private notify(): void {
    const next: DrawerSnapshot = {
      displayHeight: this.displayed,
      dragging: this.heightState.dragging,
      externalActionInProgress: this.externalAction !== null,
    };
    const prev = this.snapshot;
    if (
      prev.displayHeight === next.displayHeight &&
      prev.dragging === next.dragging &&
      prev.externalActionInProgress === next.externalActionInProgress
    ) {
      return;
    }
    this.snapshot = next;
    this.listeners.forEach(listener => listener());
  }
}
