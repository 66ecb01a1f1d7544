'use client';

import React, { useEffect, useReducer, useRef } from 'react';
import { validateDrawerContent } from './lib/config';
import { resolveCurve, type Curve, type CurveName } from './lib/curves';
import type { BottomDrawerCommandChannel } from './lib/drawer-command-channel';
import type { FrameScheduler } from './lib/frame-scheduler';
import type { DrawerCallbacks } from './lib/types';
import { useDrawerInteraction } from './hooks/use-drawer-interaction';
import { useIsomorphicLayoutEffect } from './hooks/use-isomorphic-layout-effect';

export interface BottomDrawerProps extends DrawerCallbacks {
  /** Stays put above the list while it scrolls. */
  header?: React.ReactNode;
  /** Fixed list content. Mutually exclusive with `itemBuilder` + `itemCount`. */
  children?: React.ReactNode;
  itemBuilder?: (index: number) => React.ReactNode;
  itemCount?: number;

  /** Fractions of the available height, ascending, within [0, 1]. At least two. */
  stops?: readonly number[];
  /** Index into `stops` the drawer opens at. */
  initialStopIndex?: number;
  /** Settle on the nearest stop when a drag ends. */
  snap?: boolean;
  /** Milliseconds. */
  snapAnimationDuration?: number;
  snapAnimationCurve?: Curve | CurveName;
  /** Recompute height bounds on every layout pass instead of only the first. */
  rebuildConstraints?: boolean;
  /** Drags starting this close (px) to the drawer's top edge always resize it. */
  forceResizeStartDistance?: number | null;

  listPadding?: React.CSSProperties['padding'];
  borderRadius?: React.CSSProperties['borderRadius'];
  shadow?: React.CSSProperties['boxShadow'];

  controller?: BottomDrawerCommandChannel;
  /** Frame source for transitions. Read once, on mount. */
  scheduler?: FrameScheduler;

  className?: string;
  panelClassName?: string;
  'aria-label'?: string;
}

const bem = (block: string, modifiers: Array<string | false | undefined>) => {
  const mods = modifiers.filter(Boolean).map(m => `${block}--${m}`);
  return [block, ...mods].join(' ');
};

const MOVEMENT_DEADZONE = 8; // px before a press becomes a drag
const INTERACTIVE_DEADZONE = 16; // px - require more intent on controls
const VELOCITY_SAMPLES = 6;
const INTERACTIVE_SELECTOR = 'button, a, [role="button"], input, select, textarea, [contenteditable="true"]';

function isInteractiveTarget(target: EventTarget | null): boolean {
  if (!(target instanceof Element)) return false;
  return !!target.closest(`${INTERACTIVE_SELECTOR}, [data-drawer-no-drag]`);
}

export const BottomDrawer: React.FC<BottomDrawerProps> = ({
  header,
  children,
  itemBuilder,
  itemCount,
  stops,
  initialStopIndex,
  snap,
  snapAnimationDuration,
  snapAnimationCurve,
  rebuildConstraints,
  forceResizeStartDistance,
  listPadding = 0,
  borderRadius,
  shadow,
  controller,
  scheduler,
  onDragStart,
  onDragEnd,
  onHeightChanged,
  onSnapEnd,
  className,
  panelClassName,
  'aria-label': ariaLabel,
}) => {
  validateDrawerContent({
    hasChildren: children !== undefined && children !== null,
    hasItemBuilder: itemBuilder !== undefined,
    itemCount,
  });

  const rootRef = useRef<HTMLDivElement>(null);
  const panelRef = useRef<HTMLDivElement>(null);
  const listRef = useRef<HTMLDivElement>(null);

  const { interaction, scrollable, snapshot } = useDrawerInteraction({
    config: {
      stops,
      initialStopIndex,
      snap,
      snapAnimationDuration,
      snapAnimationCurve: snapAnimationCurve === undefined ? undefined : resolveCurve(snapAnimationCurve),
      rebuildConstraints,
      forceResizeStartDistance,
    },
    channel: controller,
    scheduler,
    onDragStart,
    onDragEnd,
    onHeightChanged,
    onSnapEnd,
  });

  useIsomorphicLayoutEffect(() => {
    scrollable.attach(listRef.current);
    return () => scrollable.attach(null);
  }, [scrollable]);

  // One layout pass per render
  useIsomorphicLayoutEffect(() => {
    const root = rootRef.current;
    if (root) interaction.layout(root.clientHeight);
  });

  // Re-render on container resize so the layout pass sees the new height
  const [, forceLayout] = useReducer((n: number) => n + 1, 0);
  useEffect(() => {
    const root = rootRef.current;
    if (!root || typeof ResizeObserver === 'undefined') return;
    const observer = new ResizeObserver(() => forceLayout());
    observer.observe(root);
    return () => observer.disconnect();
  }, []);

  // Pointer/touch tracking
  useEffect(() => {
    const panel = panelRef.current;
    if (!panel) return;

    const ref = {
      tracking: false,
      committed: false,
      pointerId: null as number | null,
      startY: 0,
      lastY: 0,
      lastTime: 0,
      localY: 0,
      isInteractiveTarget: false,
      velocities: [] as number[],
    };

    function reset() {
      ref.tracking = false;
      ref.committed = false;
      ref.pointerId = null;
      ref.velocities = [];
    }

    function begin(clientY: number, target: EventTarget | null, pointerId: number) {
      if (!panel) return;
      const panelRect = panel.getBoundingClientRect();
      ref.tracking = true;
      ref.committed = false;
      ref.pointerId = pointerId;
      ref.startY = clientY;
      ref.lastY = clientY;
      ref.lastTime = performance.now();
      ref.localY = clientY - panelRect.top;
      ref.isInteractiveTarget = isInteractiveTarget(target);
      ref.velocities = [];
    }

    function move(clientY: number): boolean {
      if (!ref.tracking) return false;

      if (!ref.committed) {
        const moved = Math.abs(clientY - ref.startY);
        const deadzone = ref.isInteractiveTarget ? INTERACTIVE_DEADZONE : MOVEMENT_DEADZONE;
        if (moved < deadzone) return false;
        ref.committed = true;
        ref.lastY = ref.startY;
        interaction.dragStart({ localY: ref.localY });
      }

      const now = performance.now();
      const delta = clientY - ref.lastY;
      const elapsed = Math.max(1, now - ref.lastTime);
      ref.velocities.push(delta / elapsed);
      if (ref.velocities.length > VELOCITY_SAMPLES) ref.velocities.shift();
      ref.lastY = clientY;
      ref.lastTime = now;

      if (delta !== 0) interaction.dragUpdate(delta);
      return true;
    }

    function end() {
      if (!ref.tracking) return;
      const wasCommitted = ref.committed;
      const avgVelocity = ref.velocities.length > 0
        ? ref.velocities.reduce((sum, v) => sum + v, 0) / ref.velocities.length
        : 0;
      reset();
      // px/ms -> px/s
      if (wasCommitted) interaction.dragEnd({ velocity: avgVelocity * 1000 });
    }

    function onPointerDown(e: PointerEvent) {
      if (e.pointerType === 'touch') return; // touch events handle these
      if (e.button !== 0) return;
      begin(e.clientY, e.target, e.pointerId);
    }

    function onPointerMove(e: PointerEvent) {
      if (ref.pointerId !== e.pointerId) return;
      if (move(e.clientY)) e.preventDefault();
    }

    function onPointerUp(e: PointerEvent) {
      if (ref.pointerId !== e.pointerId) return;
      end();
    }

    function onTouchStart(e: TouchEvent) {
      if (e.touches.length !== 1) return;
      begin(e.touches[0].clientY, e.target, -1);
    }

    function onTouchMove(e: TouchEvent) {
      if (e.touches.length !== 1 || ref.pointerId !== -1) return;
      if (move(e.touches[0].clientY)) e.preventDefault();
    }

    function onTouchEnd() {
      if (ref.pointerId !== -1) return;
      end();
    }

    panel.addEventListener('pointerdown', onPointerDown);
    panel.addEventListener('touchstart', onTouchStart, { passive: true });
    document.addEventListener('pointermove', onPointerMove);
    document.addEventListener('touchmove', onTouchMove, { passive: false });
    document.addEventListener('pointerup', onPointerUp);
    document.addEventListener('pointercancel', onPointerUp);
    document.addEventListener('touchend', onTouchEnd);
    document.addEventListener('touchcancel', onTouchEnd);

    return () => {
      panel.removeEventListener('pointerdown', onPointerDown);
      panel.removeEventListener('touchstart', onTouchStart);
      document.removeEventListener('pointermove', onPointerMove);
      document.removeEventListener('touchmove', onTouchMove);
      document.removeEventListener('pointerup', onPointerUp);
      document.removeEventListener('pointercancel', onPointerUp);
      document.removeEventListener('touchend', onTouchEnd);
      document.removeEventListener('touchcancel', onTouchEnd);
    };
  }, [interaction]);

  const items = itemBuilder && itemCount !== undefined
    ? Array.from({ length: itemCount }, (_, index) => (
      <React.Fragment key={index}>{itemBuilder(index)}</React.Fragment>
    ))
    : children;

  const panelStyle: React.CSSProperties = {
    height: `${snapshot.displayHeight}px`,
    borderRadius,
    boxShadow: shadow,
    willChange: snapshot.dragging ? 'height' : 'auto',
  };

  return (
    <div
      ref={rootRef}
      className={[
        bem('bottom-drawer', [
          snapshot.dragging && 'dragging',
          snapshot.externalActionInProgress && 'commanded',
        ]),
        className,
      ].filter(Boolean).join(' ')}
    >
      <div
        ref={panelRef}
        className={['bottom-drawer__panel', panelClassName].filter(Boolean).join(' ')}
        role="region"
        aria-label={ariaLabel}
        style={panelStyle}
        data-dragging={snapshot.dragging}
      >
        {header !== undefined && header !== null && <div className="bottom-drawer__header">{header}</div>}
        <div ref={listRef} className="bottom-drawer__list" style={{ padding: listPadding }}>
          {items}
        </div>
      </div>
    </div>
  );
};

export default BottomDrawer;
