import { useEffect, useRef, useState, useSyncExternalStore } from 'react';
import type { DrawerStopConfig } from '../lib/config';
import { DomScrollable } from '../lib/dom-scrollable';
import type { BottomDrawerCommandChannel } from '../lib/drawer-command-channel';
import { DrawerInteractionController, type DrawerSnapshot } from '../lib/drawer-interaction-controller';
import { createBrowserScheduler, type FrameScheduler } from '../lib/frame-scheduler';
import type { DrawerCallbacks } from '../lib/types';
import { useIsomorphicLayoutEffect } from './use-isomorphic-layout-effect';

export interface UseDrawerInteractionOptions extends DrawerCallbacks {
  /** Read once, on mount. */
  config: Partial<DrawerStopConfig>;
  channel?: BottomDrawerCommandChannel;
  /** Read once, on mount. */
  scheduler?: FrameScheduler;
}

export interface DrawerInteraction {
  interaction: DrawerInteractionController;
  scrollable: DomScrollable;
  snapshot: DrawerSnapshot;
}

/**
 * Owns a {@link DrawerInteractionController} for the component's lifetime and
 * re-renders on every displayed height change.
 */
export function useDrawerInteraction({
  config,
  channel,
  scheduler,
  onDragStart,
  onDragEnd,
  onHeightChanged,
  onSnapEnd,
}: UseDrawerInteractionOptions): DrawerInteraction {
  const [instance] = useState(() => {
    const frames = scheduler ?? createBrowserScheduler();
    const scrollable = new DomScrollable(frames);
    const interaction = new DrawerInteractionController({ config, scrollable, scheduler: frames });
    return { interaction, scrollable };
  });
  const { interaction, scrollable } = instance;

  const callbacksRef = useRef<DrawerCallbacks>({});
  callbacksRef.current = { onDragStart, onDragEnd, onHeightChanged, onSnapEnd };

  // Route through the ref so the controller always sees the latest props
  useIsomorphicLayoutEffect(() => {
    interaction.setCallbacks({
      onDragStart: () => callbacksRef.current.onDragStart?.(),
      onDragEnd: () => callbacksRef.current.onDragEnd?.(),
      onHeightChanged: (height, fraction) => callbacksRef.current.onHeightChanged?.(height, fraction),
      onSnapEnd: stopIndex => callbacksRef.current.onSnapEnd?.(stopIndex),
    });
  }, [interaction]);

  useEffect(() => {
    interaction.attachChannel(channel ?? null);
    return () => interaction.attachChannel(null);
  }, [interaction, channel]);

  useEffect(() => () => interaction.dispose(), [interaction]);

  const snapshot = useSyncExternalStore(interaction.subscribe, interaction.getSnapshot, interaction.getSnapshot);

  return { interaction, scrollable, snapshot };
}
