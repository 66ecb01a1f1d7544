import { useState } from 'react';
import { BottomDrawerCommandChannel } from '../lib/drawer-command-channel';

/**
 * A command channel that lives as long as the calling component.
 *
 * @example
 * ```tsx
 * const drawer = useBottomDrawerController();
 * <button onClick={() => drawer.expand({ duration: 300, curve: 'easeOut' })}>Open</button>
 * <BottomDrawer controller={drawer}>{rows}</BottomDrawer>
 * ```
 */
export function useBottomDrawerController(): BottomDrawerCommandChannel {
  const [channel] = useState(() => new BottomDrawerCommandChannel());
  return channel;
}
