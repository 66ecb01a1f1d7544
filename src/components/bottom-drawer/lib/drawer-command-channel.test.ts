import { describe, it, expect, vi } from 'vitest';
import { Curves } from './curves';
import { BottomDrawerCommandChannel, DEFAULT_COMMAND_DURATION } from './drawer-command-channel';

describe('BottomDrawerCommandChannel', () => {
  it('fills in defaults', () => {
    const channel = new BottomDrawerCommandChannel();
    channel.collapse();

    expect(channel.take()).toEqual({
      kind: 'collapse',
      updateScroll: true,
      duration: DEFAULT_COMMAND_DURATION,
      curve: Curves.linear,
    });
  });

  it('resolves curve names', () => {
    const channel = new BottomDrawerCommandChannel();
    channel.scrollTo(120, { duration: 300, curve: 'easeOut' });

    expect(channel.take()).toEqual({ kind: 'scrollTo', position: 120, duration: 300, curve: Curves.easeOut });
  });

  it('keeps only the latest command', () => {
    const channel = new BottomDrawerCommandChannel();
    channel.collapse({ updateScroll: false });
    channel.expand({ duration: 100 });

    expect(channel.take()).toEqual({ kind: 'expand', duration: 100, curve: Curves.linear });
    expect(channel.take()).toBeNull();
    expect(channel.hasPending).toBe(false);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const channel = new BottomDrawerCommandChannel();
    const listener = vi.fn();
    const unsubscribe = channel.subscribe(listener);

    channel.expand();
    expect(listener).toHaveBeenCalledTimes(1);

    unsubscribe();
    channel.collapse();
    expect(listener).toHaveBeenCalledTimes(1);
    expect(channel.hasPending).toBe(true);
  });
});
