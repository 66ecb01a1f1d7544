import { describe, it, expect } from 'vitest';
import { HeightState } from './height-state';

describe('HeightState', () => {
  const config = { stops: [0.2, 0.5, 1.0], initialStopIndex: 1, rebuildConstraints: false };

  it('derives bounds and the initial height on first layout', () => {
    const state = new HeightState(config);
    expect(state.hasLayout).toBe(false);
    expect(state.layout(1000)).toBe(true);

    expect(state.minHeight).toBe(200);
    expect(state.maxHeight).toBe(1000);
    expect(state.currentHeight).toBe(500);
    expect(state.containerHeight).toBe(1000);
    expect(state.hasLayout).toBe(true);
  });

  it('keeps stale bounds after a resize unless rebuilding', () => {
    const state = new HeightState(config);
    state.layout(1000);
    expect(state.layout(500)).toBe(false);

    expect(state.minHeight).toBe(200);
    expect(state.maxHeight).toBe(1000);
    expect(state.containerHeight).toBe(1000);
  });

  it('rebuilds bounds but not the current height when configured', () => {
    const state = new HeightState({ ...config, rebuildConstraints: true });
    state.layout(1000);
    expect(state.layout(500)).toBe(true);

    expect(state.minHeight).toBe(100);
    expect(state.maxHeight).toBe(500);
    expect(state.containerHeight).toBe(500);
    expect(state.currentHeight).toBe(500);
  });

  it('clamps into [min, max]', () => {
    const state = new HeightState(config);
    state.layout(1000);

    expect(state.clamp(50)).toBe(200);
    expect(state.clamp(1500)).toBe(1000);
    expect(state.clamp(640)).toBe(640);
  });

  it('reports max and min inclusively', () => {
    const state = new HeightState(config);
    state.layout(1000);
    expect(state.isAtMax()).toBe(false);
    expect(state.isAtMin()).toBe(false);

    state.currentHeight = 1000;
    expect(state.isAtMax()).toBe(true);

    state.currentHeight = 200;
    expect(state.isAtMin()).toBe(true);
  });

  it('reports each height change once', () => {
    const state = new HeightState(config);
    expect(state.takeChange()).toBeNull();

    state.layout(1000);
    expect(state.takeChange()).toEqual({ height: 500, fraction: 0.5 });
    expect(state.takeChange()).toBeNull();

    state.currentHeight = 300;
    expect(state.takeChange()).toEqual({ height: 300, fraction: 0.3 });
    expect(state.takeChange()).toBeNull();
  });

  it('gives stop heights in px', () => {
    const state = new HeightState(config);
    state.layout(800);
    expect(state.heightOfStop(0)).toBe(160);
    expect(state.heightOfStop(2)).toBe(800);
  });
});
