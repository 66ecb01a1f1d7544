import { describe, it, expect } from 'vitest';
import { resolveSnapStop } from './snap-resolver';

describe('resolveSnapStop', () => {
  const stops = [0.25, 0.5, 1.0];
  const H = 1000;

  it('picks the nearer stop within a segment', () => {
    expect(resolveSnapStop(stops, 300, H)).toBe(0);
    expect(resolveSnapStop(stops, 450, H)).toBe(1);
    expect(resolveSnapStop(stops, 600, H)).toBe(1);
    expect(resolveSnapStop(stops, 900, H)).toBe(2);
  });

  it('gives the midpoint to the higher stop', () => {
    // 250 + (500 - 250) / 2
    expect(resolveSnapStop(stops, 375, H)).toBe(1);
    expect(resolveSnapStop(stops, 374.9, H)).toBe(0);
    // 500 + (1000 - 500) / 2
    expect(resolveSnapStop(stops, 750, H)).toBe(2);
    expect(resolveSnapStop(stops, 749.9, H)).toBe(1);
  });

  it('settles exactly on a stop', () => {
    expect(resolveSnapStop(stops, 250, H)).toBe(0);
    expect(resolveSnapStop(stops, 500, H)).toBe(1);
    expect(resolveSnapStop(stops, 1000, H)).toBe(2);
  });

  it('snaps a release at 500 between 200 and 600 up to 600', () => {
    expect(resolveSnapStop([0.2, 0.6, 1.0], 500, 1000)).toBe(1);
  });

  it('falls back to the last stop above every stop', () => {
    expect(resolveSnapStop(stops, 1200, H)).toBe(2);
  });

  it('falls back to the first stop below every stop', () => {
    expect(resolveSnapStop(stops, 100, H)).toBe(0);
  });

  it('works with two stops', () => {
    expect(resolveSnapStop([0, 1], 499, 1000)).toBe(0);
    expect(resolveSnapStop([0, 1], 500, 1000)).toBe(1);
  });
});
