/** Maps linear progress in [0, 1] to eased progress. */
export type Curve = (t: number) => number;

const SAMPLE_EPSILON = 1e-6;

/**
 * CSS-style cubic-bezier easing. Solves x(s) = t for the curve parameter with
 * Newton iterations, then bisection when the slope is too flat.
 */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): Curve {
  const cx = 3 * x1;
  const bx = 3 * (x2 - x1) - cx;
  const ax = 1 - cx - bx;
  const cy = 3 * y1;
  const by = 3 * (y2 - y1) - cy;
  const ay = 1 - cy - by;

  const sampleX = (s: number) => ((ax * s + bx) * s + cx) * s;
  const sampleY = (s: number) => ((ay * s + by) * s + cy) * s;
  const slopeX = (s: number) => (3 * ax * s + 2 * bx) * s + cx;

  function solveX(x: number): number {
    let s = x;
    for (let i = 0; i < 8; i++) {
      const error = sampleX(s) - x;
      if (Math.abs(error) < SAMPLE_EPSILON) return s;
      const slope = slopeX(s);
      if (Math.abs(slope) < SAMPLE_EPSILON) break;
      s -= error / slope;
    }

    let lo = 0;
    let hi = 1;
    s = x;
    while (lo < hi) {
      const value = sampleX(s);
      if (Math.abs(value - x) < SAMPLE_EPSILON) return s;
      if (x > value) lo = s;
      else hi = s;
      const next = (lo + hi) / 2;
      if (next === s) break;
      s = next;
    }
    return s;
  }

  return (t: number) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return sampleY(solveX(t));
  };
}

export const Curves = {
  linear: (t: number): number => Math.min(1, Math.max(0, t)),
  ease: cubicBezier(0.25, 0.1, 0.25, 1),
  easeIn: cubicBezier(0.42, 0, 1, 1),
  easeOut: cubicBezier(0, 0, 0.58, 1),
  easeInOut: cubicBezier(0.42, 0, 0.58, 1),
  decelerate: cubicBezier(0, 0, 0.2, 1),
  fastOutSlowIn: cubicBezier(0.4, 0, 0.2, 1),
} as const;

export type CurveName = keyof typeof Curves;

export function resolveCurve(curve: Curve | CurveName | undefined, fallback: Curve = Curves.linear): Curve {
  if (curve === undefined) return fallback;
  return typeof curve === 'string' ? Curves[curve] : curve;
}
