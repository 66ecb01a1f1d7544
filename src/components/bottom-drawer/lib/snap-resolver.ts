/**
 * Index of the stop a drawer at `currentHeight` should settle on.
 *
 * Between two neighbouring stops the upper half, midpoint included, belongs to
 * the higher stop. A height above every stop falls back to the last one.
 */
export function resolveSnapStop(stops: readonly number[], currentHeight: number, containerHeight: number): number {
  let lastIndex = 0;

  for (let i = 1; i < stops.length; i++) {
    const stop = stops[i];
    if (currentHeight <= stop * containerHeight) {
      const lastStop = stops[lastIndex];
      const midpoint = lastStop * containerHeight + ((stop - lastStop) / 2) * containerHeight;
      return currentHeight >= midpoint ? i : lastIndex;
    }
    lastIndex = i;
  }

  return stops.length - 1;
}
