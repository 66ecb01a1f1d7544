import { Curves, type Curve } from './curves';

export interface DrawerStopConfig {
  /** Ascending fractions of the available height, each within [0, 1]. At least two. */
  stops: readonly number[];
  /** Index into `stops` the drawer opens at. */
  initialStopIndex: number;
  /** Settle on the nearest stop when a drag ends. */
  snap: boolean;
  /** Milliseconds. */
  snapAnimationDuration: number;
  snapAnimationCurve: Curve;
  /**
   * Recompute min/max height on every layout pass instead of only the first.
   * Useful when the final container height is not known on first render.
   */
  rebuildConstraints: boolean;
  /** Drags starting within this many px of the drawer's top edge always resize. */
  forceResizeStartDistance: number | null;
}

export const DEFAULT_DRAWER_CONFIG: DrawerStopConfig = {
  stops: [0.2, 1.0],
  initialStopIndex: 0,
  snap: true,
  snapAnimationDuration: 256,
  snapAnimationCurve: Curves.linear,
  rebuildConstraints: false,
  forceResizeStartDistance: null,
};

export type DrawerConfigErrorCode =
  | 'TOO_FEW_STOPS'
  | 'STOP_OUT_OF_RANGE'
  | 'STOPS_NOT_ASCENDING'
  | 'INITIAL_STOP_OUT_OF_RANGE'
  | 'CONTENT_CONFLICT'
  | 'INCOMPLETE_GENERATOR'
  | 'NEGATIVE_ITEM_COUNT';

/**
 * Thrown for configuration the drawer cannot run with. Not recoverable.
 */
export class BottomDrawerConfigError extends Error {
  code: DrawerConfigErrorCode;

  constructor(code: DrawerConfigErrorCode, message: string) {
    super(message);
    this.name = 'BottomDrawerConfigError';
    this.code = code;
  }
}

export function resolveDrawerConfig(overrides: Partial<DrawerStopConfig> = {}): DrawerStopConfig {
  const defaults = DEFAULT_DRAWER_CONFIG;
  const config: DrawerStopConfig = {
    stops: overrides.stops ?? defaults.stops,
    initialStopIndex: overrides.initialStopIndex ?? defaults.initialStopIndex,
    snap: overrides.snap ?? defaults.snap,
    snapAnimationDuration: overrides.snapAnimationDuration ?? defaults.snapAnimationDuration,
    snapAnimationCurve: overrides.snapAnimationCurve ?? defaults.snapAnimationCurve,
    rebuildConstraints: overrides.rebuildConstraints ?? defaults.rebuildConstraints,
    forceResizeStartDistance: overrides.forceResizeStartDistance ?? defaults.forceResizeStartDistance,
  };
  validateDrawerConfig(config);
  return config;
}

export function validateDrawerConfig(config: DrawerStopConfig): void {
  const { stops, initialStopIndex } = config;

  if (stops.length < 2) {
    throw new BottomDrawerConfigError('TOO_FEW_STOPS', 'minimum number of stops is 2');
  }
  stops.forEach((stop, i) => {
    if (!Number.isFinite(stop) || stop < 0 || stop > 1) {
      throw new BottomDrawerConfigError('STOP_OUT_OF_RANGE', `stop ${i} (${stop}) must be between 0.0 and 1.0`);
    }
    if (i > 0 && stop <= stops[i - 1]) {
      throw new BottomDrawerConfigError('STOPS_NOT_ASCENDING', 'stops must be in ascending order');
    }
  });
  if (!Number.isInteger(initialStopIndex) || initialStopIndex < 0 || initialStopIndex >= stops.length) {
    throw new BottomDrawerConfigError(
      'INITIAL_STOP_OUT_OF_RANGE',
      'initialStopIndex cannot be greater than stops.length',
    );
  }
}

export interface DrawerContentConfig {
  hasChildren: boolean;
  itemCount?: number;
  hasItemBuilder: boolean;
}

/** List content comes either from children or from itemBuilder + itemCount, never both. */
export function validateDrawerContent({ hasChildren, itemCount, hasItemBuilder }: DrawerContentConfig): void {
  const hasGenerator = hasItemBuilder || itemCount !== undefined;
  if (hasChildren === hasGenerator) {
    throw new BottomDrawerConfigError(
      'CONTENT_CONFLICT',
      'provide either children or itemBuilder with itemCount, not both',
    );
  }
  if (hasGenerator && (!hasItemBuilder || itemCount === undefined)) {
    throw new BottomDrawerConfigError('INCOMPLETE_GENERATOR', 'itemBuilder and itemCount must be used together');
  }
  if (itemCount !== undefined && (!Number.isInteger(itemCount) || itemCount < 0)) {
    throw new BottomDrawerConfigError('NEGATIVE_ITEM_COUNT', 'itemCount must be a non-negative integer');
  }
}
