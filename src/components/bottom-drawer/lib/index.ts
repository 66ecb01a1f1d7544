export { BottomDrawerCommandChannel, DEFAULT_COMMAND_DURATION } from './drawer-command-channel';
export type {
  CollapseOptions,
  CommandAnimation,
  CommandAnimationOptions,
  DrawerCommand,
} from './drawer-command-channel';
export { DrawerInteractionController } from './drawer-interaction-controller';
export type { DrawerInteractionOptions, DrawerSnapshot } from './drawer-interaction-controller';
export {
  BottomDrawerConfigError,
  DEFAULT_DRAWER_CONFIG,
  resolveDrawerConfig,
  validateDrawerConfig,
  validateDrawerContent,
} from './config';
export type { DrawerConfigErrorCode, DrawerStopConfig } from './config';
export { Curves, cubicBezier, resolveCurve } from './curves';
export type { Curve, CurveName } from './curves';
export { DomScrollable } from './dom-scrollable';
export { FlingSimulation, ScrollFling } from './fling-simulation';
export { createBrowserScheduler } from './frame-scheduler';
export type { FrameCallback, FrameScheduler } from './frame-scheduler';
export { HeightState } from './height-state';
export type { HeightChange } from './height-state';
export { resolveSnapStop } from './snap-resolver';
export { Tween } from './tween';
export type { TweenOptions } from './tween';
export type { DragEndDetails, DragStartDetails, DrawerCallbacks, ScrollableCollaborator } from './types';
