export { BottomDrawer, default } from './BottomDrawer';
export type { BottomDrawerProps } from './BottomDrawer';
export { useBottomDrawerController } from './hooks/use-bottom-drawer-controller';
export { useDrawerInteraction } from './hooks/use-drawer-interaction';
export type { DrawerInteraction, UseDrawerInteractionOptions } from './hooks/use-drawer-interaction';
export * from './lib';
