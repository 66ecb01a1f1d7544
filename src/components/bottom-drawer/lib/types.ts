import type { Curve } from './curves';

/** The inner list whose offset the drawer reads and drives. */
export interface ScrollableCollaborator {
  readonly offset: number;
  /** Whether the last requested offset fell outside the scrollable range. */
  readonly isOutOfRange: boolean;
  jumpTo(offset: number): void;
  animateTo(offset: number, duration: number, curve: Curve): void;
}

export interface DrawerCallbacks {
  onDragStart?: () => void;
  onDragEnd?: () => void;
  /** Fires on every committed height change. */
  onHeightChanged?: (height: number, heightFraction: number) => void;
  /** Fires once per completed snap, only while snapping is enabled. */
  onSnapEnd?: (stopIndex: number) => void;
}

export interface DragStartDetails {
  /** Distance in px from the drawer's top edge to where the drag started. */
  localY: number;
}

export interface DragEndDetails {
  /** px/s along the vertical axis, positive downward. */
  velocity: number;
}
