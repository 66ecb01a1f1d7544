import { Curves, resolveCurve, type Curve, type CurveName } from './curves';
import { debugLog } from './debug';

export const DEFAULT_COMMAND_DURATION = 256;

export interface CommandAnimation {
  /** Milliseconds. */
  duration: number;
  curve: Curve;
}

export type DrawerCommand =
  | ({ kind: 'collapse'; updateScroll: boolean } & CommandAnimation)
  | ({ kind: 'expand' } & CommandAnimation)
  | ({ kind: 'scrollTo'; position: number } & CommandAnimation);

export interface CommandAnimationOptions {
  duration?: number;
  curve?: Curve | CurveName;
}

export interface CollapseOptions extends CommandAnimationOptions {
  /** Also scroll the list back to its start. Defaults to true. */
  updateScroll?: boolean;
}

type Listener = () => void;

/**
 * Imperative handle for a mounted drawer.
 *
 * Holds at most one pending command; a new one replaces whatever was not yet
 * taken. Subscribers are told when a command lands and call {@link take}.
 */
export class BottomDrawerCommandChannel {
  private pending: DrawerCommand | null = null;
  private listeners = new Set<Listener>();

  collapse({ updateScroll = true, ...animation }: CollapseOptions = {}): void {
    this.post({ kind: 'collapse', updateScroll, ...resolveAnimation(animation) });
  }

  expand(options: CommandAnimationOptions = {}): void {
    this.post({ kind: 'expand', ...resolveAnimation(options) });
  }

  scrollTo(position: number, options: CommandAnimationOptions = {}): void {
    this.post({ kind: 'scrollTo', position, ...resolveAnimation(options) });
  }

  /** The pending command, at most once. */
  take(): DrawerCommand | null {
    const command = this.pending;
    this.pending = null;
    return command;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private post(command: DrawerCommand): void {
    debugLog('command', command.kind);
    this.pending = command;
    this.listeners.forEach(listener => listener());
  }
}

function resolveAnimation({ duration, curve }: CommandAnimationOptions): CommandAnimation {
  return {
    duration: duration ?? DEFAULT_COMMAND_DURATION,
    curve: resolveCurve(curve, Curves.linear),
  };
}
