/**
 * Development-only logging for the drawer's interaction core.
 *
 * Outside development the exports are no-ops, so call sites can stay in place.
 */

const isDev = process.env.NODE_ENV === 'development';

const noop = (): void => {};

export const debugLog: (...args: unknown[]) => void = isDev
  ? console.log.bind(console, '[bottom-drawer]')
  : noop;
