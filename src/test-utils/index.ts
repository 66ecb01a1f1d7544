export { FakeScrollable } from './fake-scrollable';
export type { RecordedScrollAnimation } from './fake-scrollable';
export { ManualScheduler } from './manual-scheduler';
