export { fanOut, TaskGroup, describeError } from './TaskGroup.js';
export type { FanOutReport, SettledTask } from './TaskGroup.js';
