export { sleep, systemClock } from './timers.js';
export type { Clock } from './timers.js';
export { formatDuration } from './format.js';
