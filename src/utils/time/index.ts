export { now } from './time';
export { formatUptime, secondsToMs } from './helpers';
export { createNodeTimer } from './timer';
