export { createIpmiTemperatureSource } from './sensors';
export { isValidReading, parseSdrTemperatures, selectChannels, aggregateTemperature } from './helpers';
export type { TemperatureSource, SdrReading, SensorConfig } from './types';
