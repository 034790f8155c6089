export { createFileTelemetryEmitter, createNullTelemetryEmitter, replaceFile } from './telemetry';
export { escapeTag, formatLineProtocol } from './helpers';
export type { TelemetryEmitter, FileTelemetryConfig, WriteFileFn } from './types';
