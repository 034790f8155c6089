/**
 * Telemetry types
 */

/**
 * Publishes the evaluated duty cycle for external monitoring
 */
export interface TelemetryEmitter {
  /**
   * Publish one record
   * @throws {TelemetryError} When the record cannot be written
   */
  publish(dutyCycle: number): Promise<void>;
}

export interface FileTelemetryConfig {
  /** File overwritten with the latest record */
  filePath: string;
  /** Line protocol measurement name */
  measurement: string;
  /** Value of the host tag */
  hostname: string;
}

/**
 * File writer (fs/promises.writeFile shaped)
 */
export type WriteFileFn = (path: string, data: string) => Promise<void>;
