/**
 * Controller initialization
 */

import type { FanConfig, FanUserConfig } from '$types';
import { describeError } from '$types/errors';
import { compileCurve } from '@core/curve';
import type { Segment } from '@core/curve';
import { createDryRunActuator, createIpmiActuator } from '@hardware/fans';
import type { Actuator } from '@hardware/fans';
import { createIpmiRunner } from '@hardware/ipmi';
import type { IpmiRunner } from '@hardware/ipmi';
import { createIpmiTemperatureSource } from '@hardware/sensors';
import type { TemperatureSource } from '@hardware/sensors';
import { createConsoleSink, createLogger, createSlackSink, toLogLevel } from '@logging';
import type { ConsoleSink, Logger, RoutedSink } from '@logging';
import { createInitialState } from '@system/state';
import { createFileTelemetryEmitter, createNullTelemetryEmitter } from '@telemetry';
import type { TelemetryEmitter } from '@telemetry';
import { TIME_CONSTANTS } from '@utils/constants';
import { validateConfig } from '@validation';

import { APP_CONSTANTS } from './config';
import { formatStartupLines } from './helpers';
import type { BootConsole, Controller, InitDependencies, Runtime } from './types';

/**
 * Merge user settings with the application constants
 */
export function buildFanConfig(userConfig: FanUserConfig): FanConfig {
  return { ...APP_CONSTANTS, ...userConfig };
}

/**
 * Validate settings and print the outcome
 * @returns False when startup must stop
 */
export function checkConfig(userConfig: FanUserConfig, output: BootConsole): boolean {
  const validation = validateConfig(userConfig);

  if (!validation.valid) {
    output.error("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      output.error("  [" + err.field + "]: " + err.message);
    });
    return false;
  }

  validation.warnings.forEach(function(warn) {
    output.warn("  [" + warn.field + "]: " + warn.message);
  });
  return true;
}

/**
 * Compile the configured curve, printing the reason on failure
 * @returns Segments, or null when the curve is unusable
 */
export function compileConfiguredCurve(config: FanConfig, output: BootConsole): readonly Segment[] | null {
  try {
    return compileCurve(config.CURVE_POINTS);
  } catch (err) {
    output.error("INIT FAIL: " + describeError(err));
    return null;
  }
}

export function createRunner(config: FanConfig, deps: Pick<InitDependencies, 'exec'>): IpmiRunner {
  return createIpmiRunner({
    toolPath: config.IPMI_TOOL_PATH,
    host: config.IPMI_HOST,
    user: config.IPMI_USER,
    password: config.IPMI_PASSWORD,
    timeoutMs: config.IPMI_TIMEOUT_MS,
    maxBufferBytes: config.IPMI_MAX_BUFFER_BYTES
  }, deps.exec);
}

export function createTemperatureSource(config: FanConfig, runner: IpmiRunner): TemperatureSource {
  return createIpmiTemperatureSource(runner, {
    sensorNames: config.TEMP_SENSOR_NAMES,
    minValidC: config.SENSOR_MIN_VALID_C,
    maxValidC: config.SENSOR_MAX_VALID_C,
    sdrArgs: config.IPMI_SDR_TEMPERATURE_ARGS
  });
}

function createActuator(config: FanConfig, runner: IpmiRunner, logger: Logger): Actuator {
  const commands = {
    dutyPrefix: config.IPMI_FAN_DUTY_PREFIX,
    firstZone: config.IPMI_FAN_FIRST_ZONE,
    modePrefix: config.IPMI_FAN_MODE_PREFIX
  };
  return config.DRY_RUN ? createDryRunActuator(logger, commands) : createIpmiActuator(runner, commands);
}

function createTelemetry(config: FanConfig, deps: InitDependencies): TelemetryEmitter {
  if (!config.TELEMETRY_ENABLED) {
    return createNullTelemetryEmitter();
  }
  return createFileTelemetryEmitter({
    filePath: config.TELEMETRY_FILE_PATH,
    measurement: config.TELEMETRY_MEASUREMENT,
    hostname: config.TELEMETRY_HOSTNAME
  }, deps.writeFile);
}

function createLogging(config: FanConfig, deps: InitDependencies): { logger: Logger; consoleSink: ConsoleSink } {
  const levels = config.LOG_LEVELS;

  const consoleSink = createConsoleSink(deps.timer, deps.console, {
    bufferSize: config.CONSOLE_BUFFER_SIZE,
    drainInterval: config.CONSOLE_INTERVAL_MS
  });

  const sinks: RoutedSink[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({ sink: consoleSink, minLevel: toLogLevel(config.CONSOLE_LOG_LEVEL, levels.INFO) });
  }
  if (config.SLACK_ENABLED) {
    const slackSink = createSlackSink(deps.post, deps.timer, {
      enabled: config.SLACK_ENABLED,
      webhookUrl: config.SLACK_WEBHOOK_URL,
      bufferSize: config.SLACK_BUFFER_SIZE,
      retryDelayMs: config.SLACK_RETRY_DELAY_SEC * TIME_CONSTANTS.MS_PER_SECOND,
      maxRetries: config.SLACK_MAX_RETRIES
    });
    sinks.push({ sink: slackSink, minLevel: toLogLevel(config.SLACK_LOG_LEVEL, levels.WARNING) });
  }

  const logger = createLogger({
    level: toLogLevel(config.GLOBAL_LOG_LEVEL, levels.INFO),
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.timeSource,
    sinks: sinks
  }, levels);

  return { logger: logger, consoleSink: consoleSink };
}

/**
 * Validate configuration and wire every collaborator
 *
 * Nothing touches the BMC here; the first ipmitool call happens when the
 * caller switches the fan mode or starts the loop.
 *
 * @param userConfig - Settings after environment and CLI overrides
 * @param deps - Process-level dependencies
 * @returns Runtime, or null when configuration is invalid
 */
export async function initialize(userConfig: FanUserConfig, deps: InitDependencies): Promise<Runtime | null> {
  if (!checkConfig(userConfig, deps.console)) {
    return null;
  }

  const config = buildFanConfig(userConfig);
  const segments = compileConfiguredCurve(config, deps.console);
  if (segments === null) {
    return null;
  }

  const { logger, consoleSink } = createLogging(config, deps);
  const runner = createRunner(config, deps);

  const controller: Controller = {
    segments: segments,
    bounds: { min: config.DUTY_MIN, max: config.DUTY_MAX },
    settings: {
      debounceThresholdC: config.DEBOUNCE_THRESHOLD_C,
      fanBankCount: config.FAN_BANK_COUNT,
      pollIntervalSec: config.POLL_INTERVAL_SEC,
      maxConsecutiveErrors: config.MAX_CONSECUTIVE_ERRORS
    },
    source: createTemperatureSource(config, runner),
    actuator: createActuator(config, runner, logger),
    telemetry: createTelemetry(config, deps),
    logger: logger,
    timeSource: deps.timeSource,
    isDebug: config.GLOBAL_LOG_LEVEL <= config.LOG_LEVELS.DEBUG
  };

  const statuses = logger.startSinks();

  // Banner first, then sink problems
  formatStartupLines(config).forEach(function(line) {
    logger.info(line);
  });
  // Straight to the console: the failing sink may be the only one configured
  statuses.forEach(function(status) {
    if (!status.ok) {
      deps.console.log('⚠️ [WARNING]  ' + status.message);
    }
  });

  return {
    config: config,
    controller: controller,
    state: createInitialState(deps.timeSource()),
    consoleSink: consoleSink
  };
}
