/**
 * Command-line interface
 *
 * fan-curve [run]   validate, compile and start the control loop (default)
 * fan-curve preview print the compiled curve over a temperature range
 * fan-curve sample  read the temperature once and show the duty it maps to
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

import type { FanUserConfig } from '$types';
import { describeError } from '$types/errors';
import { evaluateCurve, sampleCurve } from '@core/curve';
import type { CurveSample } from '@core/curve';
import type { FanMode } from '@hardware/fans';
import { startControlLoop } from '@system/control';
import type { Controller, ControlLoopHandle } from '@system/control';
import { fmtTemp } from '@logging';
import { toHexByte } from '@utils/number';
import { formatUptime } from '@utils/time';

import { USER_CONFIG } from './config';
import { applyCliOverrides, loadUserConfig } from './env';
import { formatPreviewRow } from './helpers';
import {
  buildFanConfig,
  checkConfig,
  compileConfiguredCurve,
  createRunner,
  createTemperatureSource,
  initialize
} from './init';
import type { CliDependencies, CliOptions, PreviewRange, Runtime, ShutdownSignal } from './types';

const LOG_LEVEL_NAMES: Record<string, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  warn: 2,
  critical: 3
};

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseLogLevelOption(value: string): number {
  const byName = LOG_LEVEL_NAMES[value.toLowerCase()];
  if (byName !== undefined) {
    return byName;
  }
  const parsed = Number(value);
  if (parsed === 0 || parsed === 1 || parsed === 2 || parsed === 3) {
    return parsed;
  }
  throw new InvalidArgumentError('Use 0-3 or debug, info, warning, critical.');
}

/**
 * Resolve settings: defaults, then .env and the environment, then flags
 * @throws {ConfigurationError} When the env file or a variable is unusable
 */
export function loadConfig(options: CliOptions, deps: CliDependencies): FanUserConfig {
  if (options.envFile !== undefined) {
    deps.loadEnvFile(options.envFile, true);
  } else {
    deps.loadEnvFile(deps.defaultEnvFile, false);
  }
  return applyCliOverrides(loadUserConfig(deps.env, USER_CONFIG), options);
}

function tryLoadConfig(options: CliOptions, deps: CliDependencies): FanUserConfig | null {
  try {
    return loadConfig(options, deps);
  } catch (err) {
    deps.console.error(chalk.red('INIT FAIL: ' + describeError(err)));
    return null;
  }
}

/**
 * Switch the BMC fan mode, logging instead of throwing
 * @returns True when the BMC accepted the mode
 */
export async function applyFanMode(controller: Controller, mode: FanMode): Promise<boolean> {
  try {
    await controller.actuator.setFanMode(mode);
    controller.logger.info('Fan mode set to ' + mode);
    return true;
  } catch (err) {
    controller.logger.warning(describeError(err));
    return false;
  }
}

/**
 * Stop the loop and hand the fans back
 * Waits for a tick in progress, so no command lands after the mode restore
 */
export async function stopController(runtime: Runtime, handle: ControlLoopHandle): Promise<void> {
  await handle.stop();
  if (runtime.config.RESTORE_FAN_MODE_ON_EXIT) {
    await applyFanMode(runtime.controller, 'optimal');
  }
  const state = handle.getState();
  const uptime = runtime.controller.timeSource() - state.startTime;
  runtime.controller.logger.info('🛑 Stopped after ' + state.tickCount + ' ticks, up ' + formatUptime(uptime));
  runtime.consoleSink.flush();
}

/**
 * `run`: start the controller and stop it on SIGINT/SIGTERM
 * @returns Loop handle, or null when startup failed (exit code set to 1)
 */
export async function runCommand(options: CliOptions, deps: CliDependencies): Promise<ControlLoopHandle | null> {
  const userConfig = tryLoadConfig(options, deps);
  const initialized = userConfig === null ? null : await initialize(userConfig, deps);
  if (initialized === null) {
    deps.setExitCode(1);
    return null;
  }
  const runtime: Runtime = initialized;

  if (runtime.config.FAN_MODE_FULL_ON_START) {
    await applyFanMode(runtime.controller, 'full');
  }

  const handle = startControlLoop(runtime.controller, runtime.state, deps.loopTimer);
  let stopping = false;

  function shutdown(signal: ShutdownSignal): void {
    if (stopping) return;
    stopping = true;
    runtime.controller.logger.info(signal + ' received, stopping');
    stopController(runtime, handle)
      .then(function() {
        deps.setExitCode(0);
      })
      .catch(function(err: unknown) {
        deps.console.error(chalk.red('Shutdown failed: ' + describeError(err)));
        deps.setExitCode(1);
      });
  }

  deps.onSignal('SIGINT', function() {
    shutdown('SIGINT');
  });
  deps.onSignal('SIGTERM', function() {
    shutdown('SIGTERM');
  });

  return handle;
}

/**
 * `preview`: print the curve table
 * @returns Exit code
 */
export function previewCommand(options: CliOptions, range: PreviewRange, deps: CliDependencies): number {
  const userConfig = tryLoadConfig(options, deps);
  if (userConfig === null || !checkConfig(userConfig, deps.console)) {
    return 1;
  }

  const config = buildFanConfig(userConfig);
  const segments = compileConfiguredCurve(config, deps.console);
  if (segments === null) {
    return 1;
  }

  let rows: CurveSample[];
  try {
    rows = sampleCurve(segments, { min: config.DUTY_MIN, max: config.DUTY_MAX }, range.from, range.to, range.step);
  } catch (err) {
    deps.console.error(chalk.red(describeError(err)));
    return 1;
  }

  deps.console.log(chalk.bold('   Temp      Duty  Raw'));
  rows.forEach(function(row) {
    deps.console.log(formatPreviewRow(row));
  });
  return 0;
}

/**
 * `sample`: one SDR read, no fan commands
 * @returns Exit code
 */
export async function sampleCommand(options: CliOptions, deps: CliDependencies): Promise<number> {
  const userConfig = tryLoadConfig(options, deps);
  if (userConfig === null || !checkConfig(userConfig, deps.console)) {
    return 1;
  }

  const config = buildFanConfig(userConfig);
  const segments = compileConfiguredCurve(config, deps.console);
  if (segments === null) {
    return 1;
  }

  const source = createTemperatureSource(config, createRunner(config, deps));
  let temperature: number;
  try {
    temperature = await source.sample();
  } catch (err) {
    deps.console.error(chalk.red(describeError(err)));
    return 1;
  }

  const duty = evaluateCurve(temperature, segments, { min: config.DUTY_MIN, max: config.DUTY_MAX });
  deps.console.log(chalk.green(fmtTemp(temperature) + ' -> duty ' + duty + ' (' + toHexByte(duty) + ')'));
  return 0;
}

/**
 * Build the commander program
 * @param deps - Process-level dependencies
 */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('fan-curve')
    .description('Temperature-driven fan curve controller for IPMI-managed servers')
    .version('1.0.0')
    .option('-e, --env-file <path>', 'load settings from this .env file')
    .option('-i, --interval <seconds>', 'poll interval in seconds', parseNumberOption)
    .option('-t, --threshold <celsius>', 'debounce threshold in °C', parseNumberOption)
    .option('-n, --dry-run', 'log fan commands instead of sending them')
    .option('-l, --log-level <level>', 'log level: 0-3 or debug, info, warning, critical', parseLogLevelOption);

  program
    .command('run', { isDefault: true })
    .description('start the control loop')
    .action(async function() {
      await runCommand(program.opts<CliOptions>(), deps);
    });

  const preview = program
    .command('preview')
    .description('print the duty cycle the curve picks across a temperature range')
    .option('--from <celsius>', 'first temperature', parseNumberOption, 20)
    .option('--to <celsius>', 'last temperature', parseNumberOption, 90)
    .option('--step <celsius>', 'temperature increment', parseNumberOption, 5);
  preview.action(function() {
    deps.setExitCode(previewCommand(program.opts<CliOptions>(), preview.opts<PreviewRange>(), deps));
  });

  program
    .command('sample')
    .description('read the temperature once and print the duty cycle it maps to')
    .action(async function() {
      deps.setExitCode(await sampleCommand(program.opts<CliOptions>(), deps));
    });

  return program;
}
