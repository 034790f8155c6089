/**
 * Boot type definitions
 */

import type { FanConfig } from '$types';
import type { TimerAPI } from '$types/common';
import type { ExecFileFn } from '@hardware/ipmi';
import type { ConsoleSink, PostJsonFn } from '@logging';
import type { Controller } from '@system/control/types';
import type { ControllerState } from '@system/state/types';
import type { WriteFileFn } from '@telemetry';

export type { Controller } from '@system/control/types';

/**
 * Environment variables, shaped like process.env
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Console used before the logger exists and for CLI output
 */
export interface BootConsole {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Everything initialize() reaches outside the process through
 */
export interface InitDependencies {
  console: BootConsole;
  /** Timer for the console and Slack sinks */
  timer: TimerAPI;
  post: PostJsonFn;
  /** Current time in seconds */
  timeSource: () => number;
  /** ipmitool launcher (child_process when omitted) */
  exec?: ExecFileFn;
  /** Telemetry writer (fs/promises when omitted) */
  writeFile?: WriteFileFn;
}

/**
 * Wired controller, ready for startControlLoop
 */
export interface Runtime {
  config: FanConfig;
  controller: Controller;
  state: ControllerState;
  consoleSink: ConsoleSink;
}

/**
 * Flags shared by every command
 */
export type CliOptions = {
  envFile?: string;
  interval?: number;
  threshold?: number;
  dryRun?: boolean;
  logLevel?: number;
};

/**
 * Temperature range printed by `preview`
 */
export type PreviewRange = {
  from: number;
  to: number;
  step: number;
};

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface CliDependencies extends InitDependencies {
  env: EnvSource;
  /** Path tried when --env-file is not given */
  defaultEnvFile: string;
  loadEnvFile(path: string, required: boolean): boolean;
  /** Timer for the control loop; must keep the process alive */
  loopTimer: TimerAPI;
  onSignal(signal: ShutdownSignal, handler: () => void): void;
  setExitCode(code: number): void;
}
