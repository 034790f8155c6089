#!/usr/bin/env node
/**
 * Process entry point
 */

import * as path from 'path';

import chalk from 'chalk';

import { describeError } from '$types/errors';
import { execFileAsync } from '@hardware/ipmi';
import { postJson } from '@logging';
import { createNodeTimer, now } from '@utils/time';

import { createProgram } from './cli';
import { loadEnvFile } from './env';
import type { CliDependencies } from './types';

const deps: CliDependencies = {
  console: console,
  env: process.env,
  defaultEnvFile: path.resolve(__dirname, '../../.env'),
  loadEnvFile: loadEnvFile,
  // Sink timers never hold the process open; the loop timer does
  timer: createNodeTimer({ unref: true }),
  loopTimer: createNodeTimer(),
  post: postJson,
  exec: execFileAsync,
  timeSource: now,
  onSignal: function(signal, handler) {
    process.on(signal, handler);
  },
  setExitCode: function(code) {
    process.exitCode = code;
  }
};

createProgram(deps)
  .parseAsync(process.argv)
  .catch(function(err: unknown) {
    console.error(chalk.red(describeError(err)));
    process.exitCode = 1;
  });
