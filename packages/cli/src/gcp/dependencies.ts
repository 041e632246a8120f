/**
 * Checks for the executables the CLI shells out to
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { MissingDependencyError } from '@cloudprep/core';
import { logDebug } from '../logger';
import { GCLOUD } from './exec';

const execFileAsync = promisify(execFile);

export type ProbeFn = (file: string, args: string[]) => Promise<unknown>;

const probe: ProbeFn = (file, args) => execFileAsync(file, args);

/**
 * Check that an executable is on PATH
 */
export async function isExecutableAvailable(name: string, run: ProbeFn = probe): Promise<boolean> {
  try {
    await run('which', [name]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that an executable answers --version
 */
export async function isExecutableUsable(name: string, run: ProbeFn = probe): Promise<boolean> {
  try {
    await run(name, ['--version']);
    return true;
  } catch (error) {
    logDebug(`${name} --version failed`, error);
    return false;
  }
}

/**
 * Throw MissingDependencyError unless the executable is present and usable
 */
export async function ensureExecutable(name: string, run: ProbeFn = probe): Promise<void> {
  if (!(await isExecutableAvailable(name, run)) || !(await isExecutableUsable(name, run))) {
    throw new MissingDependencyError(name);
  }
}

export function ensureGcloud(run: ProbeFn = probe): Promise<void> {
  return ensureExecutable(GCLOUD, run);
}
