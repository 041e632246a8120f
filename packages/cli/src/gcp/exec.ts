/**
 * gcloud process runner
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logCommand, logOutput } from '../logger';

const execFileAsync = promisify(execFile);

export const GCLOUD = 'gcloud';

/** Runs gcloud with the given arguments and resolves to stdout */
export type GcloudRunner = (args: string[]) => Promise<string>;

export class GcloudCommandError extends Error {
  readonly args: string[];
  readonly stderr: string;

  constructor(args: string[], stderr: string, fallback: string) {
    super(stderr.trim() || fallback);
    this.name = 'GcloudCommandError';
    this.args = args;
    this.stderr = stderr;
  }
}

function readStderr(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    return String(error.stderr ?? '');
  }
  return '';
}

/**
 * Run gcloud without a shell so arguments need no quoting
 */
export const runGcloud: GcloudRunner = async (args) => {
  logCommand(`${GCLOUD} ${args.join(' ')}`);
  try {
    const { stdout, stderr } = await execFileAsync(GCLOUD, args, {
      encoding: 'utf8',
      maxBuffer: 16 * 1024 * 1024,
    });
    logOutput('stderr', stderr);
    return stdout;
  } catch (error) {
    const stderr = readStderr(error);
    logOutput('stderr', stderr);
    throw new GcloudCommandError(args, stderr, error instanceof Error ? error.message : String(error));
  }
};
