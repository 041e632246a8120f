/**
 * Debug log for the cloudprep CLI
 *
 * Entries go to .cloudprep/debug.log in the working directory when that
 * directory exists, otherwise to ~/.cloudprep/debug.log. CLOUDPREP_DEBUG_LOG
 * names an explicit file. The log never interrupts a run: write failures are
 * dropped.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir, tmpdir } from 'os';
import type { PrepLogger } from '@cloudprep/core';

export const CLOUDPREP_DIR = '.cloudprep';
export const DEBUG_LOG_FILE = 'debug.log';
export const MAX_LOG_SIZE = 5 * 1024 * 1024;

export interface LogLocation {
  cwd: string;
  home: string;
  override?: string;
}

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Pick the log file for a working directory and home directory
 */
export function resolveLogPath({ cwd, home, override }: LogLocation): string {
  if (override) {
    return override;
  }

  const localDir = path.join(cwd, CLOUDPREP_DIR);
  if (fs.existsSync(localDir)) {
    return path.join(localDir, DEBUG_LOG_FILE);
  }

  const homeDir = path.join(home, CLOUDPREP_DIR);
  try {
    fs.mkdirSync(homeDir, { recursive: true });
    return path.join(homeDir, DEBUG_LOG_FILE);
  } catch {
    return path.join(tmpdir(), `cloudprep-${DEBUG_LOG_FILE}`);
  }
}

export function getLogPath(): string {
  if (!logFilePath) {
    logFilePath = resolveLogPath({
      cwd: process.cwd(),
      home: homedir(),
      override: process.env.CLOUDPREP_DEBUG_LOG,
    });
  }
  return logFilePath;
}

/**
 * Move a log past maxBytes to `<log>.old`, replacing any previous backup.
 * Returns whether the log was moved.
 */
export function rotateLog(logPath: string, maxBytes: number = MAX_LOG_SIZE): boolean {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= maxBytes) {
    return false;
  }
  const backupPath = `${logPath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
  return true;
}

export function sessionHeader(now: Date = new Date()): string {
  const separator = '='.repeat(80);
  return `\n${separator}\n[${now.toISOString()}] cloudprep session started\n${separator}\n`;
}

function append(text: string): void {
  try {
    fs.appendFileSync(getLogPath(), text);
  } catch {
    // dropped
  }
}

function startSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  try {
    rotateLog(getLogPath());
  } catch {
    // keep appending to the current file
  }
  append(sessionHeader());
}

export function formatEntry(level: string, message: string, data?: unknown, now: Date = new Date()): string {
  let entry = `[${now.toISOString()}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  startSession();
  append(formatEntry(level, message, data));
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/** Record a gcloud invocation before it runs */
export function logCommand(command: string): void {
  writeLog('CMD', `Executing: ${command}`);
}

export function logOutput(stream: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(stream.toUpperCase(), output.trim());
  }
}

export function logFullError(context: string, error: unknown, details?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = { context, ...details };

  if (error instanceof Error) {
    errorData.errorName = error.name;
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

/**
 * A PrepLogger whose entries are tagged with the command name
 */
export function createCommandLogger(commandName: string): PrepLogger {
  const tagged = (level: string) => (message: string, data?: unknown) =>
    writeLog(level, `[${commandName}] ${message}`, data);

  return {
    info: tagged('INFO'),
    warn: tagged('WARN'),
    error: tagged('ERROR'),
    debug: tagged('DEBUG'),
  };
}
