/**
 * Collaborators shared by every command, overridable from tests
 */

import { systemClock, type Clock, type CloudProvisioningClient } from '@cloudprep/core';
import { GcloudClient, ensureGcloud } from '../gcp';

export interface CommandContext {
  client: CloudProvisioningClient;
  clock: Clock;
  env: Record<string, string | undefined>;
  cwd: string;
  checkDependencies: () => Promise<void>;
}

export function resolveContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    client: overrides.client ?? new GcloudClient(),
    clock: overrides.clock ?? systemClock,
    env: overrides.env ?? process.env,
    cwd: overrides.cwd ?? process.cwd(),
    checkDependencies: overrides.checkDependencies ?? (() => ensureGcloud()),
  };
}

/**
 * Shared `--project` option text
 */
export const PROJECT_OPTION_DESCRIPTION = 'GCP project id (defaults to $PROJECT_ID)';
