/**
 * Preparation config loader
 *
 * Builds a PrepConfig once from environment, option overrides and the list
 * files in the working directory.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError, MissingVariableError } from './errors';
import { DEFAULT_POLLING } from './poll';
import type { OrgPolicyRule, PollingOptions, PrepConfig } from './types';

export const DEFAULT_APIS_FILE = 'project_apis.txt';
export const DEFAULT_ROLES_FILE = 'project_roles.txt';
export const DEFAULT_POLICIES_FILE = 'org_policies.json';

export interface ConfigSources {
  env?: Record<string, string | undefined>;
  cwd?: string;
  projectId?: string;
  serviceAccount?: string;
  apisFile?: string;
  rolesFile?: string;
  /** An explicit file must exist; the default one is optional */
  policiesFile?: string;
  skipBuilderRoles?: boolean;
  pollIntervalSeconds?: number | string;
  maxAttempts?: number | string;
}

const orgPolicyRuleSchema = z.object({
  policyName: z.string().min(1),
  rulePattern: z.string().min(1),
  ruleSetPayload: z.string().min(1),
});

const orgPolicyFileSchema = z.array(orgPolicyRuleSchema);

const pollingSchema = z.object({
  intervalSeconds: z.coerce.number().nonnegative(),
  maxAttempts: z.coerce.number().int().positive(),
});

/**
 * Parse line-delimited list content. Order is kept; blank and `#` lines are skipped.
 */
export function parseList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function readListFile(filePath: string): string[] {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`List file not found: ${filePath}`, 'Create the file with one entry per line');
  }
  return parseList(readFileSync(filePath, 'utf-8'));
}

export function parseOrgPolicies(content: string, source: string): OrgPolicyRule[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(
      `Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = orgPolicyFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(
      `Invalid org policy list in ${source}${where}: ${issue.message}`,
      'Each entry needs policyName, rulePattern and ruleSetPayload'
    );
  }
  return result.data;
}

function readOrgPolicies(filePath: string, required: boolean): OrgPolicyRule[] {
  if (!existsSync(filePath)) {
    if (required) {
      throw new ConfigurationError(`Org policy file not found: ${filePath}`);
    }
    return [];
  }
  return parseOrgPolicies(readFileSync(filePath, 'utf-8'), filePath);
}

export function resolvePolling(
  pollIntervalSeconds?: number | string,
  maxAttempts?: number | string
): PollingOptions {
  const result = pollingSchema.safeParse({
    intervalSeconds: pollIntervalSeconds ?? DEFAULT_POLLING.intervalMs / 1000,
    maxAttempts: maxAttempts ?? DEFAULT_POLLING.maxAttempts,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid polling option ${issue.path.join('.')}: ${issue.message}`);
  }
  return {
    intervalMs: Math.round(result.data.intervalSeconds * 1000),
    maxAttempts: result.data.maxAttempts,
  };
}

/**
 * Resolve the project id from an explicit value or PROJECT_ID
 */
export function resolveProjectId(sources: Pick<ConfigSources, 'env' | 'projectId'>): string {
  const projectId = (sources.projectId ?? sources.env?.PROJECT_ID ?? '').trim();
  if (!projectId) {
    throw new MissingVariableError('PROJECT_ID', 'the project to prepare');
  }
  return projectId;
}

/**
 * Check the values the run cannot do without
 */
export function validatePrepConfig(config: PrepConfig): void {
  if (!config.projectId.trim()) {
    throw new MissingVariableError('PROJECT_ID', 'the project to prepare');
  }
  if (config.roles.length > 0 && !config.deployerPrincipal?.trim()) {
    throw new MissingVariableError(
      'DEPLOYER_SERVICE_ACCOUNT',
      'the service account that deploys the infrastructure'
    );
  }
}

export function loadPrepConfig(sources: ConfigSources = {}): PrepConfig {
  const env = sources.env ?? {};
  const cwd = sources.cwd ?? process.cwd();

  const projectId = resolveProjectId(sources);
  const apis = readListFile(resolve(cwd, sources.apisFile ?? DEFAULT_APIS_FILE));
  const roles = readListFile(resolve(cwd, sources.rolesFile ?? DEFAULT_ROLES_FILE));
  const policies = readOrgPolicies(
    resolve(cwd, sources.policiesFile ?? DEFAULT_POLICIES_FILE),
    sources.policiesFile !== undefined
  );

  const config: PrepConfig = {
    projectId,
    apis,
    roles,
    deployerPrincipal: (sources.serviceAccount ?? env.DEPLOYER_SERVICE_ACCOUNT)?.trim() || undefined,
    policies,
    grantBuilderRoles: !sources.skipBuilderRoles,
    polling: resolvePolling(sources.pollIntervalSeconds, sources.maxAttempts),
  };
  validatePrepConfig(config);
  return config;
}
