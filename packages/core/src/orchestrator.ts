/**
 * Project preparation run
 *
 * apis -> org policies -> deployer roles -> builder roles, stopping at the
 * first failure. Every step only adds state, so a failed run can be re-run.
 */

import { enableAll } from './apis';
import { validatePrepConfig } from './config';
import { grantBuilderDefaults, grantRoles } from './iam';
import { noopLogger } from './logger';
import { ensureRule } from './org-policy';
import { systemClock } from './poll';
import type {
  Clock,
  CloudProvisioningClient,
  PolicyResult,
  PreparationReport,
  PrepConfig,
  PrepHooks,
  PrepLogger,
  PrepStep,
} from './types';

export interface PreparationOptions {
  clock?: Clock;
  logger?: PrepLogger;
  hooks?: PrepHooks;
}

export async function runPreparation(
  config: PrepConfig,
  client: CloudProvisioningClient,
  options: PreparationOptions = {}
): Promise<PreparationReport> {
  const logger = options.logger ?? noopLogger;
  const hooks = options.hooks ?? {};
  const { projectId } = config;

  validatePrepConfig(config);
  logger.info('Preparation started', {
    projectId,
    apis: config.apis.length,
    roles: config.roles.length,
    policies: config.policies.length,
  });

  const step = async <T>(name: PrepStep, fn: () => Promise<T>): Promise<T> => {
    hooks.onStepStart?.(name);
    const result = await fn();
    hooks.onStepComplete?.(name);
    return result;
  };

  const apis = await step('apis', () =>
    enableAll(client, projectId, config.apis, {
      polling: config.polling,
      clock: options.clock ?? systemClock,
      logger,
      onPoll: hooks.onApiPoll,
      onEnabled: hooks.onApiEnabled,
    })
  );

  const policies = await step('policies', async () => {
    const results: PolicyResult[] = [];
    for (const rule of config.policies) {
      results.push(await ensureRule(client, rule, projectId, { logger, onChecked: hooks.onPolicyChecked }));
    }
    return results;
  });

  const deployerRoles = await step('roles', async () => {
    if (config.roles.length === 0 || !config.deployerPrincipal) {
      return [];
    }
    return grantRoles(client, projectId, config.deployerPrincipal, config.roles, {
      logger,
      onGranted: hooks.onRoleGranted,
    });
  });

  const builder = config.grantBuilderRoles
    ? await step('builder', () =>
        grantBuilderDefaults(client, projectId, { logger, onGranted: hooks.onRoleGranted })
      )
    : null;

  logger.info('Preparation finished', { projectId });
  return { projectId, apis, policies, deployerRoles, builder };
}
