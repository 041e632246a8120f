/**
 * Organization policy reconciler
 *
 * Only the policy set directly on the project is inspected. A rule inherited
 * from the folder or organization that already satisfies the constraint is not
 * detected, and the rule is set on the project anyway.
 */

import { PolicyEnforcementError, describeCause } from './errors';
import { noopLogger } from './logger';
import type {
  CloudProvisioningClient,
  OrgPolicyDocument,
  OrgPolicyRule,
  PolicyResult,
  PrepLogger,
} from './types';

export interface OrgPolicyOptions {
  logger?: PrepLogger;
  onChecked?: (result: PolicyResult) => void;
}

/**
 * Parse a rule body fragment such as `"enforce": false` into a rule object
 */
export function parseRulePayload(ruleSetPayload: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(`{${ruleSetPayload}}`);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('rule payload is not a JSON object fragment');
  }
  return { ...parsed };
}

/**
 * Build the full replacement policy carrying a single rule
 */
export function buildPolicyDocument(
  projectId: string,
  policyName: string,
  ruleSetPayload: string
): OrgPolicyDocument {
  return {
    name: `projects/${projectId}/policies/${policyName}`,
    spec: {
      rules: [parseRulePayload(ruleSetPayload)],
    },
  };
}

async function isRulePresent(
  client: CloudProvisioningClient,
  rule: OrgPolicyRule,
  projectId: string,
  logger: PrepLogger
): Promise<boolean> {
  let description: string;
  try {
    description = await client.describeOrgPolicy(rule.policyName, projectId);
  } catch (error) {
    // describe fails when nothing is set on the project
    logger.debug(`No project policy for ${rule.policyName}: ${describeCause(error)}`);
    return false;
  }
  return description.toLowerCase().includes(rule.rulePattern.toLowerCase());
}

/**
 * Make sure a policy rule is in place, setting it only when absent
 */
export async function ensureRule(
  client: CloudProvisioningClient,
  rule: OrgPolicyRule,
  projectId: string,
  options: OrgPolicyOptions = {}
): Promise<PolicyResult> {
  const logger = options.logger ?? noopLogger;
  logger.info(`policy: ${rule.policyName}`, { projectId, rulePattern: rule.rulePattern });

  let result: PolicyResult;
  if (await isRulePresent(client, rule, projectId, logger)) {
    result = { policyName: rule.policyName, outcome: 'satisfied' };
  } else {
    try {
      const document = buildPolicyDocument(projectId, rule.policyName, rule.ruleSetPayload);
      await client.setOrgPolicy(document);
    } catch (error) {
      logger.error(`Setting ${rule.policyName} failed`, error);
      throw new PolicyEnforcementError(rule.policyName, rule.rulePattern, error);
    }
    result = { policyName: rule.policyName, outcome: 'applied' };
  }

  logger.info(`policy ${rule.policyName} ${result.outcome}`);
  options.onChecked?.(result);
  return result;
}
