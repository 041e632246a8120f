/**
 * cloudprep policy ensure <policy>
 */

import { Command } from 'commander';
import { ensureRule, resolveProjectId } from '@cloudprep/core';
import { createCommandLogger } from '../../logger';
import { ConsoleProgress, reportError } from '../../output';
import { PROJECT_OPTION_DESCRIPTION, resolveContext, type CommandContext } from '../context';

export interface EnsurePolicyOptions {
  project?: string;
  pattern: string;
  rule: string;
}

export const ensureCommand = new Command('ensure')
  .description('Set an org policy rule on the project unless it is already there')
  .argument('<policy>', 'Constraint name, e.g. iam.allowedPolicyMemberDomains')
  .requiredOption('--pattern <text>', 'Text that shows the rule is already in place')
  .requiredOption('--rule <json>', 'Rule body to set, e.g. \'"allowAll": true\'')
  .option('-p, --project <id>', PROJECT_OPTION_DESCRIPTION)
  .action(async (policyName: string, options: EnsurePolicyOptions) => {
    process.exitCode = await runEnsurePolicy(policyName, options);
  });

export async function runEnsurePolicy(
  policyName: string,
  options: EnsurePolicyOptions,
  overrides: Partial<CommandContext> = {}
): Promise<number> {
  const context = resolveContext(overrides);
  const log = createCommandLogger('policy ensure');
  const progress = new ConsoleProgress();

  try {
    const projectId = resolveProjectId({ projectId: options.project, env: context.env });
    await context.checkDependencies();

    progress.hooks.onStepStart?.('policies');
    await ensureRule(
      context.client,
      { policyName, rulePattern: options.pattern, ruleSetPayload: options.rule },
      projectId,
      { logger: log, onChecked: progress.hooks.onPolicyChecked }
    );
    progress.hooks.onStepComplete?.('policies');
    return 0;
  } catch (error) {
    return reportError(error, 'policy ensure');
  }
}
