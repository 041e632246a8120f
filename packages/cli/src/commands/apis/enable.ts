/**
 * cloudprep apis enable <api...>
 */

import { Command } from 'commander';
import { enableAll, resolvePolling, resolveProjectId } from '@cloudprep/core';
import { createCommandLogger } from '../../logger';
import { ConsoleProgress, reportError } from '../../output';
import { PROJECT_OPTION_DESCRIPTION, resolveContext, type CommandContext } from '../context';

export interface EnableApisOptions {
  project?: string;
  pollInterval?: string;
  maxAttempts?: string;
}

export const enableCommand = new Command('enable')
  .description('Enable APIs and wait until each one is reported enabled')
  .argument('<apis...>', 'Service names, e.g. run.googleapis.com')
  .option('-p, --project <id>', PROJECT_OPTION_DESCRIPTION)
  .option('--poll-interval <seconds>', 'Seconds between enablement checks')
  .option('--max-attempts <count>', 'Enablement checks before giving up')
  .action(async (apis: string[], options: EnableApisOptions) => {
    process.exitCode = await runEnableApis(apis, options);
  });

export async function runEnableApis(
  apis: string[],
  options: EnableApisOptions,
  overrides: Partial<CommandContext> = {}
): Promise<number> {
  const context = resolveContext(overrides);
  const log = createCommandLogger('apis enable');
  const progress = new ConsoleProgress();

  try {
    const projectId = resolveProjectId({ projectId: options.project, env: context.env });
    const polling = resolvePolling(options.pollInterval, options.maxAttempts);
    await context.checkDependencies();

    progress.hooks.onStepStart?.('apis');
    await enableAll(context.client, projectId, apis, {
      polling,
      clock: context.clock,
      logger: log,
      onPoll: progress.hooks.onApiPoll,
      onEnabled: progress.hooks.onApiEnabled,
    });
    progress.hooks.onStepComplete?.('apis');
    return 0;
  } catch (error) {
    progress.fail();
    return reportError(error, 'apis enable');
  }
}
