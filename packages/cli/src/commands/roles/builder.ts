/**
 * cloudprep roles builder
 *
 * Grant the default compute service account the roles builds need to write
 * logs and push images.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { grantBuilderDefaults, resolveProjectId } from '@cloudprep/core';
import { createCommandLogger } from '../../logger';
import { ConsoleProgress, reportError } from '../../output';
import { PROJECT_OPTION_DESCRIPTION, resolveContext, type CommandContext } from '../context';

export interface BuilderRolesOptions {
  project?: string;
}

export const builderCommand = new Command('builder')
  .description('Grant build roles to the default compute service account')
  .option('-p, --project <id>', PROJECT_OPTION_DESCRIPTION)
  .action(async (options: BuilderRolesOptions) => {
    process.exitCode = await runBuilderRoles(options);
  });

export async function runBuilderRoles(
  options: BuilderRolesOptions,
  overrides: Partial<CommandContext> = {}
): Promise<number> {
  const context = resolveContext(overrides);
  const log = createCommandLogger('roles builder');
  const progress = new ConsoleProgress();

  try {
    const projectId = resolveProjectId({ projectId: options.project, env: context.env });
    await context.checkDependencies();

    progress.hooks.onStepStart?.('builder');
    const result = await grantBuilderDefaults(context.client, projectId, {
      logger: log,
      onGranted: progress.hooks.onRoleGranted,
    });
    progress.hooks.onStepComplete?.('builder');
    console.log(chalk.gray(`  Build service account: ${result.principal}\n`));
    return 0;
  } catch (error) {
    return reportError(error, 'roles builder');
  }
}
