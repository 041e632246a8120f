/**
 * cloudprep roles grant <principal> <role...>
 */

import { Command } from 'commander';
import { grantRoles, resolveProjectId } from '@cloudprep/core';
import { createCommandLogger } from '../../logger';
import { ConsoleProgress, reportError } from '../../output';
import { PROJECT_OPTION_DESCRIPTION, resolveContext, type CommandContext } from '../context';

export interface GrantRolesOptions {
  project?: string;
}

export const grantCommand = new Command('grant')
  .description('Grant roles on the project to a principal')
  .argument('<principal>', 'Service account email or member, e.g. user:ops@example.com')
  .argument('<roles...>', 'Roles to grant, in order')
  .option('-p, --project <id>', PROJECT_OPTION_DESCRIPTION)
  .action(async (principal: string, roles: string[], options: GrantRolesOptions) => {
    process.exitCode = await runGrantRoles(principal, roles, options);
  });

export async function runGrantRoles(
  principal: string,
  roles: string[],
  options: GrantRolesOptions,
  overrides: Partial<CommandContext> = {}
): Promise<number> {
  const context = resolveContext(overrides);
  const log = createCommandLogger('roles grant');
  const progress = new ConsoleProgress();

  try {
    const projectId = resolveProjectId({ projectId: options.project, env: context.env });
    await context.checkDependencies();

    progress.hooks.onStepStart?.('roles');
    await grantRoles(context.client, projectId, principal, roles, {
      logger: log,
      onGranted: progress.hooks.onRoleGranted,
    });
    progress.hooks.onStepComplete?.('roles');
    return 0;
  } catch (error) {
    return reportError(error, 'roles grant');
  }
}
