/**
 * cloudprep prepare
 *
 * Enable APIs, enforce org policies and grant IAM roles so the project is
 * ready for infrastructure provisioning.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadPrepConfig, runPreparation } from '@cloudprep/core';
import { createCommandLogger } from '../logger';
import { ConsoleProgress, printReport, reportError } from '../output';
import { PROJECT_OPTION_DESCRIPTION, resolveContext, type CommandContext } from './context';

export interface PrepareOptions {
  project?: string;
  serviceAccount?: string;
  apisFile?: string;
  rolesFile?: string;
  policiesFile?: string;
  skipBuilderRoles?: boolean;
  pollInterval?: string;
  maxAttempts?: string;
}

export const prepareCommand = new Command('prepare')
  .description('Enable APIs, enforce org policies and grant roles for deployment')
  .option('-p, --project <id>', PROJECT_OPTION_DESCRIPTION)
  .option('--service-account <email>', 'Deployer service account (defaults to $DEPLOYER_SERVICE_ACCOUNT)')
  .option('--apis-file <path>', 'File listing APIs to enable, one per line', 'project_apis.txt')
  .option('--roles-file <path>', 'File listing roles for the deployer, one per line', 'project_roles.txt')
  .option('--policies-file <path>', 'JSON file listing org policy rules to enforce')
  .option('--skip-builder-roles', 'Do not grant roles to the default compute service account')
  .option('--poll-interval <seconds>', 'Seconds between API enablement checks')
  .option('--max-attempts <count>', 'API enablement checks before giving up')
  .action(async (options: PrepareOptions) => {
    process.exitCode = await runPrepare(options);
  });

/**
 * Run the full preparation and resolve to the process exit code
 */
export async function runPrepare(
  options: PrepareOptions,
  overrides: Partial<CommandContext> = {}
): Promise<number> {
  const context = resolveContext(overrides);
  const log = createCommandLogger('prepare');
  const progress = new ConsoleProgress();

  console.log(chalk.bold('\n  cloudprep\n'));

  try {
    const config = loadPrepConfig({
      env: context.env,
      cwd: context.cwd,
      projectId: options.project,
      serviceAccount: options.serviceAccount,
      apisFile: options.apisFile,
      rolesFile: options.rolesFile,
      policiesFile: options.policiesFile,
      skipBuilderRoles: options.skipBuilderRoles,
      pollIntervalSeconds: options.pollInterval,
      maxAttempts: options.maxAttempts,
    });
    log.info('Loaded configuration', config);

    await context.checkDependencies();

    const report = await runPreparation(config, context.client, {
      clock: context.clock,
      logger: log,
      hooks: progress.hooks,
    });

    printReport(report);
    return 0;
  } catch (error) {
    progress.fail();
    return reportError(error, 'prepare');
  }
}
