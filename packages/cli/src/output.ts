/**
 * Console output for cloudprep commands
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  EXIT_ENFORCEMENT_FAILURE,
  isPrepError,
  type PrepHooks,
  type PrepStep,
  type PreparationReport,
} from '@cloudprep/core';
import { GCLOUD, GcloudCommandError } from './gcp/exec';
import { getLogPath, logFullError } from './logger';

const STEP_TITLES: Record<PrepStep, string> = {
  apis: 'Enabling project APIs',
  policies: 'Checking organization policies',
  roles: 'Granting deployer roles',
  builder: 'Granting build service account roles',
};

function divider(): string {
  const width = process.stdout.columns || 80;
  return '*'.repeat(width);
}

export function sectionOpen(title: string): void {
  console.log(divider());
  console.log(chalk.cyan(title));
  console.log(divider());
}

export function sectionClose(title: string): void {
  console.log(divider());
  console.log(`${chalk.cyan(title)} ${chalk.bold.cyan('- done')}`);
  console.log('\n');
}

/**
 * Find the failed gcloud call behind an error, if any
 */
export function findGcloudFailure(error: unknown): GcloudCommandError | undefined {
  let current = error;
  while (current instanceof Error) {
    if (current instanceof GcloudCommandError) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Print an error for the operator and return the exit code to use
 */
export function reportError(error: unknown, context: string): number {
  const failure = findGcloudFailure(error);
  logFullError(
    context,
    error,
    failure ? { command: `${GCLOUD} ${failure.args.join(' ')}`, stderr: failure.stderr } : undefined
  );

  if (isPrepError(error)) {
    console.error(chalk.red(`\n[ERROR]: ${error.message}. Terminating...`));
    if (error.remediation) {
      console.error(chalk.gray(`  ${error.remediation}`));
    }
    console.error(chalk.gray(`  Debug log: ${getLogPath()}\n`));
    return error.exitCode;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n[ERROR]: ${message}`));
  console.error(chalk.gray(`  Debug log: ${getLogPath()}\n`));
  return EXIT_ENFORCEMENT_FAILURE;
}

/**
 * Progress rendering: banners per step and a spinner per API poll
 */
export class ConsoleProgress {
  private spinner: Ora | null = null;

  readonly hooks: PrepHooks = {
    onStepStart: (step) => sectionOpen(STEP_TITLES[step]),
    onStepComplete: (step) => sectionClose(STEP_TITLES[step]),
    onApiPoll: (api, attempt) => this.poll(api, attempt),
    onApiEnabled: (result) => this.succeed(`${result.api} api is enabled`),
    onPolicyChecked: (result) => {
      const label = result.outcome === 'satisfied' ? 'already in place' : 'applied';
      console.log(chalk.green(`  ✓ policy ${result.policyName} ${label}`));
    },
    onRoleGranted: (binding) => {
      console.log(chalk.green(`  ✓ ${binding.role}`) + chalk.gray(` → ${binding.member}`));
    },
  };

  private poll(api: string, attempt: number): void {
    if (attempt === 1 || !this.spinner) {
      this.spinner = ora(`Waiting for ${api}...`).start();
    } else {
      this.spinner.text = `Waiting for ${api}... (check ${attempt})`;
    }
  }

  private succeed(text: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      console.log(chalk.green(`  ✓ ${text}`));
    }
  }

  /**
   * Stop a spinner left running by a failed step
   */
  fail(): void {
    if (this.spinner) {
      this.spinner.fail();
      this.spinner = null;
    }
  }
}

export function printReport(report: PreparationReport): void {
  console.log(chalk.bold(`\n  Project ${report.projectId} is ready for deployment\n`));
  console.log(chalk.gray(`  APIs enabled:       ${report.apis.length}`));
  console.log(chalk.gray(`  Policies checked:   ${report.policies.length}`));
  console.log(chalk.gray(`  Deployer roles:     ${report.deployerRoles.length}`));
  if (report.builder) {
    console.log(chalk.gray(`  Builder principal:  ${report.builder.principal}`));
  }
  console.log('');
}
