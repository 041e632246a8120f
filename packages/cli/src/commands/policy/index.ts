/**
 * Org policy commands
 */

import { Command } from 'commander';
import { ensureCommand } from './ensure';

export { runEnsurePolicy, type EnsurePolicyOptions } from './ensure';

export const policyCommand = new Command('policy')
  .description('Enforce organization policy rules on the project')
  .addCommand(ensureCommand);
