/**
 * @cloudprep/cli
 *
 * CLI entry point for preparing a GCP project before provisioning.
 */

import { Command } from 'commander';
import { prepareCommand, apisCommand, policyCommand, rolesCommand } from './commands';

const program = new Command();

program
  .name('cloudprep')
  .description('Prepare a Google Cloud project for infrastructure deployment')
  .version('0.1.0');

program.addCommand(prepareCommand, { isDefault: true });
program.addCommand(apisCommand);
program.addCommand(policyCommand);
program.addCommand(rolesCommand);

await program.parseAsync(process.argv);
