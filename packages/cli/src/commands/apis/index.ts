/**
 * API commands
 */

import { Command } from 'commander';
import { enableCommand } from './enable';

export { runEnableApis, type EnableApisOptions } from './enable';

export const apisCommand = new Command('apis')
  .description('Manage project APIs')
  .addCommand(enableCommand);
