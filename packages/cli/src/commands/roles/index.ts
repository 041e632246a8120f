/**
 * IAM role commands
 */

import { Command } from 'commander';
import { builderCommand } from './builder';
import { grantCommand } from './grant';

export { runGrantRoles, type GrantRolesOptions } from './grant';
export { runBuilderRoles, type BuilderRolesOptions } from './builder';

export const rolesCommand = new Command('roles')
  .description('Grant IAM roles on the project')
  .addCommand(grantCommand)
  .addCommand(builderCommand);
