/**
 * cloudprep commands
 *
 * - prepare  - The full run (APIs, org policies, deployer and builder roles)
 * - apis/    - API enablement
 * - policy/  - Org policy enforcement
 * - roles/   - IAM grants
 */

export { prepareCommand, runPrepare, type PrepareOptions } from './prepare';
export { apisCommand, runEnableApis } from './apis';
export { policyCommand, runEnsurePolicy } from './policy';
export { rolesCommand, runGrantRoles, runBuilderRoles } from './roles';
export { resolveContext, type CommandContext } from './context';
