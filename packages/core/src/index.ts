// Types
export type {
  CloudProvisioningClient,
  ApiEnablementResult,
  OrgPolicyRule,
  OrgPolicyDocument,
  PolicyOutcome,
  PolicyResult,
  RoleBinding,
  BuilderGrantResult,
  PollingOptions,
  PrepConfig,
  Clock,
  PrepLogger,
  PrepStep,
  PrepHooks,
  PreparationReport,
} from './types';

// Errors
export {
  PrepError,
  MissingDependencyError,
  MissingVariableError,
  ConfigurationError,
  ApiEnablementTimeoutError,
  ApiEnableRequestError,
  PolicyEnforcementError,
  GrantFailureError,
  EXIT_ENFORCEMENT_FAILURE,
  EXIT_VARIABLE_NOT_DEFINED,
  EXIT_MISSING_DEPENDENCY,
  describeCause,
  isPrepError,
} from './errors';

// Polling
export { DEFAULT_POLLING, systemClock, pollUntil, type PollOutcome } from './poll';
export { noopLogger } from './logger';

// Reconcilers
export { enableAndVerify, enableAll, isApiListed, type ApiEnablementOptions } from './apis';
export {
  ensureRule,
  buildPolicyDocument,
  parseRulePayload,
  type OrgPolicyOptions,
} from './org-policy';
export {
  BUILDER_ROLES,
  deriveComputeServicePrincipal,
  toMember,
  grantRoles,
  grantBuilderDefaults,
  type GrantOptions,
} from './iam';

// Orchestration
export { runPreparation, type PreparationOptions } from './orchestrator';

// Configuration
export {
  DEFAULT_APIS_FILE,
  DEFAULT_ROLES_FILE,
  DEFAULT_POLICIES_FILE,
  loadPrepConfig,
  parseList,
  readListFile,
  parseOrgPolicies,
  resolvePolling,
  resolveProjectId,
  validatePrepConfig,
  type ConfigSources,
} from './config';
