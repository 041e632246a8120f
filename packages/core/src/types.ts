// Control plane client

/**
 * The only interface to the cloud control plane.
 *
 * Every method is a blocking round trip; implementations must not retry.
 */
export interface CloudProvisioningClient {
  listEnabledServices(projectId: string): Promise<string[]>;
  enableService(projectId: string, apiName: string): Promise<void>;
  /** Resolves to the textual description of the project-level policy. */
  describeOrgPolicy(policyName: string, projectId: string): Promise<string>;
  setOrgPolicy(document: OrgPolicyDocument): Promise<void>;
  addIamBinding(projectId: string, role: string, member: string): Promise<void>;
  getProjectNumber(projectId: string): Promise<string>;
}

// API enablement

export interface ApiEnablementResult {
  api: string;
  /** Number of listings it took to see the API */
  polls: number;
}

// Org policy

export interface OrgPolicyRule {
  policyName: string;
  /** Text expected in the described policy once the rule is in place */
  rulePattern: string;
  /** JSON object fragment, e.g. `"enforce": false` */
  ruleSetPayload: string;
}

export interface OrgPolicyDocument {
  name: string;
  spec: {
    rules: Array<Record<string, unknown>>;
  };
}

export type PolicyOutcome = 'satisfied' | 'applied';

export interface PolicyResult {
  policyName: string;
  outcome: PolicyOutcome;
}

// IAM

export interface RoleBinding {
  role: string;
  member: string;
}

export interface BuilderGrantResult {
  projectNumber: string;
  principal: string;
  roles: string[];
}

// Configuration

export interface PollingOptions {
  intervalMs: number;
  maxAttempts: number;
}

export interface PrepConfig {
  projectId: string;
  apis: string[];
  roles: string[];
  deployerPrincipal?: string;
  policies: OrgPolicyRule[];
  grantBuilderRoles: boolean;
  polling: PollingOptions;
}

// Runtime collaborators

export interface Clock {
  sleep(ms: number): Promise<void>;
}

export interface PrepLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

export type PrepStep = 'apis' | 'policies' | 'roles' | 'builder';

export interface PrepHooks {
  onStepStart?: (step: PrepStep) => void;
  onStepComplete?: (step: PrepStep) => void;
  onApiPoll?: (api: string, attempt: number) => void;
  onApiEnabled?: (result: ApiEnablementResult) => void;
  onPolicyChecked?: (result: PolicyResult) => void;
  onRoleGranted?: (binding: RoleBinding) => void;
}

export interface PreparationReport {
  projectId: string;
  apis: ApiEnablementResult[];
  policies: PolicyResult[];
  deployerRoles: RoleBinding[];
  builder: BuilderGrantResult | null;
}
