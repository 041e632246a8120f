/**
 * Error taxonomy for project preparation.
 *
 * Every error carries the process exit code the CLI should use and a
 * remediation hint for the operator.
 */

export const EXIT_ENFORCEMENT_FAILURE = 1;
export const EXIT_VARIABLE_NOT_DEFINED = 2;
export const EXIT_MISSING_DEPENDENCY = 3;

export class PrepError extends Error {
  readonly exitCode: number;
  readonly remediation?: string;

  constructor(message: string, exitCode: number, remediation?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PrepError';
    this.exitCode = exitCode;
    this.remediation = remediation;
  }
}

export class MissingDependencyError extends PrepError {
  readonly executable: string;

  constructor(executable: string) {
    super(
      `${executable} command is not available, but it's needed`,
      EXIT_MISSING_DEPENDENCY,
      `Make ${executable} available in PATH and try again`
    );
    this.name = 'MissingDependencyError';
    this.executable = executable;
  }
}

export class MissingVariableError extends PrepError {
  readonly variable: string;

  constructor(variable: string, description: string) {
    super(
      `${variable} environment variable that points to ${description} is not defined`,
      EXIT_VARIABLE_NOT_DEFINED,
      `Export ${variable} or pass it as an option`
    );
    this.name = 'MissingVariableError';
    this.variable = variable;
  }
}

export class ConfigurationError extends PrepError {
  constructor(message: string, remediation?: string) {
    super(message, EXIT_VARIABLE_NOT_DEFINED, remediation);
    this.name = 'ConfigurationError';
  }
}

export class ApiEnablementTimeoutError extends PrepError {
  readonly api: string;
  readonly attempts: number;

  constructor(api: string, attempts: number) {
    super(
      `${api} api is not enabled after ${attempts} checks, installation can not continue`,
      EXIT_ENFORCEMENT_FAILURE,
      `Check the API name and that billing is enabled, then re-run`
    );
    this.name = 'ApiEnablementTimeoutError';
    this.api = api;
    this.attempts = attempts;
  }
}

export class ApiEnableRequestError extends PrepError {
  readonly api: string;

  constructor(api: string, cause: unknown) {
    super(
      `Request to enable ${api} was rejected: ${describeCause(cause)}`,
      EXIT_ENFORCEMENT_FAILURE,
      `Check that ${api} exists and that you may enable services on the project`,
      cause
    );
    this.name = 'ApiEnableRequestError';
    this.api = api;
  }
}

export class PolicyEnforcementError extends PrepError {
  readonly policyName: string;

  constructor(policyName: string, rulePattern: string, cause: unknown) {
    super(
      `Org policy '${policyName}' with rule '${rulePattern}' cannot be set but is required: ${describeCause(cause)}`,
      EXIT_ENFORCEMENT_FAILURE,
      'Contact your org-admin to set the policy before continuing with the deployment',
      cause
    );
    this.name = 'PolicyEnforcementError';
    this.policyName = policyName;
  }
}

export class GrantFailureError extends PrepError {
  readonly role?: string;
  readonly member?: string;

  constructor(message: string, cause: unknown, binding?: { role: string; member: string }) {
    super(
      `${message}: ${describeCause(cause)}`,
      EXIT_ENFORCEMENT_FAILURE,
      'Make sure the caller may set the project IAM policy (roles/resourcemanager.projectIamAdmin)',
      cause
    );
    this.name = 'GrantFailureError';
    this.role = binding?.role;
    this.member = binding?.member;
  }
}

/**
 * Render an unknown thrown value as a single line
 */
export function describeCause(cause: unknown): string {
  const text = cause instanceof Error ? cause.message : String(cause);
  const firstLine = text.trim().split('\n')[0];
  return firstLine || 'unknown error';
}

export function isPrepError(error: unknown): error is PrepError {
  return error instanceof PrepError;
}
