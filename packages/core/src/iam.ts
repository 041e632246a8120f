/**
 * IAM role grants
 *
 * Bindings are added without reading the current policy first. Adding a
 * binding that already exists is a no-op on the control plane.
 */

import { GrantFailureError } from './errors';
import { noopLogger } from './logger';
import type { BuilderGrantResult, CloudProvisioningClient, PrepLogger, RoleBinding } from './types';

/**
 * Roles the default compute service account needs for builds that push to
 * Artifact Registry. Builds stopped getting them implicitly in 2024.
 */
export const BUILDER_ROLES = [
  'roles/logging.logWriter',
  'roles/storage.objectUser',
  'roles/artifactregistry.createOnPushWriter',
] as const;

const MEMBER_TYPE_PREFIX = /^(serviceAccount|user|group|domain|principal|principalSet):/;

export interface GrantOptions {
  logger?: PrepLogger;
  onGranted?: (binding: RoleBinding) => void;
}

/**
 * Default compute service account for a project number
 */
export function deriveComputeServicePrincipal(projectNumber: string): string {
  return `${projectNumber}-compute@developer.gserviceaccount.com`;
}

/**
 * Render a principal as an IAM member, defaulting to a service account
 */
export function toMember(principal: string): string {
  const trimmed = principal.trim();
  return MEMBER_TYPE_PREFIX.test(trimmed) ? trimmed : `serviceAccount:${trimmed}`;
}

/**
 * Grant each role to the principal, in order. The first failure aborts the batch.
 */
export async function grantRoles(
  client: CloudProvisioningClient,
  projectId: string,
  principal: string,
  roles: readonly string[],
  options: GrantOptions = {}
): Promise<RoleBinding[]> {
  const logger = options.logger ?? noopLogger;
  const member = toMember(principal);
  const granted: RoleBinding[] = [];

  for (const role of roles) {
    const binding: RoleBinding = { role, member };
    logger.info(`Granting ${role} to ${member}`, { projectId });
    try {
      await client.addIamBinding(projectId, role, member);
    } catch (error) {
      logger.error(`Granting ${role} to ${member} failed`, error);
      throw new GrantFailureError(`Could not grant ${role} to ${member}`, error, binding);
    }
    granted.push(binding);
    options.onGranted?.(binding);
  }

  return granted;
}

/**
 * Grant the fixed builder roles to the project's default compute service account
 */
export async function grantBuilderDefaults(
  client: CloudProvisioningClient,
  projectId: string,
  options: GrantOptions = {}
): Promise<BuilderGrantResult> {
  let projectNumber: string;
  try {
    projectNumber = (await client.getProjectNumber(projectId)).trim();
  } catch (error) {
    throw new GrantFailureError(`Could not resolve the project number of ${projectId}`, error);
  }
  if (!/^\d+$/.test(projectNumber)) {
    throw new GrantFailureError(
      `Could not resolve the project number of ${projectId}`,
      `unexpected value '${projectNumber}'`
    );
  }

  const principal = deriveComputeServicePrincipal(projectNumber);
  await grantRoles(client, projectId, principal, BUILDER_ROLES, options);

  return { projectNumber, principal, roles: [...BUILDER_ROLES] };
}
