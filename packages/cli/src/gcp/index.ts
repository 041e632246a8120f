/**
 * gcloud-backed control plane access
 */

export { GcloudClient } from './client';
export { GCLOUD, GcloudCommandError, runGcloud, type GcloudRunner } from './exec';
export {
  ensureExecutable,
  ensureGcloud,
  isExecutableAvailable,
  isExecutableUsable,
  type ProbeFn,
} from './dependencies';
