/**
 * Cloud provisioning client backed by the gcloud CLI
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import type { CloudProvisioningClient, OrgPolicyDocument } from '@cloudprep/core';
import { runGcloud, type GcloudRunner } from './exec';

export class GcloudClient implements CloudProvisioningClient {
  constructor(private readonly run: GcloudRunner = runGcloud) {}

  async listEnabledServices(projectId: string): Promise<string[]> {
    const stdout = await this.run([
      'services',
      'list',
      `--project=${projectId}`,
      '--format=value(config.name)',
    ]);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async enableService(projectId: string, apiName: string): Promise<void> {
    await this.run(['services', 'enable', apiName, `--project=${projectId}`]);
  }

  async describeOrgPolicy(policyName: string, projectId: string): Promise<string> {
    return this.run(['org-policies', 'describe', policyName, `--project=${projectId}`]);
  }

  /**
   * set-policy only reads from a file, so the document goes through a temp file
   */
  async setOrgPolicy(document: OrgPolicyDocument): Promise<void> {
    const dir = await fs.mkdtemp(path.join(tmpdir(), 'cloudprep-policy-'));
    const policyPath = path.join(dir, 'policy.json');
    try {
      await fs.writeFile(policyPath, JSON.stringify(document, null, 2));
      await this.run(['org-policies', 'set-policy', policyPath]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async addIamBinding(projectId: string, role: string, member: string): Promise<void> {
    await this.run([
      'projects',
      'add-iam-policy-binding',
      projectId,
      `--member=${member}`,
      `--role=${role}`,
      '--condition=None',
      '--quiet',
    ]);
  }

  async getProjectNumber(projectId: string): Promise<string> {
    const stdout = await this.run(['projects', 'describe', projectId, '--format=value(projectNumber)']);
    return stdout.trim();
  }
}
