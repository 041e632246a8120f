import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs/promises';
import { GcloudClient } from '../gcp/client';

vi.mock('../logger', () => ({
  logCommand: vi.fn(),
  logOutput: vi.fn(),
}));

const PROJECT = 'test-project';

describe('GcloudClient', () => {
  const run = vi.fn(async (_args: string[]): Promise<string> => '');

  beforeEach(() => {
    run.mockReset();
    run.mockResolvedValue('');
  });

  it('should list enabled services one per line', async () => {
    run.mockResolvedValueOnce('run.googleapis.com\niam.googleapis.com\n\n');
    const client = new GcloudClient(run);

    const services = await client.listEnabledServices(PROJECT);

    expect(services).toEqual(['run.googleapis.com', 'iam.googleapis.com']);
    expect(run).toHaveBeenCalledWith([
      'services',
      'list',
      '--project=test-project',
      '--format=value(config.name)',
    ]);
  });

  it('should enable a service on the project', async () => {
    await new GcloudClient(run).enableService(PROJECT, 'run.googleapis.com');

    expect(run).toHaveBeenCalledWith(['services', 'enable', 'run.googleapis.com', '--project=test-project']);
  });

  it('should return the policy description text', async () => {
    run.mockResolvedValueOnce('spec:\n  rules:\n  - enforce: false\n');

    const description = await new GcloudClient(run).describeOrgPolicy('compute.requireOsLogin', PROJECT);

    expect(description).toBe('spec:\n  rules:\n  - enforce: false\n');
    expect(run).toHaveBeenCalledWith(['org-policies', 'describe', 'compute.requireOsLogin', '--project=test-project']);
  });

  it('should pass the policy document through a temporary file', async () => {
    let written = '';
    let policyPath = '';
    run.mockImplementationOnce(async (args) => {
      policyPath = args[2];
      written = await fs.readFile(policyPath, 'utf-8');
      return '';
    });
    const document = {
      name: 'projects/test-project/policies/compute.requireOsLogin',
      spec: { rules: [{ enforce: false }] },
    };

    await new GcloudClient(run).setOrgPolicy(document);

    expect(run.mock.calls[0][0].slice(0, 2)).toEqual(['org-policies', 'set-policy']);
    expect(JSON.parse(written)).toEqual(document);
    await expect(fs.access(policyPath)).rejects.toThrow();
  });

  it('should remove the temporary file when set-policy fails', async () => {
    let policyPath = '';
    run.mockImplementationOnce(async (args) => {
      policyPath = args[2];
      throw new Error('PERMISSION_DENIED');
    });

    await expect(
      new GcloudClient(run).setOrgPolicy({
        name: 'projects/test-project/policies/compute.requireOsLogin',
        spec: { rules: [{ enforce: false }] },
      })
    ).rejects.toThrow('PERMISSION_DENIED');
    await expect(fs.access(policyPath)).rejects.toThrow();
  });

  it('should add an unconditional IAM binding', async () => {
    await new GcloudClient(run).addIamBinding(
      PROJECT,
      'roles/run.admin',
      'serviceAccount:deployer@test-project.iam.gserviceaccount.com'
    );

    expect(run).toHaveBeenCalledWith([
      'projects',
      'add-iam-policy-binding',
      'test-project',
      '--member=serviceAccount:deployer@test-project.iam.gserviceaccount.com',
      '--role=roles/run.admin',
      '--condition=None',
      '--quiet',
    ]);
  });

  it('should read the project number', async () => {
    run.mockResolvedValueOnce('555\n');

    const projectNumber = await new GcloudClient(run).getProjectNumber('proj-123');

    expect(projectNumber).toBe('555');
    expect(run).toHaveBeenCalledWith(['projects', 'describe', 'proj-123', '--format=value(projectNumber)']);
  });
});
