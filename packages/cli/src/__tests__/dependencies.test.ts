import { describe, it, expect, vi } from 'vitest';
import { MissingDependencyError } from '@cloudprep/core';
import { ensureExecutable, ensureGcloud, isExecutableAvailable } from '../gcp/dependencies';

vi.mock('../logger', () => ({
  logDebug: vi.fn(),
  logCommand: vi.fn(),
  logOutput: vi.fn(),
}));

describe('isExecutableAvailable', () => {
  it('should look the executable up on PATH', async () => {
    const probe = vi.fn(async () => ({ stdout: '/usr/bin/gcloud\n' }));

    expect(await isExecutableAvailable('gcloud', probe)).toBe(true);
    expect(probe).toHaveBeenCalledWith('which', ['gcloud']);
  });

  it('should report a missing executable', async () => {
    const probe = vi.fn(async () => {
      throw new Error('which: no gcloud');
    });

    expect(await isExecutableAvailable('gcloud', probe)).toBe(false);
  });
});

describe('ensureExecutable', () => {
  it('should check PATH and then --version', async () => {
    const probe = vi.fn(async () => ({ stdout: '' }));

    await ensureGcloud(probe);

    expect(probe.mock.calls).toEqual([
      ['which', ['gcloud']],
      ['gcloud', ['--version']],
    ]);
  });

  it('should fail with exit code 3 when the executable is missing', async () => {
    const probe = vi.fn(async (file: string) => {
      if (file === 'which') {
        throw new Error('not found');
      }
      return { stdout: '' };
    });

    const error = await ensureExecutable('terraform', probe).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MissingDependencyError);
    if (error instanceof MissingDependencyError) {
      expect(error.exitCode).toBe(3);
      expect(error.executable).toBe('terraform');
      expect(error.message).toBe("terraform command is not available, but it's needed");
    }
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('should fail when the executable cannot report its version', async () => {
    const probe = vi.fn(async (file: string) => {
      if (file === 'gcloud') {
        throw new Error('gcloud: broken install');
      }
      return { stdout: '/usr/bin/gcloud' };
    });

    await expect(ensureGcloud(probe)).rejects.toBeInstanceOf(MissingDependencyError);
  });
});
