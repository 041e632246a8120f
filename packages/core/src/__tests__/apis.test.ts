import { describe, it, expect, vi } from 'vitest';
import { enableAll, enableAndVerify, isApiListed } from '../apis';
import { ApiEnablementTimeoutError, ApiEnableRequestError } from '../errors';
import { DEFAULT_POLLING } from '../poll';
import { FakeClock, FakeCloudClient } from './fake-client';

const PROJECT = 'test-project';

describe('isApiListed', () => {
  it('should match an exact service name', () => {
    expect(isApiListed(['run.googleapis.com'], 'run.googleapis.com')).toBe(true);
  });

  it('should match mixed-case identifiers', () => {
    expect(isApiListed(['run.googleapis.com'], 'Run.GoogleAPIs.com')).toBe(true);
    expect(isApiListed(['IAM.googleapis.com'], 'iam.googleapis.com')).toBe(true);
  });

  it('should match a name inside a wider listing line', () => {
    expect(isApiListed(['run.googleapis.com   Cloud Run Admin API'], 'run.googleapis.com')).toBe(true);
  });

  it('should not match a missing service', () => {
    expect(isApiListed(['run.googleapis.com'], 'iam.googleapis.com')).toBe(false);
  });

  it('should never match an empty name', () => {
    expect(isApiListed(['run.googleapis.com'], '  ')).toBe(false);
  });
});

describe('enableAndVerify', () => {
  it('should return after one poll when the API shows up immediately', async () => {
    const client = new FakeCloudClient();
    const clock = new FakeClock();

    const result = await enableAndVerify(client, PROJECT, 'run.googleapis.com', { clock });

    expect(result).toEqual({ api: 'run.googleapis.com', polls: 1 });
    expect(client.count('enableService')).toBe(1);
    expect(client.count('listEnabledServices')).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should keep polling at a fixed interval until the API is listed', async () => {
    const client = new FakeCloudClient({ listingLag: 3 });
    const clock = new FakeClock();
    const onPoll = vi.fn();

    const result = await enableAndVerify(client, PROJECT, 'run.googleapis.com', { clock, onPoll });

    expect(result.polls).toBe(4);
    expect(client.count('listEnabledServices')).toBe(4);
    expect(clock.sleeps).toEqual([6000, 6000, 6000]);
    expect(onPoll.mock.calls).toEqual([
      ['run.googleapis.com', 1],
      ['run.googleapis.com', 2],
      ['run.googleapis.com', 3],
      ['run.googleapis.com', 4],
    ]);
  });

  it('should find an API requested in mixed case', async () => {
    const client = new FakeCloudClient({ enabled: ['iam.googleapis.com'], neverEnabled: ['IAM.GoogleAPIs.com'] });
    const clock = new FakeClock();

    const result = await enableAndVerify(client, PROJECT, 'IAM.GoogleAPIs.com', { clock });

    expect(result.polls).toBe(1);
  });

  it('should time out after exactly 100 polls', async () => {
    const client = new FakeCloudClient({ neverEnabled: ['fake.api'] });
    const clock = new FakeClock();

    const attempt = enableAndVerify(client, PROJECT, 'fake.api', { clock });

    await expect(attempt).rejects.toBeInstanceOf(ApiEnablementTimeoutError);
    await expect(attempt).rejects.toThrow('fake.api api is not enabled');
    expect(client.count('enableService')).toBe(1);
    expect(client.count('listEnabledServices')).toBe(DEFAULT_POLLING.maxAttempts);
    expect(clock.sleeps).toHaveLength(99);
    expect(clock.elapsedMs).toBeLessThanOrEqual(600_000);
  });

  it('should report the exit code and attempts on timeout', async () => {
    const client = new FakeCloudClient({ neverEnabled: ['fake.api'] });

    const error = await enableAndVerify(client, PROJECT, 'fake.api', {
      clock: new FakeClock(),
      polling: { intervalMs: 10, maxAttempts: 5 },
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiEnablementTimeoutError);
    if (error instanceof ApiEnablementTimeoutError) {
      expect(error.exitCode).toBe(1);
      expect(error.api).toBe('fake.api');
      expect(error.attempts).toBe(5);
    }
    expect(client.count('listEnabledServices')).toBe(5);
  });

  it('should count a failed listing as an unsuccessful poll', async () => {
    const client = new FakeCloudClient();
    const listing = vi
      .spyOn(client, 'listEnabledServices')
      .mockRejectedValueOnce(new Error('UNAVAILABLE'))
      .mockResolvedValueOnce(['run.googleapis.com']);
    const clock = new FakeClock();

    const result = await enableAndVerify(client, PROJECT, 'run.googleapis.com', { clock });

    expect(result.polls).toBe(2);
    expect(listing).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([6000]);
  });

  it('should fail without polling when the enable request is rejected', async () => {
    const client = new FakeCloudClient({ failEnable: new Set(['secret.googleapis.com']) });

    await expect(
      enableAndVerify(client, PROJECT, 'secret.googleapis.com', { clock: new FakeClock() })
    ).rejects.toBeInstanceOf(ApiEnableRequestError);
    expect(client.count('listEnabledServices')).toBe(0);
  });
});

describe('enableAll', () => {
  it('should enable APIs in order', async () => {
    const client = new FakeCloudClient();

    const results = await enableAll(client, PROJECT, ['run.googleapis.com', 'iam.googleapis.com'], {
      clock: new FakeClock(),
    });

    expect(results.map((r) => r.api)).toEqual(['run.googleapis.com', 'iam.googleapis.com']);
    expect(
      client.calls.flatMap((call) => (call.op === 'enableService' ? [call.apiName] : []))
    ).toEqual(['run.googleapis.com', 'iam.googleapis.com']);
  });

  it('should stop at the first API that does not come up', async () => {
    const client = new FakeCloudClient({ neverEnabled: ['fake.api'] });

    await expect(
      enableAll(client, PROJECT, ['fake.api', 'run.googleapis.com'], {
        clock: new FakeClock(),
        polling: { intervalMs: 1, maxAttempts: 3 },
      })
    ).rejects.toBeInstanceOf(ApiEnablementTimeoutError);
    expect(client.count('enableService')).toBe(1);
  });
});
