import type { Clock, CloudProvisioningClient, OrgPolicyDocument } from '../types';

export type ClientCall =
  | { op: 'listEnabledServices'; projectId: string }
  | { op: 'enableService'; projectId: string; apiName: string }
  | { op: 'describeOrgPolicy'; policyName: string; projectId: string }
  | { op: 'setOrgPolicy'; document: OrgPolicyDocument }
  | { op: 'addIamBinding'; projectId: string; role: string; member: string }
  | { op: 'getProjectNumber'; projectId: string };

export interface FakeClientOptions {
  /** Services reported enabled before anything is enabled */
  enabled?: string[];
  /** Enabled APIs show up in listings after this many list calls (default 0) */
  listingLag?: number;
  /** APIs that never show up, whatever is enabled */
  neverEnabled?: string[];
  policies?: Record<string, string>;
  projectNumber?: string;
  failEnable?: Set<string>;
  failSetPolicy?: boolean;
  failRoles?: Set<string>;
}

/**
 * In-process control plane that records every call
 */
export class FakeCloudClient implements CloudProvisioningClient {
  readonly calls: ClientCall[] = [];
  private readonly enabled: string[];
  private readonly pending = new Map<string, number>();

  constructor(private readonly options: FakeClientOptions = {}) {
    this.enabled = [...(options.enabled ?? [])];
  }

  count(op: ClientCall['op']): number {
    return this.calls.filter((call) => call.op === op).length;
  }

  async listEnabledServices(projectId: string): Promise<string[]> {
    this.calls.push({ op: 'listEnabledServices', projectId });
    for (const [api, remaining] of this.pending) {
      if (remaining <= 0) {
        this.pending.delete(api);
        this.enabled.push(api);
      } else {
        this.pending.set(api, remaining - 1);
      }
    }
    return [...this.enabled];
  }

  async enableService(projectId: string, apiName: string): Promise<void> {
    this.calls.push({ op: 'enableService', projectId, apiName });
    if (this.options.failEnable?.has(apiName)) {
      throw new Error(`PERMISSION_DENIED: cannot enable ${apiName}`);
    }
    if (this.options.neverEnabled?.includes(apiName)) {
      return;
    }
    this.pending.set(apiName, this.options.listingLag ?? 0);
  }

  async describeOrgPolicy(policyName: string, projectId: string): Promise<string> {
    this.calls.push({ op: 'describeOrgPolicy', policyName, projectId });
    const description = this.options.policies?.[policyName];
    if (description === undefined) {
      throw new Error(`NOT_FOUND: policy ${policyName} is not set on projects/${projectId}`);
    }
    return description;
  }

  async setOrgPolicy(document: OrgPolicyDocument): Promise<void> {
    this.calls.push({ op: 'setOrgPolicy', document });
    if (this.options.failSetPolicy) {
      throw new Error('PERMISSION_DENIED: orgpolicy.policies.update');
    }
  }

  async addIamBinding(projectId: string, role: string, member: string): Promise<void> {
    this.calls.push({ op: 'addIamBinding', projectId, role, member });
    if (this.options.failRoles?.has(role)) {
      throw new Error(`PERMISSION_DENIED: cannot grant ${role}`);
    }
  }

  async getProjectNumber(projectId: string): Promise<string> {
    this.calls.push({ op: 'getProjectNumber', projectId });
    return this.options.projectNumber ?? '123456789012';
  }
}

/**
 * Clock that records requested sleeps and returns immediately
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }

  get elapsedMs(): number {
    return this.sleeps.reduce((total, ms) => total + ms, 0);
  }
}
