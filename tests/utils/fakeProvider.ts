import type {
  Identity,
  Instance,
  InstanceState,
  SecurityGroup,
  Snapshot,
} from '../../src/core/types.js';
import { ProviderError } from '../../src/core/errors.js';
import type {
  CloudProvider,
  CreateSecurityGroupInput,
  CreateSnapshotInput,
} from '../../src/provider/cloudProvider.js';

export function makeInstance(partial: Partial<Instance> & { id: string }): Instance {
  return {
    name: undefined,
    state: 'running',
    type: 't3.micro',
    availabilityZone: 'us-east-1a',
    launchTime: new Date('2024-03-01T08:00:00Z'),
    securityGroups: [{ id: 'sg-web', name: 'web' }],
    volumes: [{ device: '/dev/xvda', volumeId: 'vol-root' }],
    ...partial,
  };
}

/**
 * In-memory stand-in for EC2/STS. Every call is appended to `calls` as
 * "method arg"; `failures` makes the call with that exact key throw.
 */
export class FakeCloudProvider implements CloudProvider {
  readonly instances = new Map<string, Instance>();
  readonly groups: SecurityGroup[] = [];
  readonly snapshots = new Map<string, Snapshot>();
  readonly tags = new Map<string, Record<string, string>>();
  readonly calls: string[] = [];
  readonly failures = new Map<string, Error>();
  defaultVpcId: string | null = 'vpc-default';
  region = 'us-east-1';
  identity: Identity | Error = { account: '111122223333', arn: 'arn:aws:iam::111122223333:user/analyst', userId: 'AIDATEST' };
  private seq = 0;

  constructor(instances: Instance[] = []) {
    for (const i of instances) this.instances.set(i.id, i);
  }

  private record(key: string): void {
    this.calls.push(key);
    const failure = this.failures.get(key);
    if (failure) throw failure;
  }

  private nextId(prefix: string): string {
    this.seq += 1;
    return `${prefix}-${String(this.seq).padStart(4, '0')}`;
  }

  async getRegion(): Promise<string> {
    return this.region;
  }

  async getCallerIdentity(): Promise<Identity> {
    this.record('getCallerIdentity');
    if (this.identity instanceof Error) throw this.identity;
    return this.identity;
  }

  async listInstances(states?: InstanceState[]): Promise<Instance[]> {
    this.record('listInstances');
    const all = [...this.instances.values()];
    return states?.length ? all.filter((i) => states.includes(i.state)) : all;
  }

  async getInstance(instanceId: string): Promise<Instance | null> {
    this.record(`getInstance ${instanceId}`);
    return this.instances.get(instanceId) ?? null;
  }

  async startInstance(instanceId: string): Promise<void> {
    this.record(`startInstance ${instanceId}`);
    this.setState(instanceId, 'pending');
  }

  async stopInstance(instanceId: string): Promise<void> {
    this.record(`stopInstance ${instanceId}`);
    this.setState(instanceId, 'stopping');
  }

  async waitForInstanceRunning(instanceId: string): Promise<void> {
    this.record(`waitForInstanceRunning ${instanceId}`);
    this.setState(instanceId, 'running');
  }

  async getDefaultVpcId(): Promise<string | null> {
    this.record('getDefaultVpcId');
    return this.defaultVpcId;
  }

  async findSecurityGroup(name: string, vpcId: string): Promise<SecurityGroup | null> {
    this.record(`findSecurityGroup ${name}`);
    return this.groups.find((g) => g.name === name && g.vpcId === vpcId) ?? null;
  }

  async createSecurityGroup(input: CreateSecurityGroupInput): Promise<string> {
    this.record(`createSecurityGroup ${input.name}`);
    const id = this.nextId('sg');
    this.groups.push({ id, name: input.name, vpcId: input.vpcId, ingressRuleCount: 0, egressRuleCount: 1 });
    return id;
  }

  async revokeDefaultEgress(groupId: string): Promise<void> {
    this.record(`revokeDefaultEgress ${groupId}`);
    const group = this.groups.find((g) => g.id === groupId);
    if (group) group.egressRuleCount = 0;
  }

  async setInstanceSecurityGroups(instanceId: string, groupIds: string[]): Promise<void> {
    this.record(`setInstanceSecurityGroups ${instanceId}`);
    const instance = this.instances.get(instanceId);
    if (!instance) throw new ProviderError('CALL_FAILED', `ModifyInstanceAttribute ${instanceId} failed`);
    const names = new Map(instance.securityGroups.map((g) => [g.id, g.name]));
    for (const g of this.groups) names.set(g.id, g.name);
    instance.securityGroups = groupIds.map((id) => ({ id, name: names.get(id) ?? id }));
  }

  async createSnapshot(input: CreateSnapshotInput): Promise<Snapshot> {
    this.record(`createSnapshot ${input.volumeId}`);
    const snapshot: Snapshot = {
      id: this.nextId('snap'),
      volumeId: input.volumeId,
      description: input.description,
      state: 'pending',
      sizeGiB: 8,
      startTime: new Date('2024-03-02T10:00:00Z'),
      tags: {},
    };
    this.snapshots.set(snapshot.id, snapshot);
    return snapshot;
  }

  async tagResource(resourceId: string, tags: Record<string, string>): Promise<void> {
    this.record(`tagResource ${resourceId}`);
    this.tags.set(resourceId, tags);
    const snapshot = this.snapshots.get(resourceId);
    if (snapshot) snapshot.tags = { ...snapshot.tags, ...tags };
  }

  async listOwnedSnapshots(): Promise<Snapshot[]> {
    this.record('listOwnedSnapshots');
    return [...this.snapshots.values()];
  }

  async getSnapshot(snapshotId: string): Promise<Snapshot | null> {
    this.record(`getSnapshot ${snapshotId}`);
    return this.snapshots.get(snapshotId) ?? null;
  }

  async deleteSnapshot(snapshotId: string): Promise<void> {
    this.record(`deleteSnapshot ${snapshotId}`);
    this.snapshots.delete(snapshotId);
  }

  async waitForSnapshotsCompleted(snapshotIds: string[]): Promise<void> {
    this.record(`waitForSnapshotsCompleted ${snapshotIds.join(',')}`);
    for (const id of snapshotIds) {
      const snapshot = this.snapshots.get(id);
      if (snapshot) snapshot.state = 'completed';
    }
  }

  private setState(instanceId: string, state: InstanceState): void {
    const instance = this.instances.get(instanceId);
    if (instance) instance.state = state;
  }
}
