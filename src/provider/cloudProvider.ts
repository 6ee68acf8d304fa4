import type { Identity, Instance, InstanceState, SecurityGroup, Snapshot } from '../core/types.js';

export interface CreateSecurityGroupInput {
  name: string;
  description: string;
  vpcId: string;
}

export interface CreateSnapshotInput {
  volumeId: string;
  description: string;
}

/**
 * Everything the workflows need from the cloud. The AWS implementation lives in
 * awsProvider.ts; tests substitute an in-memory fake.
 *
 * Lookups return null for a missing resource; every other failure is thrown as a
 * ProviderError carrying the resource id and the provider message.
 */
export interface CloudProvider {
  /** Region the provider talks to, as resolved by the client configuration. */
  getRegion(): Promise<string>;

  getCallerIdentity(): Promise<Identity>;

  /** Instances in provider listing order, optionally restricted to the given states. */
  listInstances(states?: InstanceState[]): Promise<Instance[]>;
  getInstance(instanceId: string): Promise<Instance | null>;
  startInstance(instanceId: string): Promise<void>;
  stopInstance(instanceId: string): Promise<void>;
  waitForInstanceRunning(instanceId: string, maxWaitSeconds: number): Promise<void>;

  getDefaultVpcId(): Promise<string | null>;
  findSecurityGroup(name: string, vpcId: string): Promise<SecurityGroup | null>;
  createSecurityGroup(input: CreateSecurityGroupInput): Promise<string>;
  /** Removes the all-protocol egress-to-anywhere rule AWS adds to new groups. */
  revokeDefaultEgress(groupId: string): Promise<void>;
  /** Replaces the whole security-group set of the instance's primary interface. */
  setInstanceSecurityGroups(instanceId: string, groupIds: string[]): Promise<void>;

  createSnapshot(input: CreateSnapshotInput): Promise<Snapshot>;
  tagResource(resourceId: string, tags: Record<string, string>): Promise<void>;
  listOwnedSnapshots(): Promise<Snapshot[]>;
  getSnapshot(snapshotId: string): Promise<Snapshot | null>;
  deleteSnapshot(snapshotId: string): Promise<void>;
  waitForSnapshotsCompleted(snapshotIds: string[], maxWaitSeconds: number): Promise<void>;
}
