import {
  EC2Client,
  CreateSecurityGroupCommand,
  CreateSnapshotCommand,
  CreateTagsCommand,
  DeleteSnapshotCommand,
  DescribeInstancesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSnapshotsCommand,
  DescribeVpcsCommand,
  ModifyInstanceAttributeCommand,
  RevokeSecurityGroupEgressCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  waitUntilInstanceRunning,
  waitUntilSnapshotCompleted,
  type Filter,
  type Instance as Ec2Instance,
  type Snapshot as Ec2Snapshot,
  type Tag,
} from '@aws-sdk/client-ec2';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { ProviderError } from '../core/errors.js';
import type {
  Identity,
  Instance,
  InstanceState,
  SecurityGroup,
  Snapshot,
  SnapshotState,
} from '../core/types.js';
import type { CloudProvider, CreateSecurityGroupInput, CreateSnapshotInput } from './cloudProvider.js';

export interface AwsProviderOptions {
  region?: string;
  profile?: string;
  ec2?: EC2Client;
  sts?: STSClient;
}

const INSTANCE_STATES: readonly InstanceState[] = [
  'pending',
  'running',
  'shutting-down',
  'stopping',
  'stopped',
  'terminated',
];
const SNAPSHOT_STATES: readonly SnapshotState[] = [
  'pending',
  'completed',
  'error',
  'recoverable',
  'recovering',
];

const NOT_FOUND_CODES = new Set([
  'InvalidInstanceID.NotFound',
  'InvalidInstanceID.Malformed',
  'InvalidSnapshot.NotFound',
  'InvalidSnapshotID.Malformed',
  'InvalidGroup.NotFound',
]);

function awsErrorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function isNotFound(err: unknown): boolean {
  const name = awsErrorName(err);
  return name !== undefined && NOT_FOUND_CODES.has(name);
}

function wrap(action: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const name = awsErrorName(err);
  const message = err instanceof Error ? err.message : String(err);
  const code = name === 'InvalidSnapshot.InUse' || name === 'DependencyViolation'
    ? 'DEPENDENCY_VIOLATION'
    : 'CALL_FAILED';
  return new ProviderError(code, `${action} failed: ${message}`, err, name);
}

function tagsToRecord(tags: Tag[] | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key && tag.Value !== undefined) out[tag.Key] = tag.Value;
  }
  return out;
}

function toInstanceState(name: string | undefined): InstanceState {
  return INSTANCE_STATES.find((s) => s === name) ?? 'pending';
}

function toSnapshotState(name: string | undefined): SnapshotState {
  return SNAPSHOT_STATES.find((s) => s === name) ?? 'pending';
}

export function mapInstance(raw: Ec2Instance): Instance {
  const tags = tagsToRecord(raw.Tags);
  return {
    id: raw.InstanceId ?? '',
    name: tags['Name'],
    state: toInstanceState(raw.State?.Name),
    type: raw.InstanceType ?? 'unknown',
    availabilityZone: raw.Placement?.AvailabilityZone ?? 'unknown',
    launchTime: raw.LaunchTime,
    publicIp: raw.PublicIpAddress,
    privateIp: raw.PrivateIpAddress,
    securityGroups: (raw.SecurityGroups ?? []).map((g) => ({
      id: g.GroupId ?? '',
      name: g.GroupName ?? '',
    })),
    volumes: (raw.BlockDeviceMappings ?? [])
      .filter((m) => m.Ebs?.VolumeId)
      .map((m) => ({ device: m.DeviceName ?? 'unknown', volumeId: m.Ebs?.VolumeId ?? '' })),
  };
}

export function mapSnapshot(raw: Ec2Snapshot): Snapshot {
  return {
    id: raw.SnapshotId ?? '',
    volumeId: raw.VolumeId ?? '',
    description: raw.Description ?? '',
    state: toSnapshotState(raw.State),
    sizeGiB: raw.VolumeSize ?? 0,
    startTime: raw.StartTime,
    tags: tagsToRecord(raw.Tags),
  };
}

export class AwsCloudProvider implements CloudProvider {
  private readonly ec2: EC2Client;
  private readonly sts: STSClient;

  constructor(opts: AwsProviderOptions = {}) {
    const clientConfig = { region: opts.region, profile: opts.profile };
    this.ec2 = opts.ec2 ?? new EC2Client(clientConfig);
    this.sts = opts.sts ?? new STSClient(clientConfig);
  }

  async getRegion(): Promise<string> {
    try {
      return await this.ec2.config.region();
    } catch {
      return 'unknown';
    }
  }

  async getCallerIdentity(): Promise<Identity> {
    const out = await this.sts.send(new GetCallerIdentityCommand({}));
    return { account: out.Account ?? '', arn: out.Arn ?? '', userId: out.UserId ?? '' };
  }

  async listInstances(states?: InstanceState[]): Promise<Instance[]> {
    const filters: Filter[] | undefined = states?.length
      ? [{ Name: 'instance-state-name', Values: states }]
      : undefined;
    const instances: Instance[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const page = await this.ec2.send(
          new DescribeInstancesCommand({ Filters: filters, NextToken: nextToken }),
        );
        for (const reservation of page.Reservations ?? []) {
          for (const raw of reservation.Instances ?? []) {
            instances.push(mapInstance(raw));
          }
        }
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (err) {
      throw wrap('DescribeInstances', err);
    }
    return instances;
  }

  async getInstance(instanceId: string): Promise<Instance | null> {
    try {
      const out = await this.ec2.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
      const raw = out.Reservations?.[0]?.Instances?.[0];
      return raw ? mapInstance(raw) : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw wrap(`DescribeInstances ${instanceId}`, err);
    }
  }

  async startInstance(instanceId: string): Promise<void> {
    try {
      await this.ec2.send(new StartInstancesCommand({ InstanceIds: [instanceId] }));
    } catch (err) {
      throw wrap(`StartInstances ${instanceId}`, err);
    }
  }

  async stopInstance(instanceId: string): Promise<void> {
    try {
      await this.ec2.send(new StopInstancesCommand({ InstanceIds: [instanceId] }));
    } catch (err) {
      throw wrap(`StopInstances ${instanceId}`, err);
    }
  }

  async waitForInstanceRunning(instanceId: string, maxWaitSeconds: number): Promise<void> {
    try {
      await waitUntilInstanceRunning(
        { client: this.ec2, maxWaitTime: maxWaitSeconds },
        { InstanceIds: [instanceId] },
      );
    } catch (err) {
      throw new ProviderError(
        'WAIT_TIMEOUT',
        `Instance ${instanceId} did not reach running within ${maxWaitSeconds}s`,
        err,
      );
    }
  }

  async getDefaultVpcId(): Promise<string | null> {
    try {
      const out = await this.ec2.send(
        new DescribeVpcsCommand({ Filters: [{ Name: 'isDefault', Values: ['true'] }] }),
      );
      return out.Vpcs?.[0]?.VpcId ?? null;
    } catch (err) {
      throw wrap('DescribeVpcs', err);
    }
  }

  async findSecurityGroup(name: string, vpcId: string): Promise<SecurityGroup | null> {
    try {
      const out = await this.ec2.send(
        new DescribeSecurityGroupsCommand({
          Filters: [
            { Name: 'group-name', Values: [name] },
            { Name: 'vpc-id', Values: [vpcId] },
          ],
        }),
      );
      const raw = out.SecurityGroups?.[0];
      if (!raw?.GroupId) return null;
      return {
        id: raw.GroupId,
        name: raw.GroupName ?? name,
        vpcId: raw.VpcId,
        ingressRuleCount: raw.IpPermissions?.length ?? 0,
        egressRuleCount: raw.IpPermissionsEgress?.length ?? 0,
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw wrap(`DescribeSecurityGroups ${name}`, err);
    }
  }

  async createSecurityGroup(input: CreateSecurityGroupInput): Promise<string> {
    try {
      const out = await this.ec2.send(
        new CreateSecurityGroupCommand({
          GroupName: input.name,
          Description: input.description,
          VpcId: input.vpcId,
        }),
      );
      if (!out.GroupId) {
        throw new ProviderError('CALL_FAILED', `CreateSecurityGroup ${input.name} returned no id`);
      }
      return out.GroupId;
    } catch (err) {
      throw wrap(`CreateSecurityGroup ${input.name}`, err);
    }
  }

  async revokeDefaultEgress(groupId: string): Promise<void> {
    try {
      await this.ec2.send(
        new RevokeSecurityGroupEgressCommand({
          GroupId: groupId,
          IpPermissions: [{ IpProtocol: '-1', IpRanges: [{ CidrIp: '0.0.0.0/0' }] }],
        }),
      );
    } catch (err) {
      throw wrap(`RevokeSecurityGroupEgress ${groupId}`, err);
    }
  }

  async setInstanceSecurityGroups(instanceId: string, groupIds: string[]): Promise<void> {
    try {
      await this.ec2.send(new ModifyInstanceAttributeCommand({ InstanceId: instanceId, Groups: groupIds }));
    } catch (err) {
      throw wrap(`ModifyInstanceAttribute ${instanceId}`, err);
    }
  }

  async createSnapshot(input: CreateSnapshotInput): Promise<Snapshot> {
    try {
      const out = await this.ec2.send(
        new CreateSnapshotCommand({ VolumeId: input.volumeId, Description: input.description }),
      );
      if (!out.SnapshotId) {
        throw new ProviderError('CALL_FAILED', `CreateSnapshot ${input.volumeId} returned no id`);
      }
      return mapSnapshot(out);
    } catch (err) {
      throw wrap(`CreateSnapshot ${input.volumeId}`, err);
    }
  }

  async tagResource(resourceId: string, tags: Record<string, string>): Promise<void> {
    try {
      await this.ec2.send(
        new CreateTagsCommand({
          Resources: [resourceId],
          Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
        }),
      );
    } catch (err) {
      throw wrap(`CreateTags ${resourceId}`, err);
    }
  }

  async listOwnedSnapshots(): Promise<Snapshot[]> {
    const snapshots: Snapshot[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const page = await this.ec2.send(
          new DescribeSnapshotsCommand({ OwnerIds: ['self'], NextToken: nextToken }),
        );
        for (const raw of page.Snapshots ?? []) snapshots.push(mapSnapshot(raw));
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (err) {
      throw wrap('DescribeSnapshots', err);
    }
    return snapshots;
  }

  async getSnapshot(snapshotId: string): Promise<Snapshot | null> {
    try {
      const out = await this.ec2.send(new DescribeSnapshotsCommand({ SnapshotIds: [snapshotId] }));
      const raw = out.Snapshots?.[0];
      return raw ? mapSnapshot(raw) : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw wrap(`DescribeSnapshots ${snapshotId}`, err);
    }
  }

  async deleteSnapshot(snapshotId: string): Promise<void> {
    try {
      await this.ec2.send(new DeleteSnapshotCommand({ SnapshotId: snapshotId }));
    } catch (err) {
      throw wrap(`DeleteSnapshot ${snapshotId}`, err);
    }
  }

  async waitForSnapshotsCompleted(snapshotIds: string[], maxWaitSeconds: number): Promise<void> {
    try {
      await waitUntilSnapshotCompleted(
        { client: this.ec2, maxWaitTime: maxWaitSeconds },
        { SnapshotIds: snapshotIds },
      );
    } catch (err) {
      throw new ProviderError(
        'WAIT_TIMEOUT',
        `Snapshots ${snapshotIds.join(', ')} did not complete within ${maxWaitSeconds}s`,
        err,
      );
    }
  }
}
