import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AwsCloudProvider } from '../../src/provider/awsProvider.js';

const { mockSend, mockStsSend, mockWaitInstance, mockWaitSnapshots } = vi.hoisted(() => ({
  mockSend: vi.fn(),
  mockStsSend: vi.fn(),
  mockWaitInstance: vi.fn(),
  mockWaitSnapshots: vi.fn(),
}));

vi.mock('@aws-sdk/client-ec2', () => {
  const command = (type: string) =>
    class {
      readonly _type = type;
      constructor(readonly input: unknown) {}
    };
  return {
    EC2Client: class {
      send = mockSend;
      config = { region: async () => 'eu-west-1' };
    },
    CreateSecurityGroupCommand: command('CreateSecurityGroupCommand'),
    CreateSnapshotCommand: command('CreateSnapshotCommand'),
    CreateTagsCommand: command('CreateTagsCommand'),
    DeleteSnapshotCommand: command('DeleteSnapshotCommand'),
    DescribeInstancesCommand: command('DescribeInstancesCommand'),
    DescribeSecurityGroupsCommand: command('DescribeSecurityGroupsCommand'),
    DescribeSnapshotsCommand: command('DescribeSnapshotsCommand'),
    DescribeVpcsCommand: command('DescribeVpcsCommand'),
    ModifyInstanceAttributeCommand: command('ModifyInstanceAttributeCommand'),
    RevokeSecurityGroupEgressCommand: command('RevokeSecurityGroupEgressCommand'),
    StartInstancesCommand: command('StartInstancesCommand'),
    StopInstancesCommand: command('StopInstancesCommand'),
    waitUntilInstanceRunning: mockWaitInstance,
    waitUntilSnapshotCompleted: mockWaitSnapshots,
  };
});

vi.mock('@aws-sdk/client-sts', () => ({
  STSClient: class {
    send = mockStsSend;
  },
  GetCallerIdentityCommand: class {
    readonly _type = 'GetCallerIdentityCommand';
    constructor(readonly input: unknown) {}
  },
}));

function awsError(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

const rawInstance = {
  InstanceId: 'i-0abc',
  InstanceType: 't3.large',
  State: { Name: 'stopped' },
  Placement: { AvailabilityZone: 'eu-west-1b' },
  LaunchTime: new Date('2024-03-01T08:00:00Z'),
  PrivateIpAddress: '10.0.1.10',
  Tags: [
    { Key: 'Name', Value: 'web-01' },
    { Key: 'Env', Value: 'prod' },
  ],
  SecurityGroups: [{ GroupId: 'sg-web', GroupName: 'web' }],
  BlockDeviceMappings: [
    { DeviceName: '/dev/xvda', Ebs: { VolumeId: 'vol-1' } },
    { DeviceName: '/dev/sdb' },
  ],
};

describe('AwsCloudProvider', () => {
  let provider: AwsCloudProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new AwsCloudProvider({ region: 'eu-west-1' });
  });

  it('maps an instance and keeps only EBS-backed devices', async () => {
    mockSend.mockResolvedValueOnce({ Reservations: [{ Instances: [rawInstance] }] });

    expect(await provider.getInstance('i-0abc')).toEqual({
      id: 'i-0abc',
      name: 'web-01',
      state: 'stopped',
      type: 't3.large',
      availabilityZone: 'eu-west-1b',
      launchTime: new Date('2024-03-01T08:00:00Z'),
      publicIp: undefined,
      privateIp: '10.0.1.10',
      securityGroups: [{ id: 'sg-web', name: 'web' }],
      volumes: [{ device: '/dev/xvda', volumeId: 'vol-1' }],
    });
    expect(mockSend.mock.calls[0][0]).toMatchObject({
      _type: 'DescribeInstancesCommand',
      input: { InstanceIds: ['i-0abc'] },
    });
  });

  it('returns null for an unknown instance id', async () => {
    mockSend.mockRejectedValueOnce(awsError('InvalidInstanceID.NotFound', "The instance ID 'i-x' does not exist"));
    expect(await provider.getInstance('i-x')).toBeNull();
  });

  it('follows pagination when listing instances', async () => {
    mockSend
      .mockResolvedValueOnce({ Reservations: [{ Instances: [rawInstance] }], NextToken: 'page-2' })
      .mockResolvedValueOnce({ Reservations: [{ Instances: [{ ...rawInstance, InstanceId: 'i-0def' }] }] });

    const instances = await provider.listInstances(['running', 'stopped']);

    expect(instances.map((i) => i.id)).toEqual(['i-0abc', 'i-0def']);
    expect(mockSend.mock.calls[1][0]).toMatchObject({
      input: {
        Filters: [{ Name: 'instance-state-name', Values: ['running', 'stopped'] }],
        NextToken: 'page-2',
      },
    });
  });

  it('reports a snapshot still in use as a dependency violation', async () => {
    mockSend.mockRejectedValueOnce(awsError('InvalidSnapshot.InUse', 'snap-1 is in use by ami-1'));

    await expect(provider.deleteSnapshot('snap-1')).rejects.toMatchObject({
      code: 'DEPENDENCY_VIOLATION',
      providerCode: 'InvalidSnapshot.InUse',
      message: 'DeleteSnapshot snap-1 failed: snap-1 is in use by ami-1',
    });
  });

  it('wraps other SDK failures as CALL_FAILED', async () => {
    mockSend.mockRejectedValueOnce(awsError('UnauthorizedOperation', 'not allowed'));

    await expect(provider.setInstanceSecurityGroups('i-0abc', ['sg-q'])).rejects.toMatchObject({
      code: 'CALL_FAILED',
      message: 'ModifyInstanceAttribute i-0abc failed: not allowed',
    });
    expect(mockSend.mock.calls[0][0]).toMatchObject({ input: { InstanceId: 'i-0abc', Groups: ['sg-q'] } });
  });

  it('revokes the allow-all egress rule', async () => {
    mockSend.mockResolvedValueOnce({});
    await provider.revokeDefaultEgress('sg-q');
    expect(mockSend.mock.calls[0][0]).toMatchObject({
      _type: 'RevokeSecurityGroupEgressCommand',
      input: { GroupId: 'sg-q', IpPermissions: [{ IpProtocol: '-1', IpRanges: [{ CidrIp: '0.0.0.0/0' }] }] },
    });
  });

  it('maps a created snapshot', async () => {
    mockSend.mockResolvedValueOnce({
      SnapshotId: 'snap-1',
      VolumeId: 'vol-1',
      Description: 'EVIDENCE-SNAPSHOT-i-0abc-/dev/xvda-2024-03-02-101530',
      State: 'pending',
      VolumeSize: 16,
    });

    const snapshot = await provider.createSnapshot({ volumeId: 'vol-1', description: 'EVIDENCE-SNAPSHOT-i-0abc-/dev/xvda-2024-03-02-101530' });

    expect(snapshot).toMatchObject({ id: 'snap-1', state: 'pending', sizeGiB: 16, tags: {} });
  });

  it('turns a waiter failure into WAIT_TIMEOUT', async () => {
    mockWaitSnapshots.mockRejectedValueOnce(new Error('TimeoutError'));

    await expect(provider.waitForSnapshotsCompleted(['snap-1', 'snap-2'], 30)).rejects.toMatchObject({
      code: 'WAIT_TIMEOUT',
      message: 'Snapshots snap-1, snap-2 did not complete within 30s',
    });
    expect(mockWaitSnapshots.mock.calls[0][0]).toMatchObject({ maxWaitTime: 30 });
    expect(mockWaitSnapshots.mock.calls[0][1]).toEqual({ SnapshotIds: ['snap-1', 'snap-2'] });
  });

  it('resolves region and caller identity', async () => {
    mockStsSend.mockResolvedValueOnce({
      Account: '111122223333',
      Arn: 'arn:aws:iam::111122223333:user/analyst',
      UserId: 'AIDATEST',
    });

    expect(await provider.getRegion()).toBe('eu-west-1');
    expect(await provider.getCallerIdentity()).toEqual({
      account: '111122223333',
      arn: 'arn:aws:iam::111122223333:user/analyst',
      userId: 'AIDATEST',
    });
  });
});
