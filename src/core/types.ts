// Domain model decoupled from the AWS SDK shapes so workflows and tests never touch SDK types

export type InstanceState =
  | 'pending'
  | 'running'
  | 'shutting-down'
  | 'stopping'
  | 'stopped'
  | 'terminated';

export type SnapshotState = 'pending' | 'completed' | 'error' | 'recoverable' | 'recovering';

export interface GroupRef {
  id: string;
  name: string;
}

export interface AttachedVolume {
  device: string;
  volumeId: string;
}

export interface Instance {
  id: string;
  name?: string;
  state: InstanceState;
  type: string;
  availabilityZone: string;
  launchTime?: Date;
  publicIp?: string;
  privateIp?: string;
  securityGroups: GroupRef[];
  volumes: AttachedVolume[];
}

export interface SecurityGroup {
  id: string;
  name: string;
  vpcId?: string;
  ingressRuleCount: number;
  egressRuleCount: number;
}

export interface Snapshot {
  id: string;
  volumeId: string;
  description: string;
  state: SnapshotState;
  sizeGiB: number;
  startTime?: Date;
  tags: Record<string, string>;
}

export interface Identity {
  account: string;
  arn: string;
  userId: string;
}

export type EvidenceAction =
  | 'NETWORK_ISOLATION'
  | 'EBS_SNAPSHOT_CREATION'
  | 'SNAPSHOT_DELETION'
  | 'NETWORK_RESTORATION';

/** Ordered key/value pairs; insertion order is preserved in the rendered report. */
export type EvidenceDetails = [key: string, value: string][];

export interface EvidenceReport {
  subjectId: string;
  action: EvidenceAction;
  timestamp: Date;
  operator: string;
  host: string;
  region: string;
  details: EvidenceDetails;
}

export interface WrittenReport {
  path: string;
  sha256: string;
  report: EvidenceReport;
}

export interface RecoveryRecord {
  instanceId: string;
  groupIds: string[];
  quarantineGroupId: string;
  savedAt: Date;
}

export interface CustodyEntry {
  id: string;
  action: EvidenceAction;
  subjectId: string;
  reportPath: string;
  reportSha256: string;
  operator: string;
  recordedAt: string;
  hashPrev: string | null;
  hashCurr: string;
}
