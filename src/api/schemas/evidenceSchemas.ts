import { z } from 'zod';

const snapshotOptionsSchema = z.object({
  caseNumber: z.string().default(''),
  reason: z.string().default(''),
  wait: z.boolean().default(false),
});

// Every decision a terminal operator would be asked for arrives in the body.
export const isolateBodySchema = z.object({
  confirm: z.literal(true),
  snapshotAfter: z.boolean().default(false),
  snapshot: snapshotOptionsSchema.default({}),
  reportDirectory: z.string().min(1).optional(),
});

export const snapshotBodySchema = snapshotOptionsSchema.extend({
  reportDirectory: z.string().min(1).optional(),
});

export const deleteSnapshotBodySchema = z.object({
  reason: z.string(),
  confirmation: z.string(),
  acknowledgement: z.string(),
  reportDirectory: z.string().min(1).optional(),
});

export const restoreBodySchema = z.object({
  confirm: z.literal(true),
  keepRecord: z.boolean().default(false),
  reportDirectory: z.string().min(1).optional(),
});

interface WrittenReportLike {
  path: string;
  sha256: string;
  report: { action: string; timestamp: Date };
}

export function toPublicReport(r: WrittenReportLike) {
  return {
    path: r.path,
    sha256: r.sha256,
    action: r.report.action,
    timestamp: r.report.timestamp.toISOString(),
  };
}
