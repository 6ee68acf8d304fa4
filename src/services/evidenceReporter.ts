import fs from 'fs/promises';
import path from 'path';
import { ReportIoError, errorMessage } from '../core/errors.js';
import type { Interaction } from '../core/interaction.js';
import type {
  EvidenceAction,
  EvidenceDetails,
  EvidenceReport,
  WrittenReport,
} from '../core/types.js';
import type { EventBus, EvidenceEvents } from '../events/eventBus.js';
import { sha256Hex } from '../utils/hashChain.js';
import { getLogger } from '../utils/logging.js';
import { currentHost, currentOperator } from '../utils/operator.js';
import { fileStamp, formatUtc } from '../utils/time.js';

const RULE = '='.repeat(80);
const DETAILS_HEADER = 'EVIDENCE DETAILS:';

const CUSTODY_BOILERPLATE = `CHAIN OF CUSTODY:
  - Digital evidence preserved using AWS native tools
  - All actions logged with timestamps and operator identification
  - Evidence integrity maintained through AWS checksums and metadata
  - Report digest recorded in the hash-chained custody ledger

VERIFICATION STEPS:
  - Verify snapshot integrity using AWS console or CLI
  - Document snapshot ID and creation timestamp
  - Preserve this report as part of case documentation

NEXT STEPS FOR DIGITAL FORENSICS ANALYST:
  - Create EBS volume from snapshot for analysis
  - Mount volume in isolated forensic workstation
  - Perform disk imaging if required for legal proceedings
  - Calculate and document hash values for court admissibility`;

function oneLine(value: string): string {
  return value.replace(/\r?\n/g, ' ');
}

export function renderReport(report: EvidenceReport): string {
  const details = report.details
    .map(([key, value]) => `  ${oneLine(key)}: ${oneLine(value)}`)
    .join('\n');
  return [
    RULE,
    'AWS EC2 DIGITAL EVIDENCE PRESERVATION REPORT',
    RULE,
    '',
    'CASE INFORMATION:',
    `  Subject ID: ${report.subjectId}`,
    `  Action Performed: ${report.action}`,
    `  Timestamp: ${formatUtc(report.timestamp)}`,
    `  Operator: ${report.operator}`,
    `  Computer: ${report.host}`,
    `  AWS Region: ${report.region}`,
    '',
    DETAILS_HEADER,
    ...(details ? [details] : []),
    '',
    CUSTODY_BOILERPLATE,
    '',
    RULE,
    'Report generated by ec2-evidence',
    RULE,
    '',
  ].join('\n');
}

/** Reads the detail section of a rendered report back into ordered pairs. */
export function parseDetails(text: string): EvidenceDetails {
  const lines = text.split('\n');
  const start = lines.indexOf(DETAILS_HEADER);
  if (start === -1) return [];
  const details: EvidenceDetails = [];
  for (const line of lines.slice(start + 1)) {
    if (!line.startsWith('  ')) break;
    const body = line.slice(2);
    const sep = body.indexOf(': ');
    if (sep === -1) break;
    details.push([body.slice(0, sep), body.slice(sep + 2)]);
  }
  return details;
}

export function reportFileName(subjectId: string, at: Date, attempt = 0): string {
  const safe = subjectId.replace(/[^A-Za-z0-9._-]/g, '_');
  const suffix = attempt > 0 ? `-${attempt}` : '';
  return `evidence-report-${safe}-${fileStamp(at)}${suffix}.txt`;
}

// Two reports for one subject within the same second get -1, -2, ... suffixes.
const MAX_NAME_ATTEMPTS = 20;

function alreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

export interface EvidenceReporterOptions {
  defaultDirectory: string;
  region: () => Promise<string>;
  bus?: EventBus<EvidenceEvents>;
  operator?: string;
  host?: string;
  clock?: () => Date;
}

export interface WriteReportOptions {
  /** Explicit output directory; skips the prompt. */
  directory?: string;
  /** Asked for a directory when none is given; without it the default is used. */
  io?: Interaction;
}

export class EvidenceReporter {
  private readonly clock: () => Date;

  constructor(private readonly opts: EvidenceReporterOptions) {
    this.clock = opts.clock ?? (() => new Date());
  }

  get operator(): string {
    return this.opts.operator ?? currentOperator();
  }

  async write(
    subjectId: string,
    action: EvidenceAction,
    details: EvidenceDetails,
    options: WriteReportOptions = {},
  ): Promise<WrittenReport> {
    const timestamp = this.clock();
    const report: EvidenceReport = {
      subjectId,
      action,
      timestamp,
      operator: this.operator,
      host: this.opts.host ?? currentHost(),
      region: await this.opts.region(),
      details,
    };
    const content = renderReport(report);
    const directory = await this.resolveDirectory(options);
    const file = await this.writeOnce(directory, subjectId, timestamp, content);
    const written: WrittenReport = { path: file, sha256: sha256Hex(content), report };
    getLogger().info({ path: file, action, subjectId, sha256: written.sha256 }, 'evidence report written');
    await this.opts.bus?.emit('reportWritten', written);
    return written;
  }

  // wx: a report is write-once, never overwritten
  private async writeOnce(
    directory: string,
    subjectId: string,
    timestamp: Date,
    content: string,
  ): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      const file = path.join(directory, reportFileName(subjectId, timestamp, attempt));
      try {
        await fs.writeFile(file, content, { encoding: 'utf8', flag: 'wx' });
        return file;
      } catch (err) {
        if (alreadyExists(err) && attempt + 1 < MAX_NAME_ATTEMPTS) continue;
        throw new ReportIoError(`Failed to write evidence report ${file}: ${errorMessage(err)}`, err);
      }
    }
  }

  private async resolveDirectory(options: WriteReportOptions): Promise<string> {
    let chosen = options.directory?.trim();
    if (!chosen && options.io) {
      options.io.say(`Default report location: ${this.opts.defaultDirectory}`);
      chosen = (
        await options.io.ask('Enter custom path (press Enter for default location): ')
      ).trim();
    }
    const directory = chosen || this.opts.defaultDirectory;
    try {
      await fs.mkdir(directory, { recursive: true });
      return directory;
    } catch (err) {
      getLogger().warn(
        { directory, err: errorMessage(err) },
        'cannot create report directory, using current directory',
      );
      options.io?.say(`Error creating directory ${directory}. Using current folder.`);
      return process.cwd();
    }
  }
}
