// Error taxonomy shared by workflows, the CLI and the HTTP adapter.
// Operator cancellation is not an error: workflows return { status: 'cancelled' }.

export abstract class EvidenceToolError<Code extends string = string> extends Error {
  constructor(
    public readonly code: Code,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = new.target.name;
  }
}

export type AuthErrorCode = 'CLI_MISSING' | 'NOT_AUTHENTICATED';

export class AuthError extends EvidenceToolError<AuthErrorCode> {}

export type SelectErrorCode = 'NONE_AVAILABLE' | 'CANCELLED' | 'OUT_OF_RANGE';

export class SelectError extends EvidenceToolError<SelectErrorCode> {}

export type ProviderErrorCode =
  | 'INSTANCE_NOT_FOUND'
  | 'SNAPSHOT_NOT_FOUND'
  | 'NO_DEFAULT_VPC'
  | 'NO_VOLUMES'
  | 'ALL_SNAPSHOTS_FAILED'
  | 'DEPENDENCY_VIOLATION'
  | 'WAIT_TIMEOUT'
  | 'CALL_FAILED';

export class ProviderError extends EvidenceToolError<ProviderErrorCode> {
  /** SDK error name (e.g. InvalidInstanceID.NotFound) when the failure came from AWS. */
  public readonly providerCode?: string;

  constructor(code: ProviderErrorCode, message: string, cause?: unknown, providerCode?: string) {
    super(code, message, cause);
    this.providerCode = providerCode;
  }
}

export type DeletionErrorCode = 'NOT_FOUND' | 'REASON_REQUIRED' | 'PROVIDER_REJECTED';

export class DeletionError extends EvidenceToolError<DeletionErrorCode> {
  /** Audit report written before the rejected delete call. */
  public readonly auditReportPath?: string;

  constructor(code: DeletionErrorCode, message: string, cause?: unknown, auditReportPath?: string) {
    super(code, message, cause);
    this.auditReportPath = auditReportPath;
  }
}

export class ReportIoError extends EvidenceToolError<'REPORT_WRITE_FAILED'> {
  constructor(message: string, cause?: unknown) {
    super('REPORT_WRITE_FAILED', message, cause);
  }
}

/** Raised by a non-interactive caller when a workflow needs an answer it was not given. */
export class InteractionRequiredError extends EvidenceToolError<'INTERACTION_REQUIRED'> {
  constructor(question: string) {
    super('INTERACTION_REQUIRED', `Operator input required: ${question}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
