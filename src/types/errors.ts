import type { StepName } from './index';

export interface InputIssue {
  field: string;
  message: string;
}

export abstract class ProvisioningError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before any remote call when the requested topology is malformed.
 * Re-invoking with corrected input is always safe.
 */
export class InvalidInputError extends ProvisioningError {
  readonly code = 'INVALID_INPUT';
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super(`Invalid input: ${issues.map(issue => `${issue.field}: ${issue.message}`).join('; ')}`);
    this.issues = issues;
  }
}

/**
 * A cloud API call made during a step was rejected or timed out.
 * Resources created by earlier steps are left in place.
 */
export class RemoteOperationError extends ProvisioningError {
  readonly code = 'REMOTE_OPERATION_FAILED';
  readonly step: StepName;
  readonly operation: string;

  constructor(step: StepName, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Step ${step} failed during ${operation}: ${reason}`, { cause });
    this.step = step;
    this.operation = operation;
  }
}
