export type GovernanceErrorCode =
  | 'VALIDATION_ERROR'
  | 'REGISTRY_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'EMPTY_POOL'
  | 'METRIC_UNAVAILABLE'
  | 'AUDIT_STORAGE'
  | 'NOT_FOUND';

export class GovernanceError extends Error {
  constructor(
    message: string,
    public readonly code: GovernanceErrorCode
  ) {
    super(message);
    this.name = 'GovernanceError';
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Malformed or incomplete configuration. Always fatal at load time.
 */
export class ValidationError extends GovernanceError {
  constructor(
    public readonly file: string,
    public readonly issues: ValidationIssue[],
    public readonly gate?: string
  ) {
    const detail = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`${gate ? `${gate} - ` : ''}${file}: ${detail}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class RegistryConflictError extends GovernanceError {
  constructor(
    public readonly kind: string,
    public readonly id: string
  ) {
    super(`${kind} '${id}' is already registered with different content`, 'REGISTRY_CONFLICT');
    this.name = 'RegistryConflictError';
  }
}

export class NotFoundError extends GovernanceError {
  constructor(
    public readonly kind: string,
    public readonly id: string
  ) {
    super(`${kind} '${id}' not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends GovernanceError {
  constructor(
    public readonly id: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Hypothesis '${id}' cannot move from ${from} to ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Recoverable: the caller skips the single check that needed the metric.
 */
export class MetricUnavailableError extends GovernanceError {
  constructor(
    public readonly metric: string,
    public readonly window?: string
  ) {
    super(
      `Metric '${metric}' is unavailable${window ? ` (window=${window})` : ''}`,
      'METRIC_UNAVAILABLE'
    );
    this.name = 'MetricUnavailableError';
  }
}

export class AuditStorageError extends GovernanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AUDIT_STORAGE');
    this.name = 'AuditStorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
