export type DomainErrorCode =
  | 'not_found'
  | 'invalid_state'
  | 'store_unavailable'
  | 'condition_evaluation'
  | 'conflict';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'not_found';
  readonly status = 404;

  constructor(
    readonly entityType: 'alert' | 'rule',
    readonly entityId: string,
  ) {
    super(`${entityType} ${entityId} not found`);
  }
}

export class InvalidStateError extends DomainError {
  readonly code = 'invalid_state';
  readonly status = 409;
}

export class ConflictError extends DomainError {
  readonly code = 'conflict';
  readonly status = 409;
}

/** Transient infrastructure failure: connection loss, timeout, pool exhaustion. */
export class StoreUnavailableError extends DomainError {
  readonly code = 'store_unavailable';
  readonly status = 503;
}

/** A rule's conditions cannot be evaluated; the rule is treated as not matching. */
export class ConditionEvaluationError extends DomainError {
  readonly code = 'condition_evaluation';
  readonly status = 422;

  constructor(
    readonly ruleId: string,
    message: string,
  ) {
    super(`rule ${ruleId}: ${message}`);
  }
}
