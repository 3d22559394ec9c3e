export const ERROR_GENERATION_EXHAUSTED = 'generation_exhausted' as const;
export const ERROR_QUOTA_EXCEEDED = 'quota_exceeded' as const;
export const ERROR_BINDING_CONFLICT = 'binding_conflict' as const;
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_INVALID_ACCOUNT_CODE = 'invalid_account_code' as const;
export const ERROR_INVALID_PROMO_CODE = 'invalid_promo_code' as const;

export type BrokerErrorCode =
  | typeof ERROR_GENERATION_EXHAUSTED
  | typeof ERROR_QUOTA_EXCEEDED
  | typeof ERROR_BINDING_CONFLICT
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_INVALID_ACCOUNT_CODE
  | typeof ERROR_INVALID_PROMO_CODE;

export interface BrokerErrorResponse {
  error: BrokerErrorCode;
  error_description: string;
  upgrade_required?: boolean;
}

/**
 * Base class for broker-domain failures that are not OAuth protocol errors
 */
export abstract class BrokerError extends Error {
  abstract readonly code: BrokerErrorCode;
  abstract readonly statusCode: 400 | 403 | 404 | 409 | 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): BrokerErrorResponse {
    return {
      error: this.code,
      error_description: this.message,
    };
  }
}

/**
 * Identifier space collision retries ran out. Fatal for the request.
 */
export class GenerationExhaustedError extends BrokerError {
  readonly code = ERROR_GENERATION_EXHAUSTED;
  readonly statusCode = 500;

  constructor(
    readonly kind: string,
    readonly attempts: number
  ) {
    super(`Could not generate a unique ${kind} after ${attempts} attempts`);
  }
}

/**
 * Alias creation denied by the plan ceiling; shown to the user as an upgrade prompt
 */
export class QuotaExceededError extends BrokerError {
  readonly code = ERROR_QUOTA_EXCEEDED;
  readonly statusCode = 403;

  constructor(
    readonly userId: string,
    readonly limit: number
  ) {
    super(`Alias limit of ${limit} reached on the free plan`);
  }

  override toJSON(): BrokerErrorResponse {
    return { ...super.toJSON(), upgrade_required: true };
  }
}

/**
 * A concurrent request created the (client, user) binding first
 */
export class BindingConflictError extends BrokerError {
  readonly code = ERROR_BINDING_CONFLICT;
  readonly statusCode = 409;

  constructor(
    readonly clientId: string,
    readonly userId: string,
    options?: { cause?: unknown }
  ) {
    super(`Binding for client ${clientId} and user ${userId} already exists`, options);
  }
}

export class NotFoundError extends BrokerError {
  readonly code = ERROR_NOT_FOUND;
  readonly statusCode = 404;
}

export class InvalidAccountCodeError extends BrokerError {
  readonly code = ERROR_INVALID_ACCOUNT_CODE;
  readonly statusCode = 400;
}

export class InvalidPromoCodeError extends BrokerError {
  readonly code = ERROR_INVALID_PROMO_CODE;
  readonly statusCode = 400;
}
