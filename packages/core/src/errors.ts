import type { FieldError } from './types';

/**
 * Base class for every error the pricing engine raises on purpose
 */
export class PricingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * One or more request fields are invalid - the caller can fix the input
 */
export class ValidationError extends PricingError {
  readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    super(`Invalid pricing request: ${errors.map((e) => e.field).join(', ')}`);
    this.errors = errors;
  }

  get fields(): string[] {
    return this.errors.map((e) => e.field);
  }
}

export type DomainErrorCode =
  | 'UNSUPPORTED_CHANNEL' // Channel identifier not recognised
  | 'INFEASIBLE_RATES' // Rates leave no room for a positive finite price
  | 'INVALID_POLICY'; // Policy numbers are broken (e.g. tax rate ≥ 100%)

/**
 * The request is well-formed but no price can be produced for it
 */
export class DomainError extends PricingError {
  readonly code: DomainErrorCode;
  readonly supportedChannels?: string[];

  constructor(code: DomainErrorCode, message: string, supportedChannels?: string[]) {
    super(message);
    this.code = code;
    this.supportedChannels = supportedChannels;
  }
}
