import { z } from 'zod';
import { ROUNDING_RULES, type FieldError, type MetricsRequest, type PricingRequest } from '../types';
import { ValidationError } from '../errors';
import type { CalculatorFactory } from './calculator-factory';

const rate = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .finite({ message: `${field} must be a finite number` })
    .min(0, { message: `${field} must be between 0 and 1 (exclusive)` })
    .lt(1, { message: `${field} must be between 0 and 1 (exclusive)` });

/**
 * Per-call policy overrides. Unknown keys are rejected, not ignored.
 */
export const PolicyOverridesInputSchema = z
  .object({
    markupMultiplier: z
      .number({ invalid_type_error: 'markupMultiplier must be a number' })
      .finite({ message: 'markupMultiplier must be a finite number' })
      .positive({ message: 'markupMultiplier must be greater than zero' }),
    commissionPercent: rate('commissionPercent'),
    category: z
      .string({ invalid_type_error: 'category must be a string' })
      .trim()
      .toLowerCase()
      .min(1, { message: 'category must not be empty' }),
    taxRate: rate('taxRate'),
    aggressiveDiscountRate: rate('aggressiveDiscountRate'),
    promoDiscountRate: rate('promoDiscountRate'),
    rounding: z.enum(ROUNDING_RULES, {
      errorMap: () => ({ message: `rounding must be one of: ${ROUNDING_RULES.join(', ')}` }),
    }),
  })
  .partial()
  .strict();

export const PricingRequestSchema = z.object({
  costPrice: z
    .number({ required_error: 'costPrice is required', invalid_type_error: 'costPrice must be a number' })
    .finite({ message: 'costPrice must be a finite number' })
    .positive({ message: 'costPrice must be greater than zero' }),
  shippingCost: z
    .number({ invalid_type_error: 'shippingCost must be a number' })
    .finite({ message: 'shippingCost must be a finite number' })
    .min(0, { message: 'shippingCost must not be negative' })
    .default(0),
  channel: z.string({ required_error: 'channel is required', invalid_type_error: 'channel must be a string' }),
  context: PolicyOverridesInputSchema.optional(),
});

export const MetricsRequestSchema = PricingRequestSchema.extend({
  price: z
    .number({ required_error: 'price is required', invalid_type_error: 'price must be a number' })
    .finite({ message: 'price must be a finite number' })
    .min(0, { message: 'price must not be negative' }),
});

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.flatMap((issue): FieldError[] => {
    const field = issue.path.join('.') || 'request';
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      return issue.keys.map((key) => ({
        field: field === 'request' ? key : `${field}.${key}`,
        message: `Unknown field '${key}'`,
      }));
    }
    return [{ field, message: issue.message }];
  });
}

/**
 * Checks that need the policy table: known channel, overrides that fit its pricing model
 */
function channelErrors(input: unknown, factory: CalculatorFactory): FieldError[] {
  if (typeof input !== 'object' || input === null || !('channel' in input)) {
    return [];
  }
  const { channel } = input;
  if (typeof channel !== 'string') {
    return [];
  }
  if (!factory.isSupported(channel)) {
    return [
      {
        field: 'channel',
        message: `Channel '${channel}' is not supported. Available channels: ${factory.supportedChannels().join(', ')}`,
      },
    ];
  }

  const calculator = factory.get(channel);
  const context = 'context' in input ? input.context : undefined;
  if (
    calculator.pricingModel === 'commission' &&
    typeof context === 'object' &&
    context !== null &&
    'markupMultiplier' in context
  ) {
    return [
      {
        field: 'context.markupMultiplier',
        message: `markupMultiplier does not apply to ${calculator.policy.name}, which prices from commission and fees`,
      },
    ];
  }
  return [];
}

type ParseOutcome = { success: true } | { success: false; error: z.ZodError };

function collectErrors(outcome: ParseOutcome, input: unknown, factory: CalculatorFactory): FieldError[] {
  return [...(outcome.success ? [] : toFieldErrors(outcome.error)), ...channelErrors(input, factory)];
}

/**
 * Every problem with a quote request, in one pass. Empty means valid.
 */
export function validatePricingRequest(input: unknown, factory: CalculatorFactory): FieldError[] {
  return collectErrors(PricingRequestSchema.safeParse(input), input, factory);
}

/**
 * Validate and normalise a quote request.
 * Throws ValidationError listing every bad field, or DomainError for a well-formed
 * request naming an unknown channel.
 * An unknown channel in a request that also has bad fields is reported as a
 * `channel` field error inside the ValidationError, not as UNSUPPORTED_CHANNEL.
 */
export function parsePricingRequest(input: unknown, factory: CalculatorFactory): PricingRequest {
  const parsed = PricingRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(collectErrors(parsed, input, factory));
  }
  factory.get(parsed.data.channel); // throws UNSUPPORTED_CHANNEL

  const errors = channelErrors(input, factory);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return parsed.data;
}

export function parseMetricsRequest(input: unknown, factory: CalculatorFactory): MetricsRequest {
  const parsed = MetricsRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(collectErrors(parsed, input, factory));
  }
  factory.get(parsed.data.channel); // throws UNSUPPORTED_CHANNEL

  const errors = channelErrors(input, factory);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return parsed.data;
}
