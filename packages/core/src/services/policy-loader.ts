import { z } from 'zod';
import {
  CHANNEL_IDS,
  DEFAULT_CHANNEL_POLICIES,
  ROUNDING_RULES,
  type ChannelId,
  type ChannelPolicy,
  type PolicyTable,
} from '../types';
import { DomainError } from '../errors';

const rate = z.number().finite().min(0).lt(1);

const RoundingRuleSchema = z.enum(ROUNDING_RULES);

const WholesaleTiersSchema = z
  .array(
    z.object({
      minQuantity: z.number().int().gt(1),
      discount: rate,
    }).strict()
  )
  .superRefine((tiers, ctx) => {
    for (let i = 1; i < tiers.length; i++) {
      if (tiers[i].minQuantity <= tiers[i - 1].minQuantity) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'minQuantity'],
          message: 'minQuantity must increase from tier to tier',
        });
      }
      if (tiers[i].discount < tiers[i - 1].discount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'discount'],
          message: 'discount must not decrease from tier to tier',
        });
      }
    }
  });

const sharedPolicyFields = {
  channel: z.enum(CHANNEL_IDS),
  name: z.string().min(1),
  taxRate: rate,
  aggressiveDiscountRate: rate,
  promoDiscountRate: rate,
  wholesaleTiers: WholesaleTiersSchema,
  roundingRule: RoundingRuleSchema,
  minimumMarginRate: rate,
};

const MarkupPolicySchema = z
  .object({
    ...sharedPolicyFields,
    pricingModel: z.literal('markup'),
    markupMultiplier: z.number().finite().positive(),
    categoryMarkups: z.record(z.string(), z.number().finite().positive()).optional(),
  })
  .strict();

const CommissionPolicySchema = z
  .object({
    ...sharedPolicyFields,
    pricingModel: z.literal('commission'),
    commissionBounds: z
      .object({ min: rate, max: rate })
      .strict()
      .refine((b) => b.min <= b.max, { message: 'min must not exceed max' }),
    categoryCommissions: z.record(z.string(), rate).optional(),
    feeRates: z.array(z.object({ key: z.string().min(1), label: z.string().min(1), rate }).strict()),
    targetMarginRate: rate,
  })
  .strict();

export const ChannelPolicySchema = z.discriminatedUnion('pricingModel', [
  MarkupPolicySchema,
  CommissionPolicySchema,
]);

/**
 * Fields an operator may replace per channel. Pricing model and identity are fixed.
 */
const PolicyOverrideSchema = z
  .object({
    name: z.string().min(1),
    taxRate: z.number(),
    aggressiveDiscountRate: z.number(),
    promoDiscountRate: z.number(),
    wholesaleTiers: z.array(z.object({ minQuantity: z.number(), discount: z.number() })),
    roundingRule: z.string(),
    minimumMarginRate: z.number(),
    markupMultiplier: z.number(),
    categoryMarkups: z.record(z.string(), z.number()),
    commissionBounds: z.object({ min: z.number(), max: z.number() }),
    categoryCommissions: z.record(z.string(), z.number()),
    feeRates: z.array(z.object({ key: z.string(), label: z.string(), rate: z.number() })),
    targetMarginRate: z.number(),
  })
  .partial()
  .strict();

export const PolicyOverridesSchema = z.record(z.enum(CHANNEL_IDS), PolicyOverrideSchema);

export type PolicyTableOverrides = z.infer<typeof PolicyOverridesSchema>;

function formatIssues(error: z.ZodError, prefix: string): string {
  return error.issues
    .map((issue) => `${[prefix, ...issue.path].join('.')}: ${issue.message}`)
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate one channel's policy
 */
export function parseChannelPolicy(channel: ChannelId, candidate: unknown): ChannelPolicy {
  const parsed = ChannelPolicySchema.safeParse(candidate);
  if (!parsed.success) {
    throw new DomainError('INVALID_POLICY', `Invalid policy - ${formatIssues(parsed.error, channel)}`);
  }
  if (parsed.data.channel !== channel) {
    throw new DomainError(
      'INVALID_POLICY',
      `Invalid policy - ${channel}.channel: expected '${channel}', got '${parsed.data.channel}'`
    );
  }
  return parsed.data;
}

/**
 * Build a validated, deeply frozen policy table.
 * Overrides are merged into copies of the base policies; the base table is left as it was.
 */
export function buildPolicyTable(
  base: PolicyTable = DEFAULT_CHANNEL_POLICIES,
  overrides: PolicyTableOverrides = {}
): PolicyTable {
  const policyFor = (channel: ChannelId): ChannelPolicy =>
    parseChannelPolicy(channel, { ...base[channel], ...overrides[channel] });

  return deepFreeze({
    mercadolivre: policyFor('mercadolivre'),
    shopee: policyFor('shopee'),
    amazon: policyFor('amazon'),
    shein: policyFor('shein'),
    magalu: policyFor('magalu'),
    ecommerce: policyFor('ecommerce'),
    telemarketing: policyFor('telemarketing'),
  });
}

/**
 * Load the policy table from a JSON string of per-channel overrides.
 * Empty or missing input yields the default table. Bad input throws - a broken
 * policy table must never serve quotes.
 */
export function loadPolicyTable(overridesJson?: string): PolicyTable {
  if (!overridesJson || overridesJson.trim() === '') {
    return DEFAULT_POLICY_TABLE;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(overridesJson);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new DomainError('INVALID_POLICY', `Policy overrides are not valid JSON: ${message}`);
  }

  const parsed = PolicyOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DomainError('INVALID_POLICY', `Invalid policy overrides - ${formatIssues(parsed.error, 'overrides')}`);
  }

  const table = buildPolicyTable(DEFAULT_CHANNEL_POLICIES, parsed.data);
  console.log('[PolicyLoader] Policy overrides applied', { channels: Object.keys(parsed.data) });
  return table;
}

export const DEFAULT_POLICY_TABLE: PolicyTable = buildPolicyTable();
