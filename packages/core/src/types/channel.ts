/**
 * Supported channel identifiers
 */
export const CHANNEL_IDS = [
  'mercadolivre',
  'shopee',
  'amazon',
  'shein',
  'magalu',
  'ecommerce',
  'telemarketing',
] as const;

export type ChannelId = (typeof CHANNEL_IDS)[number];

/**
 * How a channel turns total cost into a listing price
 */
export type PricingModel =
  | 'markup' // totalCost × markup / (1 − tax)
  | 'commission'; // totalCost / (1 − Σ rates charged on the sale price)

/**
 * Rounding rules for final prices
 * - nearest_99: X.99
 * - nearest_95: X.95
 * - nearest_unit: whole units
 * - none: cents only
 */
export const ROUNDING_RULES = ['nearest_99', 'nearest_95', 'nearest_unit', 'none'] as const;

export type RoundingRule = (typeof ROUNDING_RULES)[number];

/**
 * Wholesale discount for buying at least `minQuantity` units
 */
export interface WholesaleTierRule {
  minQuantity: number;
  discount: number; // Fraction of listing price, e.g. 0.05 = 5% off
}

/**
 * Fee charged by the channel as a share of the sale price
 */
export interface FeeRate {
  key: string;
  label: string;
  rate: number;
}

/**
 * Fields every channel policy carries
 */
interface BaseChannelPolicy {
  channel: ChannelId;
  name: string;
  taxRate: number; // Share of the sale price paid as tax / channel charge
  aggressiveDiscountRate: number;
  promoDiscountRate: number;
  wholesaleTiers: readonly WholesaleTierRule[];
  roundingRule: RoundingRule;
  minimumMarginRate: number; // Informational - reported in breakdown notes
}

/**
 * Channel priced as a multiple of total cost
 */
export interface MarkupChannelPolicy extends BaseChannelPolicy {
  pricingModel: 'markup';
  markupMultiplier: number; // e.g. 1.8 = 80% over cost
  categoryMarkups?: Readonly<Record<string, number>>;
}

/**
 * Channel with published seller-commission bounds
 */
export interface CommissionChannelPolicy extends BaseChannelPolicy {
  pricingModel: 'commission';
  commissionBounds: { min: number; max: number };
  categoryCommissions?: Readonly<Record<string, number>>;
  feeRates: readonly FeeRate[];
  targetMarginRate: number; // Contribution margin the price must leave
}

export type ChannelPolicy = MarkupChannelPolicy | CommissionChannelPolicy;

export type PolicyTable = Readonly<Record<ChannelId, ChannelPolicy>>;

const STANDARD_TIERS: readonly WholesaleTierRule[] = [
  { minQuantity: 5, discount: 0.05 },
  { minQuantity: 10, discount: 0.1 },
  { minQuantity: 20, discount: 0.15 },
];

/**
 * Default channel policies
 */
export const DEFAULT_CHANNEL_POLICIES: PolicyTable = {
  mercadolivre: {
    channel: 'mercadolivre',
    name: 'Mercado Livre',
    pricingModel: 'commission',
    commissionBounds: { min: 0.11, max: 0.19 }, // Classic 11% to Premium 19%
    categoryCommissions: {
      electronics: 0.13,
      fashion: 0.16,
      home: 0.14,
      beauty: 0.18,
    },
    feeRates: [{ key: 'advertising', label: 'Advertising (TACoS)', rate: 0.05 }],
    targetMarginRate: 0.2,
    taxRate: 0.08,
    aggressiveDiscountRate: 0.12,
    promoDiscountRate: 0.18,
    wholesaleTiers: STANDARD_TIERS,
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.25,
  },
  shopee: {
    channel: 'shopee',
    name: 'Shopee',
    pricingModel: 'markup',
    markupMultiplier: 1.8,
    categoryMarkups: {
      electronics: 1.5,
      fashion: 2.0,
    },
    taxRate: 0.12,
    aggressiveDiscountRate: 0.15,
    promoDiscountRate: 0.2,
    wholesaleTiers: [
      { minQuantity: 3, discount: 0.05 },
      { minQuantity: 6, discount: 0.1 },
      { minQuantity: 12, discount: 0.15 },
    ],
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.2,
  },
  amazon: {
    channel: 'amazon',
    name: 'Amazon BR',
    pricingModel: 'markup',
    markupMultiplier: 2.5, // Covers FBA fees
    taxRate: 0.18,
    aggressiveDiscountRate: 0.08,
    promoDiscountRate: 0.12,
    wholesaleTiers: STANDARD_TIERS,
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.3,
  },
  shein: {
    channel: 'shein',
    name: 'Shein',
    pricingModel: 'markup',
    markupMultiplier: 1.6,
    taxRate: 0.1,
    aggressiveDiscountRate: 0.18,
    promoDiscountRate: 0.25,
    wholesaleTiers: STANDARD_TIERS,
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.15,
  },
  magalu: {
    channel: 'magalu',
    name: 'Magazine Luiza',
    pricingModel: 'markup',
    markupMultiplier: 2.0,
    taxRate: 0.14,
    aggressiveDiscountRate: 0.1,
    promoDiscountRate: 0.15,
    wholesaleTiers: STANDARD_TIERS,
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.22,
  },
  ecommerce: {
    channel: 'ecommerce',
    name: 'E-commerce (Direct)',
    pricingModel: 'markup',
    markupMultiplier: 2.8, // No marketplace commission
    taxRate: 0.05, // Operating costs
    aggressiveDiscountRate: 0.1,
    promoDiscountRate: 0.2,
    wholesaleTiers: STANDARD_TIERS,
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.35,
  },
  telemarketing: {
    channel: 'telemarketing',
    name: 'Telemarketing',
    pricingModel: 'markup',
    markupMultiplier: 3.0, // Covers the sales team
    taxRate: 0.08,
    aggressiveDiscountRate: 0.15,
    promoDiscountRate: 0.25,
    wholesaleTiers: [
      { minQuantity: 10, discount: 0.05 },
      { minQuantity: 50, discount: 0.1 },
      { minQuantity: 100, discount: 0.15 },
    ],
    roundingRule: 'nearest_99',
    minimumMarginRate: 0.4,
  },
};

/**
 * Read-only view of a policy for introspection
 */
export interface PolicySummary {
  channel: ChannelId;
  name: string;
  pricingModel: PricingModel;
  markupMultiplier?: number;
  commissionBounds?: { min: number; max: number };
  defaultCommissionPercent?: number;
  feeRates?: FeeRate[];
  targetMarginRate?: number;
  taxRate: number;
  aggressiveDiscountRate: number;
  promoDiscountRate: number;
  wholesaleTiers: WholesaleTierRule[];
  roundingRule: RoundingRule;
  minimumMarginRate: number;
  categories: string[];
}

export function isChannelId(value: string): value is ChannelId {
  return CHANNEL_IDS.some((id) => id === value);
}
