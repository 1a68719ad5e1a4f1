import type { ChannelId, PricingModel, RoundingRule } from './channel';

/**
 * Per-call adjustments to a channel policy.
 * Applied to a request-scoped copy - the shared policy is never touched.
 */
export interface PolicyOverrides {
  markupMultiplier?: number; // Markup-driven channels only
  commissionPercent?: number; // 0.12 = 12%; wins over the policy default
  category?: string; // Picks a category markup / commission when the policy has one
  taxRate?: number;
  aggressiveDiscountRate?: number;
  promoDiscountRate?: number; // e.g. a live promotional event
  rounding?: RoundingRule;
}

/**
 * Quote request - built per call, never persisted
 */
export interface PricingRequest {
  costPrice: number;
  shippingCost?: number;
  channel: string;
  context?: PolicyOverrides;
}

/**
 * Request to evaluate a price the seller is considering
 */
export interface MetricsRequest extends PricingRequest {
  price: number;
}

/**
 * Financial metrics for one price point
 */
export interface PriceMetrics {
  marginPercent: number; // monetaryValue / price × 100
  valueMultiple: number; // monetaryValue / total cost
  monetaryValue: number; // Net value per unit
  taxes: number;
  commissions: number; // Commission plus other fees charged on the price
}

export interface PricePoint {
  price: number;
  metrics: PriceMetrics;
}

export interface WholesaleTier {
  tier: number; // 1-based
  minQuantity: number;
  price: number;
  metrics: PriceMetrics;
}

/**
 * One line of the audit trail
 */
export interface BreakdownStep {
  label: string;
  value: number;
}

/**
 * Full result of a quote
 */
export interface PriceBreakdown {
  channel: ChannelId;
  pricingModel: PricingModel;
  listing: PricePoint;
  aggressive: PricePoint;
  promo: PricePoint;
  announcement: PricePoint; // Headline ad price derived from promo
  wholesaleTiers: WholesaleTier[];
  steps: BreakdownStep[];
  notes: string[];
}

/**
 * A single invalid input field
 */
export interface FieldError {
  field: string;
  message: string;
}
