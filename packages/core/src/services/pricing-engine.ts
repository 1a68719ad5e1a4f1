import type {
  ChannelId,
  PricingModel,
  RoundingRule,
  WholesaleTierRule,
  PriceMetrics,
  PricePoint,
  WholesaleTier,
  BreakdownStep,
  PriceBreakdown,
} from '../types';
import { DomainError } from '../errors';

/**
 * Discount a headline ad price is shown against.
 * announcement = promo / (1 − 0.15), for every channel.
 */
export const STANDARD_LISTING_DISCOUNT = 0.15;

/**
 * Rates charged on a sale price, used for metrics
 */
export interface MetricRates {
  taxRate: number;
  commissionRate: number; // Commission plus every other fee on the price
}

/**
 * Round to cents
 */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Convert to cents, dropping floating-point noise below a millionth
 */
function toCents(price: number): number {
  return Math.round(price * 1e6) / 1e4;
}

export function totalCost(costPrice: number, shippingCost: number = 0): number {
  return costPrice + shippingCost;
}

/**
 * Price before rounding: totalCost × markup / (1 − taxRate)
 */
export function basePrice(cost: number, markup: number, taxRate: number): number {
  if (!Number.isFinite(taxRate) || taxRate < 0 || taxRate >= 1) {
    throw new DomainError('INVALID_POLICY', `Tax rate ${taxRate} must be in [0, 1)`);
  }
  if (!Number.isFinite(markup) || markup <= 0) {
    throw new DomainError('INVALID_POLICY', `Markup multiplier ${markup} must be positive`);
  }
  return (cost * markup) / (1 - taxRate);
}

export function clampNonNegative(price: number): number {
  return Math.max(price, 0);
}

/**
 * Apply a rounding rule to a price
 */
function applyRounding(price: number, rule: RoundingRule): number {
  const cents = toCents(price);
  switch (rule) {
    case 'nearest_95':
      return (Math.floor(cents / 100) * 100 + 95) / 100;
    case 'nearest_unit':
      return Math.round(cents / 100);
    case 'none':
      return Math.round(cents) / 100;
    case 'nearest_99':
    default:
      return (Math.floor(cents / 100) * 100 + 99) / 100;
  }
}

/**
 * Smallest price on the rule's grid that is not below `price`
 */
function roundUpToRule(price: number, rule: RoundingRule): number {
  const cents = Math.ceil(toCents(price));
  switch (rule) {
    case 'nearest_95':
      return (Math.ceil((cents - 95) / 100) * 100 + 95) / 100;
    case 'nearest_unit':
      return Math.ceil(cents / 100);
    case 'none':
      return cents / 100;
    case 'nearest_99':
    default:
      return (Math.ceil((cents - 99) / 100) * 100 + 99) / 100;
  }
}

/**
 * Round a price per the channel's rule, never going below `floorPrice`.
 * Non-positive prices with no floor clamp to 0.
 */
export function roundToPolicy(price: number, rule: RoundingRule, floorPrice: number = 0): number {
  const floor = clampNonNegative(floorPrice);
  if (price <= 0 && floor === 0) {
    return 0;
  }

  const rounded = clampNonNegative(applyRounding(price, rule));
  if (rounded < floor) {
    return roundUpToRule(floor, rule);
  }
  return rounded;
}

/**
 * Price after a fractional discount, rounded and floored
 */
export function discountedPrice(
  listingPrice: number,
  discount: number,
  rule: RoundingRule,
  floorPrice: number
): number {
  return roundToPolicy(listingPrice * (1 - discount), rule, floorPrice);
}

/**
 * Headline ad price shown above the promo price
 */
export function announcementPrice(promoPrice: number, rule: RoundingRule, floorPrice: number): number {
  return roundToPolicy(promoPrice / (1 - STANDARD_LISTING_DISCOUNT), rule, floorPrice);
}

/**
 * Build wholesale tiers from the listing price.
 * Tiers must come out with rising quantities and non-increasing prices.
 */
export function buildWholesaleTiers(
  listingPrice: number,
  tierRules: readonly WholesaleTierRule[],
  rule: RoundingRule,
  floorPrice: number
): Array<Omit<WholesaleTier, 'metrics'>> {
  const tiers = tierRules.map((tierRule, index) => ({
    tier: index + 1,
    minQuantity: tierRule.minQuantity,
    price: discountedPrice(listingPrice, tierRule.discount, rule, floorPrice),
  }));

  for (let i = 0; i < tiers.length; i++) {
    const current = tiers[i];
    const previousPrice = i === 0 ? listingPrice : tiers[i - 1].price;
    const previousQuantity = i === 0 ? 1 : tiers[i - 1].minQuantity;
    if (current.minQuantity <= previousQuantity || current.price > previousPrice) {
      throw new Error(
        `Wholesale tier ${current.tier} breaks ordering (minQuantity ${current.minQuantity}, price ${current.price})`
      );
    }
  }

  return tiers;
}

/**
 * Financial metrics for a price.
 * Taxes and commissions are rounded first so that
 * monetaryValue = price − cost − shipping − taxes − commissions to the cent.
 */
export function calculateMetrics(
  price: number,
  costPrice: number,
  shippingCost: number,
  rates: MetricRates
): PriceMetrics {
  const total = totalCost(costPrice, shippingCost);
  const taxes = roundMoney(price * rates.taxRate);
  const commissions = roundMoney(price * rates.commissionRate);
  const monetaryValue = roundMoney(price - total - taxes - commissions);

  return {
    marginPercent: price > 0 ? roundMoney((monetaryValue / price) * 100) : 0,
    valueMultiple: total > 0 ? roundMoney(monetaryValue / total) : 0,
    monetaryValue,
    taxes,
    commissions,
  };
}

/**
 * Everything a calculator has derived for one request
 */
export interface BreakdownInput {
  channel: ChannelId;
  pricingModel: PricingModel;
  costPrice: number;
  shippingCost: number;
  rates: MetricRates;
  listingPrice: number;
  aggressivePrice: number;
  promoPrice: number;
  announcementPrice: number;
  wholesaleTiers: Array<Omit<WholesaleTier, 'metrics'>>;
  steps: BreakdownStep[];
  notes: string[];
}

/**
 * Attach metrics to every price point and assemble the breakdown
 */
export function buildBreakdown(input: BreakdownInput): PriceBreakdown {
  const pricePoint = (price: number): PricePoint => ({
    price,
    metrics: calculateMetrics(price, input.costPrice, input.shippingCost, input.rates),
  });

  return {
    channel: input.channel,
    pricingModel: input.pricingModel,
    listing: pricePoint(input.listingPrice),
    aggressive: pricePoint(input.aggressivePrice),
    promo: pricePoint(input.promoPrice),
    announcement: pricePoint(input.announcementPrice),
    wholesaleTiers: input.wholesaleTiers.map((tier) => ({
      ...tier,
      metrics: calculateMetrics(tier.price, input.costPrice, input.shippingCost, input.rates),
    })),
    steps: input.steps,
    notes: input.notes,
  };
}
