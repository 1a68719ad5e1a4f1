import type {
  ChannelId,
  ChannelPolicy,
  CommissionChannelPolicy,
  MarkupChannelPolicy,
  PricingModel,
  PolicyOverrides,
  PriceBreakdown,
  PriceMetrics,
  WholesaleTier,
  BreakdownStep,
} from '../types';
import { DomainError } from '../errors';
import {
  type MetricRates,
  announcementPrice,
  basePrice,
  buildBreakdown,
  buildWholesaleTiers,
  calculateMetrics,
  discountedPrice,
  roundMoney,
  roundToPolicy,
  totalCost,
} from './pricing-engine';

/**
 * Prices for one channel. Every method is pure: same input, same output.
 */
export interface ChannelCalculator {
  readonly channel: ChannelId;
  readonly pricingModel: PricingModel;
  readonly policy: ChannelPolicy;
  listingPrice(costPrice: number, shippingCost?: number, context?: PolicyOverrides): number;
  aggressivePrice(costPrice: number, shippingCost?: number, context?: PolicyOverrides): number;
  promoPrice(costPrice: number, shippingCost?: number, context?: PolicyOverrides): number;
  wholesaleTiers(costPrice: number, shippingCost?: number, context?: PolicyOverrides): WholesaleTier[];
  breakdown(costPrice: number, shippingCost?: number, context?: PolicyOverrides): PriceBreakdown;
  metricsFor(price: number, costPrice: number, shippingCost?: number, context?: PolicyOverrides): PriceMetrics;
}

/**
 * Listing price derivation for one request, before rounding
 */
interface ListingDerivation {
  policy: ChannelPolicy; // Request-scoped copy with overrides applied
  rawPrice: number;
  rates: MetricRates;
  steps: BreakdownStep[];
  notes: string[];
}

function formatPercent(rate: number): string {
  return `${roundMoney(rate * 100)}%`;
}

function roundRate(rate: number): number {
  return Math.round(rate * 1e6) / 1e6;
}

/**
 * Default commission for a commission-driven channel: midpoint of its published bounds
 */
export function defaultCommission(policy: CommissionChannelPolicy): number {
  return roundRate((policy.commissionBounds.min + policy.commissionBounds.max) / 2);
}

/**
 * Category rate from a policy table, own keys only
 */
function categoryRate(rates: Readonly<Record<string, number>> | undefined, category: string): number | undefined {
  return rates !== undefined && Object.hasOwn(rates, category) ? rates[category] : undefined;
}

/**
 * Apply the overrides every pricing model shares
 */
function withSharedOverrides<P extends ChannelPolicy>(policy: P, context: PolicyOverrides): P {
  return {
    ...policy,
    taxRate: context.taxRate ?? policy.taxRate,
    aggressiveDiscountRate: context.aggressiveDiscountRate ?? policy.aggressiveDiscountRate,
    promoDiscountRate: context.promoDiscountRate ?? policy.promoDiscountRate,
    roundingRule: context.rounding ?? policy.roundingRule,
  };
}

// ============================================================
// MARKUP-DRIVEN CHANNELS
// listing = totalCost × markup / (1 − tax)
// ============================================================

function deriveMarkupListing(
  sharedPolicy: MarkupChannelPolicy,
  cost: number,
  context: PolicyOverrides
): ListingDerivation {
  const notes: string[] = [];
  let markup = sharedPolicy.markupMultiplier;

  if (context.markupMultiplier !== undefined) {
    markup = context.markupMultiplier;
    notes.push(`Markup ×${markup} supplied by caller (policy default ×${sharedPolicy.markupMultiplier})`);
  } else if (context.category) {
    const categoryMarkup = categoryRate(sharedPolicy.categoryMarkups, context.category);
    if (categoryMarkup !== undefined) {
      markup = categoryMarkup;
      notes.push(`Category '${context.category}' markup ×${markup}`);
    } else {
      notes.push(`Category '${context.category}' has no specific markup - using channel default`);
    }
  }

  if (context.commissionPercent !== undefined) {
    notes.push(`Commission ${formatPercent(context.commissionPercent)} supplied by caller (metrics only)`);
  }

  const policy: MarkupChannelPolicy = { ...withSharedOverrides(sharedPolicy, context), markupMultiplier: markup };
  const marked = cost * markup;
  const rawPrice = basePrice(cost, markup, policy.taxRate);

  return {
    policy,
    rawPrice,
    rates: { taxRate: policy.taxRate, commissionRate: context.commissionPercent ?? 0 },
    steps: [
      { label: `Markup (×${markup})`, value: roundMoney(marked) },
      { label: `Tax (${formatPercent(policy.taxRate)})`, value: roundMoney(rawPrice) },
    ],
    notes,
  };
}

// ============================================================
// COMMISSION-DRIVEN CHANNELS
// price × (1 − commission − tax − fees − target margin) = totalCost
// ============================================================

function deriveCommissionListing(
  sharedPolicy: CommissionChannelPolicy,
  cost: number,
  context: PolicyOverrides
): ListingDerivation {
  const notes: string[] = [];
  const policyDefault = defaultCommission(sharedPolicy);
  let commission = policyDefault;

  if (context.commissionPercent !== undefined) {
    commission = context.commissionPercent;
    notes.push(
      `Commission ${formatPercent(commission)} supplied by caller (policy default ${formatPercent(policyDefault)})`
    );
    const { min, max } = sharedPolicy.commissionBounds;
    if (commission < min || commission > max) {
      notes.push(
        `Commission ${formatPercent(commission)} is outside the published range ${formatPercent(min)}-${formatPercent(max)}`
      );
    }
  } else if (context.category) {
    const categoryCommission = categoryRate(sharedPolicy.categoryCommissions, context.category);
    if (categoryCommission !== undefined) {
      commission = categoryCommission;
      notes.push(`Category '${context.category}' commission ${formatPercent(commission)}`);
    } else {
      notes.push(
        `Category '${context.category}' has no specific commission - using midpoint ${formatPercent(policyDefault)}`
      );
    }
  } else {
    notes.push(`Commission defaults to the midpoint of the published range: ${formatPercent(policyDefault)}`);
  }

  if (context.markupMultiplier !== undefined) {
    notes.push(`Markup override ignored - ${sharedPolicy.name} prices from commission and fees`);
  }

  const policy = withSharedOverrides(sharedPolicy, context);
  const feeTotal = policy.feeRates.reduce((sum, fee) => sum + fee.rate, 0);
  const totalRate = roundRate(commission + policy.taxRate + feeTotal + policy.targetMarginRate);

  if (!Number.isFinite(totalRate) || totalRate >= 1) {
    throw new DomainError(
      'INFEASIBLE_RATES',
      `${policy.name}: commission ${formatPercent(commission)} + tax ${formatPercent(policy.taxRate)} + fees ${formatPercent(feeTotal)} + target margin ${formatPercent(policy.targetMarginRate)} = ${formatPercent(totalRate)}, no positive price covers cost`
    );
  }

  const rawPrice = cost / (1 - totalRate);

  return {
    policy,
    rawPrice,
    rates: { taxRate: policy.taxRate, commissionRate: roundRate(commission + feeTotal) },
    steps: [
      { label: `Commission (${formatPercent(commission)})`, value: roundMoney(rawPrice * commission) },
      { label: `Tax (${formatPercent(policy.taxRate)})`, value: roundMoney(rawPrice * policy.taxRate) },
      ...policy.feeRates.map((fee) => ({
        label: `${fee.label} (${formatPercent(fee.rate)})`,
        value: roundMoney(rawPrice * fee.rate),
      })),
      {
        label: `Target margin (${formatPercent(policy.targetMarginRate)})`,
        value: roundMoney(rawPrice * policy.targetMarginRate),
      },
      { label: 'Price before rounding', value: roundMoney(rawPrice) },
    ],
    notes,
  };
}

function deriveListing(policy: ChannelPolicy, cost: number, context: PolicyOverrides): ListingDerivation {
  switch (policy.pricingModel) {
    case 'markup':
      return deriveMarkupListing(policy, cost, context);
    case 'commission':
      return deriveCommissionListing(policy, cost, context);
  }
}

/**
 * All prices for one request
 */
interface DerivedPrices {
  derivation: ListingDerivation;
  floorPrice: number;
  listingPrice: number;
  aggressivePrice: number;
  promoPrice: number;
  announcementPrice: number;
  floorNotes: string[];
}

function derivePrices(
  policy: ChannelPolicy,
  costPrice: number,
  shippingCost: number,
  context: PolicyOverrides
): DerivedPrices {
  const floorPrice = totalCost(costPrice, shippingCost);
  const derivation = deriveListing(policy, floorPrice, context);
  const { roundingRule, aggressiveDiscountRate, promoDiscountRate } = derivation.policy;
  const floorNotes: string[] = [];

  const listingPrice = roundToPolicy(derivation.rawPrice, roundingRule, floorPrice);
  if (roundToPolicy(derivation.rawPrice, roundingRule) < floorPrice) {
    floorNotes.push('Listing price raised to the total cost floor');
  }

  const discounted = (label: string, discount: number): number => {
    const price = discountedPrice(listingPrice, discount, roundingRule, floorPrice);
    if (discountedPrice(listingPrice, discount, roundingRule, 0) < floorPrice) {
      floorNotes.push(`${label} price raised to the total cost floor`);
    }
    return price;
  };

  const aggressivePrice = discounted('Aggressive', aggressiveDiscountRate);
  const promoPrice = discounted('Promo', promoDiscountRate);

  return {
    derivation,
    floorPrice,
    listingPrice,
    aggressivePrice,
    promoPrice,
    announcementPrice: announcementPrice(promoPrice, roundingRule, floorPrice),
    floorNotes,
  };
}

/**
 * Build the calculator for one channel from its policy.
 * The policy is captured as-is; overrides only ever produce request-scoped copies.
 */
export function createChannelCalculator(policy: ChannelPolicy): ChannelCalculator {
  const tiersFor = (prices: DerivedPrices) =>
    buildWholesaleTiers(
      prices.listingPrice,
      prices.derivation.policy.wholesaleTiers,
      prices.derivation.policy.roundingRule,
      prices.floorPrice
    );

  return {
    channel: policy.channel,
    pricingModel: policy.pricingModel,
    policy,

    listingPrice(costPrice, shippingCost = 0, context = {}) {
      return derivePrices(policy, costPrice, shippingCost, context).listingPrice;
    },

    aggressivePrice(costPrice, shippingCost = 0, context = {}) {
      return derivePrices(policy, costPrice, shippingCost, context).aggressivePrice;
    },

    promoPrice(costPrice, shippingCost = 0, context = {}) {
      return derivePrices(policy, costPrice, shippingCost, context).promoPrice;
    },

    wholesaleTiers(costPrice, shippingCost = 0, context = {}) {
      const prices = derivePrices(policy, costPrice, shippingCost, context);
      const { rates } = prices.derivation;
      return tiersFor(prices).map((tier) => ({
        ...tier,
        metrics: calculateMetrics(tier.price, costPrice, shippingCost, rates),
      }));
    },

    breakdown(costPrice, shippingCost = 0, context = {}) {
      const prices = derivePrices(policy, costPrice, shippingCost, context);
      const { derivation } = prices;
      const effective = derivation.policy;

      const steps: BreakdownStep[] = [
        { label: 'Product cost', value: roundMoney(costPrice) },
        { label: 'Shipping cost', value: roundMoney(shippingCost) },
        { label: 'Total cost', value: roundMoney(prices.floorPrice) },
        ...derivation.steps,
        { label: 'Listing price (rounded)', value: prices.listingPrice },
        {
          label: `Aggressive price (-${formatPercent(effective.aggressiveDiscountRate)})`,
          value: prices.aggressivePrice,
        },
        { label: `Promo price (-${formatPercent(effective.promoDiscountRate)})`, value: prices.promoPrice },
        { label: 'Announcement price', value: prices.announcementPrice },
      ];

      const notes = [
        `Channel: ${effective.name} (${effective.channel})`,
        `Pricing model: ${effective.pricingModel}`,
        `Minimum margin configured: ${formatPercent(effective.minimumMarginRate)}`,
        ...derivation.notes,
        ...prices.floorNotes,
      ];

      return buildBreakdown({
        channel: policy.channel,
        pricingModel: policy.pricingModel,
        costPrice,
        shippingCost,
        rates: derivation.rates,
        listingPrice: prices.listingPrice,
        aggressivePrice: prices.aggressivePrice,
        promoPrice: prices.promoPrice,
        announcementPrice: prices.announcementPrice,
        wholesaleTiers: tiersFor(prices),
        steps,
        notes,
      });
    },

    metricsFor(price, costPrice, shippingCost = 0, context = {}) {
      const { rates } = deriveListing(policy, totalCost(costPrice, shippingCost), context);
      return calculateMetrics(price, costPrice, shippingCost, rates);
    },
  };
}
