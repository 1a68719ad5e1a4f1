import type {
  ChannelId,
  ChannelPolicy,
  FieldError,
  PolicySummary,
  PolicyTable,
  PriceBreakdown,
  PriceMetrics,
} from '../types';
import { CalculatorFactory } from './calculator-factory';
import { defaultCommission } from './channel-calculators';
import { totalCost } from './pricing-engine';
import { parseMetricsRequest, parsePricingRequest, validatePricingRequest } from './validation';

/**
 * Read-only view of a policy
 */
export function summarizePolicy(policy: ChannelPolicy): PolicySummary {
  const shared = {
    channel: policy.channel,
    name: policy.name,
    pricingModel: policy.pricingModel,
    taxRate: policy.taxRate,
    aggressiveDiscountRate: policy.aggressiveDiscountRate,
    promoDiscountRate: policy.promoDiscountRate,
    wholesaleTiers: policy.wholesaleTiers.map((tier) => ({ ...tier })),
    roundingRule: policy.roundingRule,
    minimumMarginRate: policy.minimumMarginRate,
  };

  if (policy.pricingModel === 'markup') {
    return {
      ...shared,
      markupMultiplier: policy.markupMultiplier,
      categories: Object.keys(policy.categoryMarkups ?? {}),
    };
  }

  return {
    ...shared,
    commissionBounds: { ...policy.commissionBounds },
    defaultCommissionPercent: defaultCommission(policy),
    feeRates: policy.feeRates.map((fee) => ({ ...fee })),
    targetMarginRate: policy.targetMarginRate,
    categories: Object.keys(policy.categoryCommissions ?? {}),
  };
}

/**
 * Guard the guarantees sellers audit by hand. A failure here is a bug, not bad input.
 */
function assertInvariants(breakdown: PriceBreakdown, costPrice: number, shippingCost: number): void {
  const floor = totalCost(costPrice, shippingCost);
  const listing = breakdown.listing.price;
  const problems: string[] = [];

  if (!(listing > 0) || listing < floor) {
    problems.push(`listing ${listing} below total cost ${floor}`);
  }
  if (breakdown.aggressive.price > listing) {
    problems.push(`aggressive ${breakdown.aggressive.price} above listing ${listing}`);
  }
  if (breakdown.promo.price > listing) {
    problems.push(`promo ${breakdown.promo.price} above listing ${listing}`);
  }

  if (problems.length > 0) {
    throw new Error(`Price invariants violated for ${breakdown.channel}: ${problems.join('; ')}`);
  }
}

/**
 * Quote service - validates requests and produces complete price breakdowns
 */
export class QuoteService {
  private factory: CalculatorFactory;

  constructor(factory: CalculatorFactory = new CalculatorFactory()) {
    this.factory = factory;
  }

  /**
   * Every price for a product on a channel, or an error. Never a partial breakdown.
   */
  quote(input: unknown): PriceBreakdown {
    const request = parsePricingRequest(input, this.factory);
    const calculator = this.factory.get(request.channel);
    const shippingCost = request.shippingCost ?? 0;

    const breakdown = calculator.breakdown(request.costPrice, shippingCost, request.context);
    assertInvariants(breakdown, request.costPrice, shippingCost);
    return breakdown;
  }

  /**
   * Metrics for a price the seller is considering
   */
  calculateMetrics(input: unknown): PriceMetrics {
    const request = parseMetricsRequest(input, this.factory);
    const calculator = this.factory.get(request.channel);
    return calculator.metricsFor(request.price, request.costPrice, request.shippingCost ?? 0, request.context);
  }

  /**
   * Field errors for a request, without computing anything
   */
  validate(input: unknown): FieldError[] {
    return validatePricingRequest(input, this.factory);
  }

  /**
   * Policy summaries, for one channel or all of them
   */
  listPolicies(channel?: string): Partial<Record<ChannelId, PolicySummary>> {
    const policies: Partial<Record<ChannelId, PolicySummary>> = {};

    if (channel !== undefined) {
      const calculator = this.factory.get(channel);
      policies[calculator.channel] = summarizePolicy(calculator.policy);
      return policies;
    }

    for (const id of this.factory.supportedChannels()) {
      policies[id] = summarizePolicy(this.factory.get(id).policy);
    }
    return policies;
  }

  supportedChannels(): ChannelId[] {
    return this.factory.supportedChannels();
  }
}

/**
 * Quote service over a policy table (defaults when omitted).
 * To pick up new policies, build a new service and swap the reference.
 */
export function createQuoteService(policies?: PolicyTable): QuoteService {
  return new QuoteService(new CalculatorFactory(policies));
}
