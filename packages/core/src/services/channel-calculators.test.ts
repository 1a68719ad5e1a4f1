import { describe, it, expect } from 'vitest';
import { createChannelCalculator } from './channel-calculators';
import { DEFAULT_POLICY_TABLE } from './policy-loader';
import { DomainError } from '../errors';
import type { ChannelId } from '../types';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

const calculatorFor = (channel: ChannelId) => createChannelCalculator(DEFAULT_POLICY_TABLE[channel]);

describe('Channel Calculators', () => {
  describe('markup-driven channels', () => {
    const shopee = calculatorFor('shopee');

    it('should derive every price for Shopee', () => {
      const breakdown = shopee.breakdown(100, 15);

      expect(breakdown.listing.price).toBe(235.99);
      expect(breakdown.aggressive.price).toBe(200.99);
      expect(breakdown.promo.price).toBe(188.99);
      expect(breakdown.announcement.price).toBe(222.99);
    });

    it('should record each derivation step', () => {
      expect(shopee.breakdown(100, 15).steps).toEqual([
        { label: 'Product cost', value: 100 },
        { label: 'Shipping cost', value: 15 },
        { label: 'Total cost', value: 115 },
        { label: 'Markup (×1.8)', value: 207 },
        { label: 'Tax (12%)', value: 235.23 },
        { label: 'Listing price (rounded)', value: 235.99 },
        { label: 'Aggressive price (-15%)', value: 200.99 },
        { label: 'Promo price (-20%)', value: 188.99 },
        { label: 'Announcement price', value: 222.99 },
      ]);
    });

    it('should describe the policy in the notes', () => {
      expect(shopee.breakdown(100, 15).notes).toEqual([
        'Channel: Shopee (shopee)',
        'Pricing model: markup',
        'Minimum margin configured: 20%',
      ]);
    });

    it('should attach metrics to the listing price', () => {
      expect(shopee.breakdown(100, 15).listing.metrics).toEqual({
        marginPercent: 39.27,
        valueMultiple: 0.81,
        monetaryValue: 92.67,
        taxes: 28.32,
        commissions: 0,
      });
    });

    it('should price by category when the policy has a category markup', () => {
      const breakdown = shopee.breakdown(100, 0, { category: 'electronics' });

      expect(breakdown.listing.price).toBe(170.99);
      expect(breakdown.notes).toContain("Category 'electronics' markup ×1.5");
    });

    it('should fall back to the channel markup for an unknown category', () => {
      const breakdown = shopee.breakdown(100, 0, { category: 'toys' });

      expect(breakdown.listing.price).toBe(204.99);
      expect(breakdown.notes).toContain("Category 'toys' has no specific markup - using channel default");
    });

    it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty'])(
      'should treat category %j as a category without its own markup',
      (category) => {
        const breakdown = shopee.breakdown(100, 0, { category });

        expect(breakdown.listing.price).toBe(204.99);
        expect(breakdown.notes).toContain(`Category '${category}' has no specific markup - using channel default`);
      }
    );

    it('should let a caller markup win over the category markup', () => {
      expect(shopee.listingPrice(100, 0, { markupMultiplier: 2, category: 'electronics' })).toBe(227.99);
    });

    it('should apply tax, discount and rounding overrides', () => {
      expect(shopee.listingPrice(100, 0, { taxRate: 0.2 })).toBe(225.99);
      expect(shopee.promoPrice(100, 15, { promoDiscountRate: 0.3 })).toBe(165.99);
      expect(shopee.listingPrice(100, 15, { rounding: 'nearest_95' })).toBe(235.95);
    });

    it('should leave the shared policy untouched by overrides', () => {
      shopee.breakdown(100, 0, { markupMultiplier: 3, taxRate: 0.3 });

      expect(shopee.policy.pricingModel).toBe('markup');
      expect(shopee.policy.taxRate).toBe(0.12);
      expect(shopee.listingPrice(100, 0)).toBe(204.99);
    });

    it('should raise prices below total cost to the floor and say so', () => {
      const breakdown = shopee.breakdown(100, 0, { markupMultiplier: 0.5 });

      expect(breakdown.listing.price).toBe(100.99);
      expect(breakdown.aggressive.price).toBe(100.99);
      expect(breakdown.promo.price).toBe(100.99);
      expect(breakdown.announcement.price).toBe(118.99);
      expect(breakdown.notes).toEqual([
        'Channel: Shopee (shopee)',
        'Pricing model: markup',
        'Minimum margin configured: 20%',
        'Markup ×0.5 supplied by caller (policy default ×1.8)',
        'Listing price raised to the total cost floor',
        'Aggressive price raised to the total cost floor',
        'Promo price raised to the total cost floor',
      ]);
    });

    it('should price the other markup channels from their own policies', () => {
      expect(calculatorFor('amazon').listingPrice(100)).toBe(304.99);
      expect(calculatorFor('shein').listingPrice(100)).toBe(177.99);
      expect(calculatorFor('magalu').listingPrice(100)).toBe(232.99);
      expect(calculatorFor('ecommerce').listingPrice(100)).toBe(294.99);
      expect(calculatorFor('telemarketing').listingPrice(100)).toBe(326.99);
    });

    it('should build wholesale tiers with metrics', () => {
      const tiers = shopee.wholesaleTiers(100, 15);

      expect(tiers.map(({ tier, minQuantity, price }) => ({ tier, minQuantity, price }))).toEqual([
        { tier: 1, minQuantity: 3, price: 224.99 },
        { tier: 2, minQuantity: 6, price: 212.99 },
        { tier: 3, minQuantity: 12, price: 200.99 },
      ]);
      expect(tiers[0].metrics.taxes).toBe(27);
    });

    it('should report commissions only when the caller supplies a rate', () => {
      expect(shopee.metricsFor(235.99, 100, 15).commissions).toBe(0);
      expect(shopee.metricsFor(235.99, 100, 15, { commissionPercent: 0.1 }).commissions).toBe(23.6);
    });
  });

  describe('commission-driven channels', () => {
    const mercadolivre = calculatorFor('mercadolivre');

    it('should use the caller commission instead of the policy default', () => {
      const breakdown = mercadolivre.breakdown(100, 0, { commissionPercent: 0.12 });

      expect(breakdown.listing.price).toBe(181.99);
      expect(breakdown.aggressive.price).toBe(160.99);
      expect(breakdown.promo.price).toBe(149.99);
      expect(breakdown.announcement.price).toBe(176.99);
      expect(breakdown.notes).toContain('Commission 12% supplied by caller (policy default 15%)');
    });

    it('should charge commission and fees in the listing metrics', () => {
      expect(mercadolivre.breakdown(100, 0, { commissionPercent: 0.12 }).listing.metrics).toEqual({
        marginPercent: 20.05,
        valueMultiple: 0.36,
        monetaryValue: 36.49,
        taxes: 14.56,
        commissions: 30.94,
      });
    });

    it('should default to the midpoint of the published commission range', () => {
      const breakdown = mercadolivre.breakdown(100, 15);

      expect(breakdown.listing.price).toBe(221.99);
      expect(breakdown.notes).toContain('Commission defaults to the midpoint of the published range: 15%');
      expect(breakdown.steps.map((step) => step.label)).toEqual([
        'Product cost',
        'Shipping cost',
        'Total cost',
        'Commission (15%)',
        'Tax (8%)',
        'Advertising (TACoS) (5%)',
        'Target margin (20%)',
        'Price before rounding',
        'Listing price (rounded)',
        'Aggressive price (-12%)',
        'Promo price (-18%)',
        'Announcement price',
      ]);
    });

    it('should use the category commission when there is one', () => {
      const breakdown = mercadolivre.breakdown(100, 0, { category: 'fashion' });

      expect(breakdown.listing.price).toBe(196.99);
      expect(breakdown.notes).toContain("Category 'fashion' commission 16%");
    });

    it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty'])(
      'should treat category %j as a category without its own commission',
      (category) => {
        const breakdown = mercadolivre.breakdown(100, 0, { category });

        expect(breakdown.listing.price).toBe(192.99);
        expect(breakdown.notes).toContain(
          `Category '${category}' has no specific commission - using midpoint 15%`
        );
        expect(mercadolivre.metricsFor(192.99, 100, 0, { category })).toEqual(breakdown.listing.metrics);
        expect(Number.isFinite(breakdown.listing.metrics.marginPercent)).toBe(true);
      }
    );

    it('should note a caller commission outside the published range', () => {
      const breakdown = mercadolivre.breakdown(100, 0, { commissionPercent: 0.25 });

      expect(breakdown.listing.price).toBe(238.99);
      expect(breakdown.notes).toContain('Commission 25% is outside the published range 11%-19%');
    });

    it('should ignore a markup override', () => {
      const breakdown = mercadolivre.breakdown(100, 0, { markupMultiplier: 3 });

      expect(breakdown.listing.price).toBe(192.99);
      expect(breakdown.notes).toContain('Markup override ignored - Mercado Livre prices from commission and fees');
    });

    it('should refuse rates that leave no room for a price', () => {
      const attempt = () => mercadolivre.listingPrice(100, 0, { commissionPercent: 0.7 });

      expect(attempt).toThrow(DomainError);
      expect(attempt).toThrow('= 103%, no positive price covers cost');
      expect(catchError(attempt)).toMatchObject({ code: 'INFEASIBLE_RATES' });
    });

    it('should refuse rates that do not add up to a number', () => {
      const policy = DEFAULT_POLICY_TABLE.mercadolivre;
      if (policy.pricingModel !== 'commission') {
        throw new Error('mercadolivre should be commission-driven');
      }
      const broken = createChannelCalculator({ ...policy, targetMarginRate: Number.NaN });

      expect(catchError(() => broken.listingPrice(100))).toMatchObject({ code: 'INFEASIBLE_RATES' });
    });
  });
});
