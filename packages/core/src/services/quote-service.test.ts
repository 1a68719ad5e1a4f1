import { describe, it, expect } from 'vitest';
import { createQuoteService } from './quote-service';
import { buildPolicyTable } from './policy-loader';
import { CHANNEL_IDS, DEFAULT_CHANNEL_POLICIES, type PriceBreakdown } from '../types';
import { DomainError, ValidationError } from '../errors';

const COST_PRICES = [0.5, 1, 9.99, 49.9, 100, 333.33, 1250];
const SHIPPING_COSTS = [0, 15, 42.5];

function allPrices(breakdown: PriceBreakdown): number[] {
  return [
    breakdown.listing.price,
    breakdown.aggressive.price,
    breakdown.promo.price,
    breakdown.announcement.price,
    ...breakdown.wholesaleTiers.map((tier) => tier.price),
  ];
}

describe('QuoteService', () => {
  const service = createQuoteService();

  describe('quote', () => {
    it('should price Shopee from its markup and tax', () => {
      const breakdown = service.quote({ costPrice: 100, shippingCost: 15, channel: 'shopee' });

      expect(breakdown.channel).toBe('shopee');
      expect(breakdown.listing.price).toBe(235.99);
      // 235.99 × (1 − 0.15) = 200.59
      expect(breakdown.aggressive.price).toBe(200.99);
    });

    it('should price Mercado Livre from the caller commission', () => {
      // 100 / (1 − 0.12 − 0.08 − 0.05 − 0.20) = 181.82
      const breakdown = service.quote({
        costPrice: 100,
        shippingCost: 0,
        channel: 'mercadolivre',
        context: { commissionPercent: 0.12 },
      });

      expect(breakdown.listing.price).toBe(181.99);
    });

    it('should price Mercado Livre from the midpoint commission when none is given', () => {
      // 115 / (1 − 0.15 − 0.08 − 0.05 − 0.20) = 221.15
      const breakdown = service.quote({ costPrice: 100, shippingCost: 15, channel: 'mercadolivre' });

      expect(breakdown.listing.price).toBe(221.99);
      expect(breakdown.steps).toContainEqual({ label: 'Commission (15%)', value: 33.17 });
    });

    it('should refuse an unknown marketplace without a partial breakdown', () => {
      expect(() => service.quote({ costPrice: 100, channel: 'unknown_marketplace' })).toThrow(DomainError);
    });

    it('should refuse a negative cost whatever the channel', () => {
      for (const channel of ['shopee', 'unknown_marketplace']) {
        expect(() => service.quote({ costPrice: -5, channel })).toThrow(ValidationError);
      }
    });

    it('should offer Shopee wholesale tiers with rising quantities and falling prices', () => {
      const { wholesaleTiers } = service.quote({ costPrice: 100, channel: 'shopee' });

      expect(wholesaleTiers.map(({ minQuantity, price }) => ({ minQuantity, price }))).toEqual([
        { minQuantity: 3, price: 194.99 },
        { minQuantity: 6, price: 184.99 },
        { minQuantity: 12, price: 174.99 },
      ]);
      for (let i = 1; i < wholesaleTiers.length; i++) {
        expect(wholesaleTiers[i].minQuantity).toBeGreaterThan(wholesaleTiers[i - 1].minQuantity);
        expect(wholesaleTiers[i].price).toBeLessThanOrEqual(wholesaleTiers[i - 1].price);
      }
    });

    it('should price categories named like built-in object properties from the channel defaults', () => {
      const shopee = { costPrice: 100, channel: 'shopee', context: { category: 'constructor' } };
      const mercadolivre = { costPrice: 100, channel: 'mercadolivre', context: { category: '__proto__' } };

      expect(service.validate(shopee)).toEqual([]);
      expect(service.quote(shopee).listing.price).toBe(204.99);
      expect(service.validate(mercadolivre)).toEqual([]);
      expect(service.quote(mercadolivre).listing.price).toBe(192.99);
      expect(service.calculateMetrics({ ...mercadolivre, price: 192.99 })).toEqual(
        service.quote(mercadolivre).listing.metrics
      );
    });

    it('should return identical output for identical input', () => {
      const request = { costPrice: 49.9, shippingCost: 12.5, channel: 'magalu', context: { category: 'home' } };

      expect(JSON.stringify(service.quote(request))).toBe(JSON.stringify(service.quote(request)));
    });

    it('should hold the price guarantees for every channel and cost', () => {
      for (const channel of CHANNEL_IDS) {
        for (const costPrice of COST_PRICES) {
          for (const shippingCost of SHIPPING_COSTS) {
            const breakdown = service.quote({ costPrice, shippingCost, channel });
            const listing = breakdown.listing.price;

            expect(listing).toBeGreaterThanOrEqual(costPrice + shippingCost);
            expect(breakdown.aggressive.price).toBeLessThanOrEqual(listing);
            expect(breakdown.promo.price).toBeLessThanOrEqual(listing);
            expect(breakdown.announcement.price).toBeGreaterThanOrEqual(costPrice + shippingCost);

            let previous = { minQuantity: 1, price: listing };
            for (const tier of breakdown.wholesaleTiers) {
              expect(tier.minQuantity).toBeGreaterThan(previous.minQuantity);
              expect(tier.price).toBeLessThanOrEqual(previous.price);
              previous = tier;
            }

            for (const price of allPrices(breakdown)) {
              expect(price.toFixed(2).endsWith('.99')).toBe(true);
            }
          }
        }
      }
    });

    it('should follow the rounding rule the policy declares', () => {
      const wholeUnits = createQuoteService(
        buildPolicyTable(DEFAULT_CHANNEL_POLICIES, { shopee: { roundingRule: 'nearest_unit' } })
      );
      const breakdown = wholeUnits.quote({ costPrice: 100, shippingCost: 15, channel: 'shopee' });

      expect(breakdown.listing.price).toBe(235);
      expect(breakdown.aggressive.price).toBe(200);
      expect(breakdown.promo.price).toBe(188);
      expect(breakdown.announcement.price).toBe(221);
      for (const price of allPrices(breakdown)) {
        expect(Number.isInteger(price)).toBe(true);
      }
    });

    it('should follow a per-request rounding override', () => {
      const breakdown = service.quote({
        costPrice: 100,
        shippingCost: 15,
        channel: 'shopee',
        context: { rounding: 'nearest_95' },
      });

      for (const price of allPrices(breakdown)) {
        expect(price.toFixed(2).endsWith('.95')).toBe(true);
      }
    });
  });

  describe('calculateMetrics', () => {
    it('should evaluate a price the seller is considering', () => {
      expect(service.calculateMetrics({ costPrice: 100, shippingCost: 15, channel: 'shopee', price: 235.99 })).toEqual({
        marginPercent: 39.27,
        valueMultiple: 0.81,
        monetaryValue: 92.67,
        taxes: 28.32,
        commissions: 0,
      });
    });
  });

  describe('validate', () => {
    it('should list every bad field without computing anything', () => {
      expect(service.validate({ costPrice: -5, channel: 'nowhere' }).map((e) => e.field)).toEqual([
        'costPrice',
        'channel',
      ]);
    });

    it('should return no errors for a valid request', () => {
      expect(service.validate({ costPrice: 10, channel: 'Telemarketing' })).toEqual([]);
    });
  });

  describe('listPolicies', () => {
    it('should summarise every channel', () => {
      expect(Object.keys(service.listPolicies())).toEqual([...CHANNEL_IDS]);
    });

    it('should summarise a commission-driven channel with its default commission', () => {
      expect(service.listPolicies('MercadoLivre').mercadolivre).toMatchObject({
        pricingModel: 'commission',
        commissionBounds: { min: 0.11, max: 0.19 },
        defaultCommissionPercent: 0.15,
        categories: ['electronics', 'fashion', 'home', 'beauty'],
      });
    });

    it('should summarise a markup-driven channel', () => {
      expect(service.listPolicies('shopee')).toEqual({
        shopee: {
          channel: 'shopee',
          name: 'Shopee',
          pricingModel: 'markup',
          markupMultiplier: 1.8,
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
          categories: ['electronics', 'fashion'],
        },
      });
    });

    it('should refuse an unknown channel', () => {
      expect(() => service.listPolicies('ebay')).toThrow(DomainError);
    });
  });
});
