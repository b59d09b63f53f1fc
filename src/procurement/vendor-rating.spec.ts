import { emptyRating, scoreVendor, withDelivery, withOrderedUnits } from './vendor-rating';

const AT = '2026-03-01T00:00:00.000Z';

describe('scoreVendor', () => {
  it('is 0 before the first delivery', () => {
    expect(scoreVendor({ deliveries: 0, onTimeDeliveries: 0, orderedUnits: 50, deliveredUnits: 0 })).toBe(0);
  });

  it('weights on-time rate and fill ratio equally: 5 × (0.5×0.5 + 0.5×1) = 3.75', () => {
    expect(scoreVendor({ deliveries: 2, onTimeDeliveries: 1, orderedUnits: 10, deliveredUnits: 10 })).toBe(3.75);
  });

  it('caps the fill ratio at 1', () => {
    expect(scoreVendor({ deliveries: 1, onTimeDeliveries: 1, orderedUnits: 10, deliveredUnits: 15 })).toBe(5);
  });

  it('rounds to two decimals: 5 × (0.5×(1/3) + 0.5×0.5) = 2.0833 → 2.08', () => {
    expect(scoreVendor({ deliveries: 3, onTimeDeliveries: 1, orderedUnits: 20, deliveredUnits: 10 })).toBe(2.08);
  });
});

describe('withDelivery', () => {
  it('counts early and same-day receipts as on time', () => {
    const early = withDelivery(emptyRating('sup-1', AT), { delayDays: -2, units: 4 }, AT);
    expect(early).toMatchObject({ deliveries: 1, onTimeDeliveries: 1, totalDelayDays: 0, deliveredUnits: 4 });
  });

  it('accumulates delay for late receipts', () => {
    const late = withDelivery(emptyRating('sup-1', AT), { delayDays: 3, units: 4 }, AT);
    expect(late).toMatchObject({ deliveries: 1, onTimeDeliveries: 0, totalDelayDays: 3 });
  });
});

describe('withOrderedUnits', () => {
  it('never goes below zero', () => {
    const rating = withOrderedUnits(emptyRating('sup-1', AT), 5, AT);
    expect(withOrderedUnits(rating, -8, AT).orderedUnits).toBe(0);
  });
});
