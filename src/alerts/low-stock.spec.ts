import { evaluateLowStock } from './low-stock';

describe('evaluateLowStock', () => {
  it('compares on-hand against the threshold on the on_hand basis', () => {
    expect(evaluateLowStock({ onHand: 50, reserved: 45 }, 10, 'on_hand')).toBe(false);
    expect(evaluateLowStock({ onHand: 9, reserved: 0 }, 10, 'on_hand')).toBe(true);
  });

  it('compares unreserved stock against the threshold on the available basis', () => {
    expect(evaluateLowStock({ onHand: 50, reserved: 45 }, 10, 'available')).toBe(true);
    expect(evaluateLowStock({ onHand: 50, reserved: 40 }, 10, 'available')).toBe(false);
  });

  it('is not low exactly at the threshold', () => {
    expect(evaluateLowStock({ onHand: 10, reserved: 0 }, 10, 'on_hand')).toBe(false);
  });

  it('never triggers when the threshold is 0', () => {
    expect(evaluateLowStock({ onHand: 0, reserved: 0 }, 0, 'on_hand')).toBe(false);
    expect(evaluateLowStock({ onHand: 0, reserved: 0 }, 0, 'available')).toBe(false);
  });
});
