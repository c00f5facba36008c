/**
 * Tests for Z Plans
 */

import { describe, it, expect } from 'vitest';
import { NoZPlan, ZTopBottom, ZRangeAround, ZAboveBelow, ZRelativePositions, ZAbsolutePositions } from './z-plan';
import { steppedRange } from './axis-plan';

describe('steppedRange', () => {
  it('should include both ends', () => {
    expect(steppedRange(0, 3, 1)).toEqual([0, 1, 2, 3]);
  });

  it('should count down when stop is below start', () => {
    expect(steppedRange(2, 0, 1)).toEqual([2, 1, 0]);
  });

  it('should yield only the start for a zero step', () => {
    expect(steppedRange(5, 10, 0)).toEqual([5]);
  });
});

describe('Z Plans', () => {
  it('should be empty without a plan', () => {
    const plan = new NoZPlan();
    expect(plan.size()).toBe(0);
    expect(plan.toJSON()).toBeUndefined();
  });

  it('should centre a range on zero', () => {
    const plan = new ZRangeAround(4, 1);
    expect(plan.positions()).toEqual([-2, -1, 0, 1, 2]);
    expect(plan.isRelative).toBe(true);
    expect(plan.middleIndex()).toBe(2);
  });

  it('should reverse the order when not going up', () => {
    expect([...new ZRangeAround(4, 1, false).iterate()]).toEqual([2, 1, 0, -1, -2]);
  });

  it('should step from bottom to top for absolute bounds', () => {
    const plan = new ZTopBottom(10, 8, 1);
    expect(plan.positions()).toEqual([8, 9, 10]);
    expect(plan.isRelative).toBe(false);
  });

  it('should go from below to above', () => {
    expect(new ZAboveBelow(2, 1, 1).positions()).toEqual([-1, 0, 1, 2]);
  });

  it('should keep explicit positions in the given order', () => {
    expect(new ZRelativePositions([3, -1]).positions()).toEqual([3, -1]);
    const absolute = new ZAbsolutePositions([5, 1]);
    expect(absolute.positions()).toEqual([5, 1]);
    expect(absolute.isRelative).toBe(false);
  });

  it('should serialize its parameters', () => {
    expect(new ZRangeAround(4, 0.5).toJSON()).toEqual({ range: 4, step: 0.5, goUp: true });
  });
});
