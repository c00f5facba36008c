/**
 * Tests for autofocus plans
 */

import { describe, it, expect } from 'vitest';
import { AxesBasedAutofocus, NoAutofocusPlan } from './autofocus-plan';

describe('AxesBasedAutofocus', () => {
  const plan = new AxesBasedAutofocus('Z1', ['p', 'g'], 12);

  it('should build a directive with the motor offset and stage z', () => {
    expect(plan.directive(4)).toEqual({ autofocusDeviceName: 'Z1', autofocusMotorOffset: 12, zStagePosition: 4 });
  });

  it('should still build a directive without z when the motor offset is set', () => {
    expect(plan.directive(undefined)).toEqual({ autofocusDeviceName: 'Z1', autofocusMotorOffset: 12 });
  });

  it('should build nothing without either', () => {
    expect(new AxesBasedAutofocus('Z1', ['p']).directive(undefined)).toBeUndefined();
  });

  it('should require a relative z plan only when it can trigger', () => {
    expect(plan.requiresRelativeZ).toBe(true);
    expect(new NoAutofocusPlan().requiresRelativeZ).toBe(false);
  });

  it('should serialize its fields', () => {
    expect(plan.toJSON()).toEqual({ autofocusDeviceName: 'Z1', autofocusMotorOffset: 12, axes: ['p', 'g'] });
    expect(new NoAutofocusPlan().toJSON()).toBeUndefined();
  });
});
