/**
 * Tests for Schema Validators
 */

import { describe, it, expect } from 'vitest';
import { validateSequenceInput, parseSequenceJson } from './validators';

describe('validateSequenceInput', () => {
  it('should accept an empty sequence', () => {
    const result = validateSequenceInput({});
    expect(result.success).toBe(true);
    expect(result.data).toEqual({});
  });

  it('should expand channel names', () => {
    const result = validateSequenceInput({ channels: ['DAPI', { config: 'FITC', exposure: 10 }] });
    expect(result.data?.channels).toEqual([{ config: 'DAPI' }, { config: 'FITC', exposure: 10 }]);
  });

  it('should accept positions as tuples', () => {
    const result = validateSequenceInput({ stagePositions: [[1, null, 3], [4]] });
    expect(result.success).toBe(true);
    expect(result.data?.stagePositions).toEqual([
      { x: 1, y: undefined, z: 3 },
      { x: 4, y: undefined, z: undefined },
    ]);
  });

  it('should tag plan kinds by their keys', () => {
    const result = validateSequenceInput({
      timePlan: { interval: 1, loops: 2 },
      zPlan: { range: 4, step: 1 },
      gridPlan: { rows: 2, columns: 3 },
      autofocusPlan: { autofocusDeviceName: 'Z1', axes: ['p'] },
    });
    expect(result.data?.timePlan?.kind).toBe('interval_loops');
    expect(result.data?.zPlan?.kind).toBe('range_around');
    expect(result.data?.gridPlan?.kind).toBe('rows_columns');
    expect(result.data?.autofocusPlan?.kind).toBe('axes');
  });

  it('should read a time plan array as phases', () => {
    const result = validateSequenceInput({
      timePlan: [
        { interval: 1, loops: 3 },
        { duration: 10, loops: 2 },
      ],
    });
    const timePlan = result.data?.timePlan;
    expect(timePlan?.kind).toBe('multi_phase');
    expect(timePlan?.kind === 'multi_phase' ? timePlan.phases.map((p) => p.kind) : []).toEqual([
      'interval_loops',
      'duration_loops',
    ]);
  });

  it('should convert duration objects to seconds', () => {
    const result = validateSequenceInput({ timePlan: { interval: { minutes: 1, milliseconds: 500 }, loops: 2 } });
    const timePlan = result.data?.timePlan;
    expect(timePlan?.kind === 'interval_loops' ? timePlan.interval : undefined).toBe(60.5);
  });

  it('should expand a single overlap value to both axes', () => {
    const result = validateSequenceInput({ gridPlan: { rows: 1, columns: 1, overlap: 10 } });
    const gridPlan = result.data?.gridPlan;
    expect(gridPlan?.overlap).toEqual([10, 10]);
  });

  it('should reject keys that mix plan kinds', () => {
    const result = validateSequenceInput({ zPlan: { range: 4, step: 1, top: 3 } });
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^zPlan: /);
  });

  it('should reject an unknown grid mode', () => {
    const result = validateSequenceInput({ gridPlan: { rows: 1, columns: 1, mode: 'spiral' } });
    expect(result.success).toBe(false);
  });

  it('should reject an unknown autofocus axis', () => {
    const result = validateSequenceInput({ autofocusPlan: { autofocusDeviceName: 'Z1', axes: ['q'] } });
    expect(result.success).toBe(false);
  });

  it('should validate position sub-sequences', () => {
    const valid = validateSequenceInput({
      stagePositions: [{ x: 1, sequence: { zPlan: { range: 2, step: 1 } } }],
    });
    expect(valid.data?.stagePositions?.[0].sequence?.zPlan?.kind).toBe('range_around');

    const invalid = validateSequenceInput({ stagePositions: [{ sequence: { channels: [5] } }] });
    expect(invalid.success).toBe(false);
    expect(invalid.errors?.[0]).toMatch(/^stagePositions\.0/);
  });
});

describe('parseSequenceJson', () => {
  it('should parse and validate', () => {
    const result = parseSequenceJson('{"axisOrder": "tpcz", "channels": ["DAPI"]}');
    expect(result.success).toBe(true);
    expect(result.data?.axisOrder).toBe('tpcz');
  });

  it('should report invalid JSON', () => {
    const result = parseSequenceJson('{');
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^Invalid JSON: /);
  });
});
