import { describe, it, expect } from 'vitest';
import { Position } from './position';
import { MDASequence } from '../core/mda-sequence';
import { ConfigurationError } from '../types/errors';
import { createBufferLogger } from '../logging/buffer-logger';

describe('Position', () => {
  it('should copy its properties', () => {
    const properties: Array<[string, string, number]> = [['Stage', 'Speed', 3]];
    const position = new Position({ name: 'A1', properties });
    properties.push(['Stage', 'Accel', 1]);

    expect(position.properties).toEqual([['Stage', 'Speed', 3]]);
    expect(position.toJSON()).toEqual({
      x: undefined,
      y: undefined,
      z: undefined,
      name: 'A1',
      sequence: undefined,
      properties: [['Stage', 'Speed', 3]],
    });
  });

  it('should reject a sub-sequence with its own stage positions', () => {
    const sub = new MDASequence({ stagePositions: [new Position({ x: 1 })] }, { logger: createBufferLogger() });

    expect(() => new Position({ name: 'A1', sequence: sub })).toThrow(ConfigurationError);
    expect(() => new Position({ name: 'A1', sequence: sub })).toThrow(
      'Position A1: a position sub-sequence cannot define stage positions (found 1)'
    );
  });
});
