/**
 * Stage position
 *
 * Any coordinate may be undefined, meaning "do not move this axis".
 * A position may own a sub-sequence acquired locally at that position.
 */

import type { MDASequence } from '../core/mda-sequence';
import { ConfigurationError } from '../types/errors';

/**
 * Device property override: [device, property, value]
 */
export type PropertyTuple = readonly [string, string, string | number | boolean];

export interface PositionOptions {
  x?: number;
  y?: number;
  z?: number;
  name?: string;
  sequence?: MDASequence;
  properties?: readonly PropertyTuple[];
}

/**
 * Reject sub-sequences that define stage positions of their own
 * (only one level of position nesting is allowed).
 */
export function assertNoNestedPositions(sequence: MDASequence | undefined, label: string): void {
  if (sequence && sequence.stagePositions.length > 0) {
    throw new ConfigurationError(
      'nested_positions',
      `${label}: a position sub-sequence cannot define stage positions ` +
        `(found ${sequence.stagePositions.length})`
    );
  }
}

export class Position {
  readonly x?: number;
  readonly y?: number;
  readonly z?: number;
  readonly name?: string;
  readonly sequence?: MDASequence;
  readonly properties?: readonly PropertyTuple[];

  constructor(options: PositionOptions = {}) {
    assertNoNestedPositions(options.sequence, `Position ${options.name ?? ''}`.trim());
    this.x = options.x;
    this.y = options.y;
    this.z = options.z;
    this.name = options.name;
    this.sequence = options.sequence;
    this.properties = options.properties ? [...options.properties] : undefined;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return {
      x: this.x,
      y: this.y,
      z: this.z,
      name: this.name,
      sequence: this.sequence?.toJSON(),
      properties: this.properties?.map((p) => [...p]),
    };
  }
}
