/**
 * Z plans
 *
 * Relative plans yield offsets from the current position's z; absolute plans
 * yield stage coordinates. `goUp = false` reverses the order of any plan.
 */

import { AxisPlan, steppedRange } from './axis-plan';

export type ZPlanKind =
  | 'none'
  | 'top_bottom'
  | 'range_around'
  | 'above_below'
  | 'relative_positions'
  | 'absolute_positions';

abstract class ZPlanBase implements AxisPlan<number> {
  abstract readonly kind: ZPlanKind;
  abstract readonly isRelative: boolean;
  abstract readonly goUp: boolean;

  /** Positions from the lowest to the highest plane */
  protected abstract ascending(): number[];

  abstract toJSON(): Record<string, unknown> | undefined;

  /**
   * Positions in acquisition order
   */
  positions(): number[] {
    const values = this.ascending();
    return this.goUp ? values : values.reverse();
  }

  size(): number {
    return this.ascending().length;
  }

  *iterate(): IterableIterator<number> {
    yield* this.positions();
  }

  /**
   * Index of the central plane, the only one acquired by channels that skip the stack
   */
  middleIndex(): number {
    return Math.floor(this.size() / 2);
  }
}

export class NoZPlan extends ZPlanBase {
  readonly kind = 'none';
  readonly isRelative = true;
  readonly goUp = true;

  protected ascending(): number[] {
    return [];
  }

  toJSON(): undefined {
    return undefined;
  }
}

/**
 * Absolute planes from `bottom` to `top`
 */
export class ZTopBottom extends ZPlanBase {
  readonly kind = 'top_bottom';
  readonly isRelative = false;

  constructor(
    readonly top: number,
    readonly bottom: number,
    readonly step: number,
    readonly goUp: boolean = true
  ) {
    super();
  }

  protected ascending(): number[] {
    return steppedRange(this.bottom, this.top, this.step);
  }

  toJSON(): Record<string, unknown> {
    return { top: this.top, bottom: this.bottom, step: this.step, goUp: this.goUp };
  }
}

/**
 * `range` microns centred on the current position
 */
export class ZRangeAround extends ZPlanBase {
  readonly kind = 'range_around';
  readonly isRelative = true;

  constructor(
    readonly range: number,
    readonly step: number,
    readonly goUp: boolean = true
  ) {
    super();
  }

  protected ascending(): number[] {
    return steppedRange(-this.range / 2, this.range / 2, this.step);
  }

  toJSON(): Record<string, unknown> {
    return { range: this.range, step: this.step, goUp: this.goUp };
  }
}

/**
 * From `below` microns under to `above` microns over the current position
 */
export class ZAboveBelow extends ZPlanBase {
  readonly kind = 'above_below';
  readonly isRelative = true;

  constructor(
    readonly above: number,
    readonly below: number,
    readonly step: number,
    readonly goUp: boolean = true
  ) {
    super();
  }

  protected ascending(): number[] {
    return steppedRange(-Math.abs(this.below), Math.abs(this.above), this.step);
  }

  toJSON(): Record<string, unknown> {
    return { above: this.above, below: this.below, step: this.step, goUp: this.goUp };
  }
}

/**
 * Explicit offsets from the current position, acquired in the given order
 */
export class ZRelativePositions extends ZPlanBase {
  readonly kind = 'relative_positions';
  readonly isRelative = true;

  constructor(
    readonly relative: readonly number[],
    readonly goUp: boolean = true
  ) {
    super();
  }

  protected ascending(): number[] {
    return [...this.relative];
  }

  toJSON(): Record<string, unknown> {
    return { relative: [...this.relative], goUp: this.goUp };
  }
}

/**
 * Explicit stage coordinates, acquired in the given order
 */
export class ZAbsolutePositions extends ZPlanBase {
  readonly kind = 'absolute_positions';
  readonly isRelative = false;

  constructor(
    readonly absolute: readonly number[],
    readonly goUp: boolean = true
  ) {
    super();
  }

  protected ascending(): number[] {
    return [...this.absolute];
  }

  toJSON(): Record<string, unknown> {
    return { absolute: [...this.absolute], goUp: this.goUp };
  }
}

export type ZPlan =
  | NoZPlan
  | ZTopBottom
  | ZRangeAround
  | ZAboveBelow
  | ZRelativePositions
  | ZAbsolutePositions;
