/**
 * Time plans
 * Values are offsets in seconds from the start of the acquisition.
 */

import { AxisPlan } from './axis-plan';

export type TimePlanKind =
  | 'none'
  | 'interval_loops'
  | 'duration_loops'
  | 'interval_duration'
  | 'multi_phase';

abstract class TimePlanBase implements AxisPlan<number> {
  abstract readonly kind: TimePlanKind;
  readonly isRelative = true;

  /** Time points, in seconds from the start */
  abstract deltas(): number[];

  abstract toJSON(): Record<string, unknown> | undefined;

  size(): number {
    return this.deltas().length;
  }

  *iterate(): IterableIterator<number> {
    yield* this.deltas();
  }
}

export class NoTimePlan extends TimePlanBase {
  readonly kind = 'none';

  deltas(): number[] {
    return [];
  }

  toJSON(): undefined {
    return undefined;
  }
}

/**
 * `loops` time points, `interval` seconds apart
 */
export class IntervalLoopsPlan extends TimePlanBase {
  readonly kind = 'interval_loops';

  constructor(
    readonly interval: number,
    readonly loops: number
  ) {
    super();
  }

  deltas(): number[] {
    return Array.from({ length: this.loops }, (_, i) => i * this.interval);
  }

  toJSON(): Record<string, unknown> {
    return { interval: this.interval, loops: this.loops };
  }
}

/**
 * `loops` time points spread evenly over `duration` seconds
 */
export class DurationLoopsPlan extends TimePlanBase {
  readonly kind = 'duration_loops';

  constructor(
    readonly duration: number,
    readonly loops: number
  ) {
    super();
  }

  get interval(): number {
    return this.loops > 1 ? this.duration / (this.loops - 1) : 0;
  }

  deltas(): number[] {
    const interval = this.interval;
    return Array.from({ length: this.loops }, (_, i) => i * interval);
  }

  toJSON(): Record<string, unknown> {
    return { duration: this.duration, loops: this.loops };
  }
}

/**
 * Every `interval` seconds for `duration` seconds (both ends included).
 * `prioritizeDuration` is carried for the acquisition engine; expansion ignores it.
 */
export class IntervalDurationPlan extends TimePlanBase {
  readonly kind = 'interval_duration';

  constructor(
    readonly interval: number,
    readonly duration: number,
    readonly prioritizeDuration: boolean = true
  ) {
    super();
  }

  get loops(): number {
    return Math.floor(this.duration / this.interval) + 1;
  }

  deltas(): number[] {
    return Array.from({ length: this.loops }, (_, i) => i * this.interval);
  }

  toJSON(): Record<string, unknown> {
    return {
      interval: this.interval,
      duration: this.duration,
      prioritizeDuration: this.prioritizeDuration,
    };
  }
}

export type TimePhase = IntervalLoopsPlan | DurationLoopsPlan | IntervalDurationPlan;

/**
 * Phases run back to back. The shared start point of consecutive phases
 * is only acquired once.
 */
export class MultiPhaseTimePlan extends TimePlanBase {
  readonly kind = 'multi_phase';

  constructor(readonly phases: readonly TimePhase[]) {
    super();
  }

  deltas(): number[] {
    if (this.phases.length === 0) {
      return [];
    }
    const result = [0];
    let accumulated = 0;
    for (const phase of this.phases) {
      const phaseDeltas = phase.deltas();
      phaseDeltas.forEach((delta, i) => {
        if (i === 0 && delta === 0) return;
        result.push(accumulated + delta);
      });
      if (phaseDeltas.length > 0) {
        accumulated += phaseDeltas[phaseDeltas.length - 1];
      }
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return { phases: this.phases.map((phase) => phase.toJSON()) };
  }
}

export type TimePlan =
  | NoTimePlan
  | IntervalLoopsPlan
  | DurationLoopsPlan
  | IntervalDurationPlan
  | MultiPhaseTimePlan;
