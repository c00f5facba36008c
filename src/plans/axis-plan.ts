/**
 * Axis plan contract
 *
 * The expansion engine consumes every plan through this contract only:
 * a size, a relativity flag and a restartable, deterministic iteration.
 */

export interface AxisPlan<T> {
  /** Variant tag of the plan ('none' contributes nothing) */
  readonly kind: string;
  /** Whether values are deltas from the current position rather than device coordinates */
  readonly isRelative: boolean;
  size(): number;
  iterate(): IterableIterator<T>;
  /** Literal form, accepted back by the sequence schema */
  toJSON(): Record<string, unknown> | undefined;
}

/**
 * Physical size of one camera field of view
 */
export interface FieldOfView {
  width: number;
  height: number;
}

/**
 * Grid plans need the field of view to turn percentage overlap into steps
 */
export interface FovAxisPlan<T> {
  readonly kind: string;
  readonly isRelative: boolean;
  size(fov: FieldOfView): number;
  iterate(fov: FieldOfView): IterableIterator<T>;
  toJSON(): Record<string, unknown> | undefined;
}

/**
 * Inclusive stepped range: `start`, `start + step`, ... up to `stop`.
 * Half a step of slack keeps the end point despite float error.
 * A zero step yields only `start`.
 */
export function steppedRange(start: number, stop: number, step: number): number[] {
  if (step === 0) {
    return [start];
  }
  const increment = stop >= start ? Math.abs(step) : -Math.abs(step);
  const count = Math.ceil((Math.abs(stop - start) + Math.abs(step) / 2) / Math.abs(step));
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(start + i * increment);
  }
  return values;
}
