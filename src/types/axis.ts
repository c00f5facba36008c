/**
 * Axis identifiers
 * Single-character tags naming the dimensions of an acquisition
 */

export const Axis = {
  TIME: 't',
  POSITION: 'p',
  CHANNEL: 'c',
  Z: 'z',
  GRID: 'g',
} as const;

export type Axis = (typeof Axis)[keyof typeof Axis];

/** Every axis, in the default acquisition order */
export const ALL_AXES: readonly Axis[] = [Axis.TIME, Axis.POSITION, Axis.GRID, Axis.CHANNEL, Axis.Z];

export const DEFAULT_AXIS_ORDER = 'tpgcz';

/**
 * Per-axis integer index of one event (only axes that vary are present)
 */
export type AxisIndex = Partial<Record<Axis, number>>;

export function isAxis(value: string): value is Axis {
  return ALL_AXES.some((axis) => axis === value);
}

/**
 * Human-readable axis name, used in summaries and error messages
 */
export function getAxisName(axis: Axis): string {
  switch (axis) {
    case Axis.TIME:
      return 'time';
    case Axis.POSITION:
      return 'position';
    case Axis.CHANNEL:
      return 'channel';
    case Axis.Z:
      return 'z';
    case Axis.GRID:
      return 'grid';
  }
}

/**
 * True when `first` appears before `second` in an axis order string.
 * Axes missing from the order never precede anything.
 */
export function axisPrecedes(order: readonly Axis[], first: Axis, second: Axis): boolean {
  const a = order.indexOf(first);
  const b = order.indexOf(second);
  return a !== -1 && b !== -1 && a < b;
}
