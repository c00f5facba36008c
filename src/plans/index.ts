/**
 * Plans module - per-axis plans consumed by the expansion engine
 */

export type { AxisPlan, FovAxisPlan, FieldOfView } from './axis-plan';
export { steppedRange } from './axis-plan';

export type { TimePlan, TimePlanKind, TimePhase } from './time-plan';
export {
  NoTimePlan,
  IntervalLoopsPlan,
  DurationLoopsPlan,
  IntervalDurationPlan,
  MultiPhaseTimePlan,
} from './time-plan';

export type { ZPlan, ZPlanKind } from './z-plan';
export {
  NoZPlan,
  ZTopBottom,
  ZRangeAround,
  ZAboveBelow,
  ZRelativePositions,
  ZAbsolutePositions,
} from './z-plan';

export type {
  GridPlan,
  GridPlanKind,
  GridOrderMode,
  GridOptions,
  GridPosition,
  RelativeTo,
} from './grid-plan';
export {
  GRID_ORDER_MODES,
  NoGridPlan,
  GridRowsColumns,
  GridWidthHeight,
  GridFromEdges,
  iterGridCells,
} from './grid-plan';

export type { AutofocusPlan, AutofocusDirective } from './autofocus-plan';
export { NoAutofocusPlan, AxesBasedAutofocus } from './autofocus-plan';

export type { ChannelOptions, ChannelRef } from './channel';
export { Channel } from './channel';

export type { PositionOptions, PropertyTuple } from './position';
export { Position, assertNoNestedPositions } from './position';
