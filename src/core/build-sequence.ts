/**
 * Build a sequence from a plain literal (parsed JSON or an object literal)
 */

import { ConfigurationError } from '../types/errors';
import { AutofocusPlan, AxesBasedAutofocus, NoAutofocusPlan } from '../plans/autofocus-plan';
import { Channel } from '../plans/channel';
import {
  GridFromEdges,
  GridPlan,
  GridRowsColumns,
  GridWidthHeight,
  NoGridPlan,
} from '../plans/grid-plan';
import { Position } from '../plans/position';
import {
  DurationLoopsPlan,
  IntervalDurationPlan,
  IntervalLoopsPlan,
  MultiPhaseTimePlan,
  NoTimePlan,
  TimePhase,
  TimePlan,
} from '../plans/time-plan';
import {
  NoZPlan,
  ZAboveBelow,
  ZAbsolutePositions,
  ZPlan,
  ZRangeAround,
  ZRelativePositions,
  ZTopBottom,
} from '../plans/z-plan';
import { AutofocusPlanData } from '../schemas/autofocus-plan.schema';
import { GridPlanData } from '../schemas/grid-plan.schema';
import { PositionData, SequenceData } from '../schemas/sequence.schema';
import { TimePhaseData, TimePlanData } from '../schemas/time-plan.schema';
import { ZPlanData } from '../schemas/z-plan.schema';
import { validateSequenceInput } from '../schemas/validators';
import { MDASequence, SequenceOptions } from './mda-sequence';

/**
 * Validate a literal and build the sequence it describes.
 * Schema errors throw ConfigurationError('invalid_input') listing every issue;
 * cross-field rules are applied by the MDASequence constructor.
 */
export function createSequence(literal: unknown, options: SequenceOptions = {}): MDASequence {
  const result = validateSequenceInput(literal);
  if (!result.success || !result.data) {
    const issues = result.errors ?? [];
    throw new ConfigurationError(
      'invalid_input',
      `Invalid sequence: ${issues.join('; ')}`,
      issues
    );
  }
  return buildSequence(result.data, options);
}

/**
 * Build from already-validated data
 */
export function buildSequence(data: SequenceData, options: SequenceOptions = {}): MDASequence {
  return new MDASequence(
    {
      metadata: data.metadata,
      axisOrder: data.axisOrder,
      stagePositions: (data.stagePositions ?? []).map((p) => buildPosition(p, options)),
      gridPlan: buildGridPlan(data.gridPlan),
      channels: (data.channels ?? []).map((c) => new Channel(c)),
      timePlan: buildTimePlan(data.timePlan),
      zPlan: buildZPlan(data.zPlan),
      autofocusPlan: buildAutofocusPlan(data.autofocusPlan),
    },
    options
  );
}

function buildPosition(data: PositionData, options: SequenceOptions): Position {
  return new Position({
    x: data.x,
    y: data.y,
    z: data.z,
    name: data.name,
    properties: data.properties,
    sequence: data.sequence ? buildSequence(data.sequence, options) : undefined,
  });
}

function buildTimePhase(data: TimePhaseData): TimePhase {
  switch (data.kind) {
    case 'interval_loops':
      return new IntervalLoopsPlan(data.interval, data.loops);
    case 'duration_loops':
      return new DurationLoopsPlan(data.duration, data.loops);
    case 'interval_duration':
      return new IntervalDurationPlan(data.interval, data.duration, data.prioritizeDuration);
  }
}

export function buildTimePlan(data: TimePlanData | undefined): TimePlan {
  if (!data) {
    return new NoTimePlan();
  }
  if (data.kind === 'multi_phase') {
    return new MultiPhaseTimePlan(data.phases.map(buildTimePhase));
  }
  return buildTimePhase(data);
}

export function buildZPlan(data: ZPlanData | undefined): ZPlan {
  if (!data) {
    return new NoZPlan();
  }
  switch (data.kind) {
    case 'top_bottom':
      return new ZTopBottom(data.top, data.bottom, data.step, data.goUp);
    case 'range_around':
      return new ZRangeAround(data.range, data.step, data.goUp);
    case 'above_below':
      return new ZAboveBelow(data.above, data.below, data.step, data.goUp);
    case 'relative_positions':
      return new ZRelativePositions(data.relative, data.goUp);
    case 'absolute_positions':
      return new ZAbsolutePositions(data.absolute, data.goUp);
  }
}

export function buildGridPlan(data: GridPlanData | undefined): GridPlan {
  if (!data) {
    return new NoGridPlan();
  }
  switch (data.kind) {
    case 'rows_columns':
      return new GridRowsColumns(data.rows, data.columns, data);
    case 'width_height':
      return new GridWidthHeight(data.width, data.height, data);
    case 'from_edges':
      return new GridFromEdges(data.top, data.left, data.bottom, data.right, data);
  }
}

export function buildAutofocusPlan(data: AutofocusPlanData | undefined): AutofocusPlan {
  if (!data) {
    return new NoAutofocusPlan();
  }
  return new AxesBasedAutofocus(data.autofocusDeviceName, data.axes, data.autofocusMotorOffset);
}
