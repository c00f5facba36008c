/**
 * Cross-field validation of a sequence
 *
 * Runs once, at construction. Violations of a hard rule throw a
 * ConfigurationError naming the rule; suspicious but legal combinations are
 * returned as warnings.
 */

import { Axis, axisPrecedes, isAxis } from '../types/axis';
import { ConfigurationError, SequenceWarning } from '../types/errors';
import { assertNoNestedPositions } from '../plans/position';
import type { SequenceFields } from './mda-sequence';

/**
 * Normalize and check an axis order string (lower-cased, known tags, no duplicates)
 */
export function parseAxisOrder(order: string): Axis[] {
  const normalized = order.toLowerCase();
  const unknown = [...normalized].filter((tag) => !isAxis(tag));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      'invalid_axis_order',
      `Can only iterate over axes t, p, c, z, g. Got extra: ${[...new Set(unknown)].join(', ')}`
    );
  }
  const axes = [...normalized].filter(isAxis);
  if (new Set(axes).size !== axes.length) {
    throw new ConfigurationError(
      'invalid_axis_order',
      `Duplicate entries found in axis order: ${normalized}`
    );
  }
  return axes;
}

export function validateSequence(fields: SequenceFields): SequenceWarning[] {
  const { axisOrder, zPlan, gridPlan, stagePositions, channels, autofocusPlan } = fields;
  const warnings: SequenceWarning[] = [];

  // Rule 4 first: the other rules look one level down only
  stagePositions.forEach((position, i) => {
    assertNoNestedPositions(position.sequence, `stagePositions[${i}]`);
  });

  if (
    axisPrecedes(axisOrder, Axis.Z, Axis.POSITION) &&
    zPlan.size() > 0 &&
    stagePositions.some((p) => p.sequence !== undefined && p.sequence.zPlan.size() > 0)
  ) {
    throw new ConfigurationError(
      'z_plan_ownership',
      "'z' cannot precede 'p' in the axis order when a global z plan is set " +
        'and any position sub-sequence specifies its own z plan'
    );
  }

  if (zPlan.size() > 0 && !zPlan.isRelative && autofocusPlan.requiresRelativeZ) {
    throw new ConfigurationError(
      'autofocus_requires_relative_z',
      `Absolute z plan '${zPlan.kind}' cannot be combined with an axes-based autofocus plan`
    );
  }

  if (
    axisPrecedes(axisOrder, Axis.CHANNEL, Axis.TIME) &&
    channels.some((c) => c.acquireEvery > 1)
  ) {
    warnings.push({
      rule: 'channel_stride_order',
      message:
        "Channels with skipped frames detected, but 'c' precedes 't' in the axis order: " +
        'may not yield intended results.',
    });
  }

  if (axisPrecedes(axisOrder, Axis.GRID, Axis.POSITION) && gridPlan.kind !== 'none' && !gridPlan.isRelative) {
    const withoutOwnGrid = stagePositions.filter(
      (p) => p.sequence === undefined || p.sequence.gridPlan.kind === 'none'
    );
    if (withoutOwnGrid.length > 1) {
      warnings.push({
        rule: 'global_grid_override',
        message:
          `Absolute grid plan '${gridPlan.kind}' precedes 'p' in the axis order: ` +
          `it overrides the x/y of ${withoutOwnGrid.length} stage positions.`,
      });
    }
  }

  return warnings;
}
