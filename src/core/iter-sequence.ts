/**
 * Expansion engine
 *
 * Turns a sequence into its ordered stream of MDAEvents: the Cartesian
 * product of the used axes (first axis in the order varies slowest),
 * filtered by the skip rules, with z, x/y and autofocus resolved per event
 * and position sub-sequences expanded in place of their parent combination.
 *
 * All mutable state (the global index and the autofocus trigger history)
 * lives in a cursor owned by one call to iterSequence.
 */

import { Axis, AxisIndex } from '../types/axis';
import { FieldOfView } from '../plans/axis-plan';
import { AutofocusDirective, AutofocusPlan } from '../plans/autofocus-plan';
import { Channel } from '../plans/channel';
import { GridPosition } from '../plans/grid-plan';
import { Position } from '../plans/position';
import { ZPlan } from '../plans/z-plan';
import { MDAEvent } from './mda-event';
import type { AxisValues, MDASequence } from './mda-sequence';

interface ExpansionCursor {
  globalIndex: number;
  /** Last index of every trigger axis at which each autofocus plan fired */
  autofocusTriggers: Map<AutofocusPlan, Map<Axis, number>>;
}

/**
 * Context handed from a parent combination to its position's sub-sequence
 */
interface ParentFrame {
  root: MDASequence;
  index: AxisIndex;
  position?: Position;
  channel?: Channel;
  time?: number;
  x?: number;
  y?: number;
  z?: number;
  exposure?: number;
  zPlan: ZPlan;
  autofocusPlan: AutofocusPlan;
}

/**
 * Values picked from the axis plans for one point of the product
 */
interface Combination {
  index: AxisIndex;
  time?: number;
  position?: Position;
  channel?: Channel;
  z?: number;
  grid?: GridPosition;
}

/**
 * Raised inside z resolution to drop the current combination
 */
class SkipFrame {}

/**
 * Expand a sequence. Each call starts from global index 0 with no autofocus history.
 */
export function* iterSequence(sequence: MDASequence): IterableIterator<MDAEvent> {
  const cursor: ExpansionCursor = { globalIndex: 0, autofocusTriggers: new Map() };
  yield* expandSequence(sequence, cursor, sequence.fovSize);
}

/**
 * Odometer over index tuples; the last position turns fastest.
 * An empty list of lengths yields a single empty tuple.
 */
export function* product(lengths: readonly number[]): IterableIterator<number[]> {
  if (lengths.some((n) => n <= 0)) {
    return;
  }
  const current: number[] = lengths.map(() => 0);
  for (;;) {
    yield [...current];
    let digit = lengths.length - 1;
    while (digit >= 0) {
      current[digit]++;
      if (current[digit] < lengths[digit]) {
        break;
      }
      current[digit] = 0;
      digit--;
    }
    if (digit < 0) {
      return;
    }
  }
}

function* expandSequence(
  sequence: MDASequence,
  cursor: ExpansionCursor,
  fov: FieldOfView,
  parent?: ParentFrame
): IterableIterator<MDAEvent> {
  const values = parent ? subSequenceValues(sequence, fov) : sequence.axisValues();
  const usedAxes = sequence.axes.filter((axis) => values[axis].length > 0);
  const root = parent?.root ?? sequence;

  for (const tuple of product(usedAxes.map((axis) => values[axis].length))) {
    // An empty product only matters for a sub-sequence that carries autofocus
    if (tuple.length === 0 && !parent) {
      continue;
    }

    const combo = pickCombination(usedAxes, tuple, values);
    const index: AxisIndex = parent ? { ...parent.index, ...combo.index } : combo.index;
    const position = combo.position ?? parent?.position;
    const channel = combo.channel ?? parent?.channel;

    if (shouldSkip(index, channel, parent ? undefined : position)) {
      continue;
    }

    let z: number | undefined;
    try {
      z =
        parent && !sequence.hasZPlan()
          ? parent.z
          : resolveZ(sequence.zPlan, combo, index, channel, position);
    } catch (error) {
      if (error instanceof SkipFrame) {
        continue;
      }
      throw error;
    }

    const [x, y] =
      parent && !combo.grid ? [parent.x, parent.y] : resolveXY(combo.grid, position);
    const time = combo.time ?? parent?.time;
    const exposure = channel?.exposure ?? parent?.exposure;

    const sub = parent ? undefined : position?.sequence;
    if (sub && (sub.usedAxisList.length > 0 || sub.hasAutofocusPlan())) {
      yield* expandSequence(sub, cursor, fov, {
        root,
        index,
        position,
        channel,
        time,
        x,
        y,
        z,
        exposure,
        zPlan: sequence.zPlan,
        autofocusPlan: sequence.autofocusPlan,
      });
      continue;
    }

    const autofocusPlan = sequence.hasAutofocusPlan()
      ? sequence.autofocusPlan
      : parent?.autofocusPlan ?? sequence.autofocusPlan;
    const anchorZPlan = sequence.hasZPlan() || !parent ? sequence.zPlan : parent.zPlan;

    yield new MDAEvent({
      index,
      minStartTime: time,
      posName: position?.name,
      xPos: x,
      yPos: y,
      zPos: z,
      exposure,
      channel: channel?.toRef(),
      properties: position?.properties,
      sequence: root,
      autofocus: resolveAutofocus(cursor, autofocusPlan, anchorZPlan, index, z),
      globalIndex: cursor.globalIndex++,
    });
  }
}

/**
 * Axis values of a sub-sequence, with its grid laid out using the top-level field of view
 */
function subSequenceValues(sequence: MDASequence, fov: FieldOfView): AxisValues {
  return { ...sequence.axisValues(), g: [...sequence.gridPlan.iterate(fov)] };
}

function pickCombination(
  usedAxes: readonly Axis[],
  tuple: readonly number[],
  values: AxisValues
): Combination {
  const combo: Combination = { index: {} };
  usedAxes.forEach((axis, i) => {
    const idx = tuple[i];
    combo.index[axis] = idx;
    switch (axis) {
      case Axis.TIME:
        combo.time = values.t[idx];
        break;
      case Axis.POSITION:
        combo.position = values.p[idx];
        break;
      case Axis.CHANNEL:
        combo.channel = values.c[idx];
        break;
      case Axis.Z:
        combo.z = values.z[idx];
        break;
      case Axis.GRID:
        combo.grid = values.g[idx];
        break;
    }
  });
  return combo;
}

/**
 * Skip rules. `position` is only given for top-level combinations: the
 * sub-sequence rules never apply inside a sub-sequence.
 */
function shouldSkip(index: AxisIndex, channel: Channel | undefined, position?: Position): boolean {
  if (channel && index.t !== undefined && index.t % channel.acquireEvery !== 0) {
    return true;
  }

  const sub = position?.sequence;
  if (!sub) {
    return false;
  }

  const hasOwnPlans = sub.hasGridPlan() || sub.hasZPlan() || sub.hasTimePlan();
  if (
    index.c !== undefined &&
    index.c !== 0 &&
    ((sub.channels.length > 0 && hasOwnPlans) || !hasOwnPlans)
  ) {
    return true;
  }
  if (index.z !== undefined && index.z !== 0 && sub.hasZPlan()) {
    return true;
  }
  return index.g !== undefined && index.g !== 0 && sub.hasGridPlan();
}

function resolveZ(
  zPlan: ZPlan,
  combo: Combination,
  index: AxisIndex,
  channel: Channel | undefined,
  position: Position | undefined
): number | undefined {
  const zIndex = combo.index.z;
  if (zIndex === undefined || combo.z === undefined) {
    if (channel?.zOffset !== undefined && position?.z !== undefined) {
      return position.z + channel.zOffset;
    }
    return position?.z;
  }

  if (channel && !channel.doStack && index.z !== zPlan.middleIndex()) {
    throw new SkipFrame();
  }

  let z = combo.z + (channel?.zOffset ?? 0);
  if (zPlan.isRelative) {
    z += position?.z ?? 0;
  }
  return z;
}

/**
 * Grid values are offsets when the grid is relative; an undefined
 * position coordinate stays undefined.
 */
function resolveXY(
  grid: GridPosition | undefined,
  position: Position | undefined
): [number | undefined, number | undefined] {
  if (!grid) {
    return [position?.x, position?.y];
  }
  if (!grid.isRelative) {
    return [grid.x, grid.y];
  }
  const x = position?.x === undefined ? undefined : position.x + grid.x;
  const y = position?.y === undefined ? undefined : position.y + grid.y;
  return [x, y];
}

function resolveAutofocus(
  cursor: ExpansionCursor,
  plan: AutofocusPlan,
  anchorZPlan: ZPlan,
  index: AxisIndex,
  z: number | undefined
): AutofocusDirective | undefined {
  if (plan.kind !== 'axes') {
    return undefined;
  }

  let last = cursor.autofocusTriggers.get(plan);
  if (!last) {
    last = new Map();
    cursor.autofocusTriggers.set(plan, last);
  }
  const previous = last;
  const triggered = plan.axes.some((axis) => previous.get(axis) !== (index[axis] ?? 0));
  if (!triggered) {
    return undefined;
  }
  for (const axis of plan.axes) {
    previous.set(axis, index[axis] ?? 0);
  }

  let zStagePosition = z;
  if (z !== undefined && anchorZPlan.isRelative && index.z !== undefined) {
    const offset = anchorZPlan.positions()[index.z];
    if (offset !== undefined) {
      zStagePosition = z - offset;
    }
  }
  return plan.directive(zStagePosition);
}
