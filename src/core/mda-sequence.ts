/**
 * MDASequence - the sequence aggregate
 *
 * An immutable description of a multi-dimensional acquisition: one plan per
 * axis plus the order in which axes are nested. Iterating it expands the
 * plans into MDAEvents (see iter-sequence.ts).
 */

import { randomUUID } from 'crypto';
import { Axis, DEFAULT_AXIS_ORDER, getAxisName } from '../types/axis';
import { SequenceWarning } from '../types/errors';
import { Logger } from '../types/logger';
import { getDefaultLogger } from '../logging/default-logger';
import { FieldOfView } from '../plans/axis-plan';
import { AutofocusPlan, NoAutofocusPlan } from '../plans/autofocus-plan';
import { Channel } from '../plans/channel';
import { GridPlan, GridPosition, NoGridPlan } from '../plans/grid-plan';
import { Position } from '../plans/position';
import { NoTimePlan, TimePlan } from '../plans/time-plan';
import { NoZPlan, ZPlan } from '../plans/z-plan';
import { canonicalJson } from '../utils/canonical-json';
import { MDAEvent } from './mda-event';
import { iterSequence } from './iter-sequence';
import { parseAxisOrder, validateSequence } from './validate-sequence';

/**
 * Constructor input; every member is optional
 */
export interface SequenceInit {
  metadata?: Record<string, unknown>;
  axisOrder?: string;
  stagePositions?: readonly Position[];
  gridPlan?: GridPlan;
  channels?: readonly Channel[];
  timePlan?: TimePlan;
  zPlan?: ZPlan;
  autofocusPlan?: AutofocusPlan;
}

/**
 * Normalized fields, as seen by validation
 */
export interface SequenceFields {
  axisOrder: readonly Axis[];
  metadata: Readonly<Record<string, unknown>>;
  stagePositions: readonly Position[];
  gridPlan: GridPlan;
  channels: readonly Channel[];
  timePlan: TimePlan;
  zPlan: ZPlan;
  autofocusPlan: AutofocusPlan;
}

export interface SequenceOptions {
  /** Receives construction warnings (defaults to the default logger) */
  logger?: Logger;
}

/**
 * Values of every axis, in iteration order
 */
export interface AxisValues {
  t: readonly number[];
  p: readonly Position[];
  c: readonly Channel[];
  z: readonly number[];
  g: readonly GridPosition[];
}

export type AxisSizes = Partial<Record<Axis, number>>;

const DEFAULT_FOV: FieldOfView = { width: 1, height: 1 };

export class MDASequence implements Iterable<MDAEvent> {
  /** Identity of this instance; never part of equality */
  readonly uid: string = randomUUID();
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly axisOrder: string;
  readonly axes: readonly Axis[];
  readonly stagePositions: readonly Position[];
  readonly gridPlan: GridPlan;
  readonly channels: readonly Channel[];
  readonly timePlan: TimePlan;
  readonly zPlan: ZPlan;
  readonly autofocusPlan: AutofocusPlan;
  readonly warnings: readonly SequenceWarning[];

  private readonly logger: Logger;
  private fov: FieldOfView = DEFAULT_FOV;
  private cachedValues?: AxisValues;
  private cachedCount?: number;

  constructor(init: SequenceInit = {}, options: SequenceOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
    this.axes = Object.freeze(parseAxisOrder(init.axisOrder ?? DEFAULT_AXIS_ORDER));
    this.axisOrder = this.axes.join('');
    this.metadata = Object.freeze({ ...init.metadata });
    this.stagePositions = Object.freeze([...(init.stagePositions ?? [])]);
    this.gridPlan = init.gridPlan ?? new NoGridPlan();
    this.channels = Object.freeze([...(init.channels ?? [])]);
    this.timePlan = init.timePlan ?? new NoTimePlan();
    this.zPlan = init.zPlan ?? new NoZPlan();
    this.autofocusPlan = init.autofocusPlan ?? new NoAutofocusPlan();

    this.warnings = Object.freeze(
      validateSequence({
        axisOrder: this.axes,
        metadata: this.metadata,
        stagePositions: this.stagePositions,
        gridPlan: this.gridPlan,
        channels: this.channels,
        timePlan: this.timePlan,
        zPlan: this.zPlan,
        autofocusPlan: this.autofocusPlan,
      })
    );
    for (const warning of this.warnings) {
      this.logger.event('sequence_warning', warning.message, {
        rule: warning.rule,
        sequenceUid: this.uid,
      });
    }
    this.logger.event('sequence_created', `Created sequence ${this.axisOrder}`, {
      sequenceUid: this.uid,
    });
  }

  /**
   * Record the camera field of view used by grid plans.
   * Cached sizes and counts are recomputed on next access.
   */
  setFovSize(width: number, height: number): void {
    this.fov = { width, height };
    this.cachedValues = undefined;
    this.cachedCount = undefined;
  }

  get fovSize(): Readonly<FieldOfView> {
    return this.fov;
  }

  /**
   * Values of every axis, materialized once per field of view
   */
  axisValues(): AxisValues {
    if (!this.cachedValues) {
      this.cachedValues = {
        t: [...this.timePlan.iterate()],
        p: this.stagePositions,
        c: this.channels,
        z: [...this.zPlan.iterate()],
        g: [...this.gridPlan.iterate(this.fov)],
      };
    }
    return this.cachedValues;
  }

  iterAxis<A extends Axis>(axis: A): AxisValues[A] {
    return this.axisValues()[axis];
  }

  size(axis: Axis): number {
    return this.axisValues()[axis].length;
  }

  /**
   * Size of every axis in the axis order, including empty ones
   */
  get sizes(): AxisSizes {
    const sizes: AxisSizes = {};
    for (const axis of this.axes) {
      sizes[axis] = this.size(axis);
    }
    return sizes;
  }

  /**
   * Non-zero sizes, in axis order. Jagged axes (skipped frames) are not reflected.
   */
  get shape(): number[] {
    return this.axes.map((axis) => this.size(axis)).filter((n) => n > 0);
  }

  /**
   * Axes with at least one value, in axis order
   */
  get usedAxisList(): Axis[] {
    return this.axes.filter((axis) => this.size(axis) > 0);
  }

  /**
   * Axes with at least one value as a string, e.g. `tcz`
   */
  get usedAxes(): string {
    return this.usedAxisList.join('');
  }

  /**
   * Number of events produced by a full expansion
   */
  get totalCount(): number {
    if (this.cachedCount === undefined) {
      let count = 0;
      for (const _event of iterSequence(this)) {
        count++;
      }
      this.cachedCount = count;
    }
    return this.cachedCount;
  }

  hasTimePlan(): boolean {
    return this.timePlan.size() > 0;
  }

  hasZPlan(): boolean {
    return this.zPlan.size() > 0;
  }

  hasGridPlan(): boolean {
    return this.gridPlan.kind !== 'none';
  }

  hasAutofocusPlan(): boolean {
    return this.autofocusPlan.kind !== 'none';
  }

  /**
   * Start a fresh expansion; each call owns its own counter and autofocus state
   */
  iterEvents(): IterableIterator<MDAEvent> {
    return iterSequence(this);
  }

  [Symbol.iterator](): IterableIterator<MDAEvent> {
    return this.iterEvents();
  }

  /**
   * New sequence with some fields replaced. The result is validated again
   * and gets a fresh uid.
   */
  replace(overrides: SequenceInit): MDASequence {
    return new MDASequence(
      {
        metadata: { ...this.metadata },
        axisOrder: this.axisOrder,
        stagePositions: this.stagePositions,
        gridPlan: this.gridPlan,
        channels: this.channels,
        timePlan: this.timePlan,
        zPlan: this.zPlan,
        autofocusPlan: this.autofocusPlan,
        ...overrides,
      },
      { logger: this.logger }
    );
  }

  /**
   * Content equality; uid is ignored
   */
  equals(other: unknown): boolean {
    return other instanceof MDASequence && canonicalJson(this.toJSON()) === canonicalJson(other.toJSON());
  }

  toJSON(): Record<string, unknown> {
    return {
      metadata: { ...this.metadata },
      axisOrder: this.axisOrder,
      stagePositions: this.stagePositions.map((p) => p.toJSON()),
      gridPlan: this.gridPlan.toJSON(),
      channels: this.channels.map((c) => c.toJSON()),
      timePlan: this.timePlan.toJSON(),
      zPlan: this.zPlan.toJSON(),
      autofocusPlan: this.autofocusPlan.toJSON(),
    };
  }

  toString(): string {
    const shape = this.axes.map((axis) => `n${axis}: ${this.size(axis)}`);
    return `Multi-Dimensional Acquisition ▶ ${shape.join(', ')}`;
  }

  /**
   * One line per used axis, e.g. `time (t): 3`
   */
  describeAxes(): string[] {
    return this.usedAxisList.map((axis) => `${getAxisName(axis)} (${axis}): ${this.size(axis)}`);
  }
}
