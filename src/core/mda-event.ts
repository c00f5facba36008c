/**
 * MDA event - one instruction to acquire an image
 */

import type { MDASequence } from './mda-sequence';
import { AxisIndex } from '../types/axis';
import { AutofocusDirective } from '../plans/autofocus-plan';
import { ChannelRef } from '../plans/channel';
import { PropertyTuple } from '../plans/position';

export interface MDAEventFields {
  /** Index of this event on every axis that varies */
  index: AxisIndex;
  /** Earliest start, in seconds from the start of the acquisition */
  minStartTime?: number;
  posName?: string;
  xPos?: number;
  yPos?: number;
  zPos?: number;
  /** Exposure in milliseconds */
  exposure?: number;
  channel?: ChannelRef;
  properties?: readonly PropertyTuple[];
  /** Top-level sequence this event was expanded from */
  sequence?: MDASequence;
  autofocus?: AutofocusDirective;
  /** Position of this event in the expanded stream, from 0 */
  globalIndex: number;
}

export class MDAEvent implements MDAEventFields {
  readonly index: Readonly<AxisIndex>;
  readonly minStartTime?: number;
  readonly posName?: string;
  readonly xPos?: number;
  readonly yPos?: number;
  readonly zPos?: number;
  readonly exposure?: number;
  readonly channel?: Readonly<ChannelRef>;
  readonly properties?: readonly PropertyTuple[];
  readonly sequence?: MDASequence;
  readonly autofocus?: Readonly<AutofocusDirective>;
  readonly globalIndex: number;

  constructor(fields: MDAEventFields) {
    this.index = Object.freeze({ ...fields.index });
    this.minStartTime = fields.minStartTime;
    this.posName = fields.posName;
    this.xPos = fields.xPos;
    this.yPos = fields.yPos;
    this.zPos = fields.zPos;
    this.exposure = fields.exposure;
    this.channel = fields.channel ? Object.freeze({ ...fields.channel }) : undefined;
    this.properties = fields.properties;
    this.sequence = fields.sequence;
    this.autofocus = fields.autofocus ? Object.freeze({ ...fields.autofocus }) : undefined;
    this.globalIndex = fields.globalIndex;
    Object.freeze(this);
  }

  /**
   * Plain form; the sequence back-reference is replaced by its uid
   */
  toJSON(): Record<string, unknown> {
    return {
      globalIndex: this.globalIndex,
      index: { ...this.index },
      minStartTime: this.minStartTime,
      posName: this.posName,
      xPos: this.xPos,
      yPos: this.yPos,
      zPos: this.zPos,
      exposure: this.exposure,
      channel: this.channel ? { ...this.channel } : undefined,
      properties: this.properties?.map((p) => [...p]),
      autofocus: this.autofocus ? { ...this.autofocus } : undefined,
      sequenceUid: this.sequence?.uid,
    };
  }
}
