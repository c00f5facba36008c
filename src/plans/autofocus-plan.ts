/**
 * Autofocus plans
 */

import { Axis } from '../types/axis';

/**
 * Instruction to run hardware autofocus before acquiring an event
 */
export interface AutofocusDirective {
  autofocusDeviceName: string;
  /** Offset to apply to the autofocus motor, when the device has one */
  autofocusMotorOffset?: number;
  /** Stage z anchored to the focal plane (z-plan offset removed) */
  zStagePosition?: number;
}

export class NoAutofocusPlan {
  readonly kind = 'none';
  readonly requiresRelativeZ = false;

  toJSON(): undefined {
    return undefined;
  }
}

/**
 * Re-runs autofocus whenever the index of one of `axes` changes
 */
export class AxesBasedAutofocus {
  readonly kind = 'axes';
  /** Relative z operation is required: the stored z is an offset from the focal plane */
  readonly requiresRelativeZ = true;

  constructor(
    readonly autofocusDeviceName: string,
    readonly axes: readonly Axis[],
    readonly autofocusMotorOffset?: number
  ) {}

  /**
   * Directive for a triggered event, or undefined when there is nothing to move
   */
  directive(zStagePosition: number | undefined): AutofocusDirective | undefined {
    if (zStagePosition === undefined && this.autofocusMotorOffset === undefined) {
      return undefined;
    }
    const directive: AutofocusDirective = { autofocusDeviceName: this.autofocusDeviceName };
    if (this.autofocusMotorOffset !== undefined) {
      directive.autofocusMotorOffset = this.autofocusMotorOffset;
    }
    if (zStagePosition !== undefined) {
      directive.zStagePosition = zStagePosition;
    }
    return directive;
  }

  toJSON(): Record<string, unknown> {
    return {
      autofocusDeviceName: this.autofocusDeviceName,
      autofocusMotorOffset: this.autofocusMotorOffset,
      axes: [...this.axes],
    };
  }
}

export type AutofocusPlan = NoAutofocusPlan | AxesBasedAutofocus;
