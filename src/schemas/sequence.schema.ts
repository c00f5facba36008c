/**
 * Channel, position and sequence literals
 *
 * Positions may carry a sub-sequence, so the two schemas refer to each
 * other through z.lazy and are typed by hand.
 */

import { z } from 'zod';
import type { PropertyTuple } from '../plans/position';
import { AutofocusPlanData, autofocusPlanSchema } from './autofocus-plan.schema';
import { GridPlanData, gridPlanSchema } from './grid-plan.schema';
import { TimePlanData, timePlanSchema } from './time-plan.schema';
import { ZPlanData, zPlanSchema } from './z-plan.schema';

export interface ChannelData {
  config: string;
  group?: string;
  exposure?: number;
  doStack?: boolean;
  zOffset?: number;
  acquireEvery?: number;
  camera?: string;
}

export interface PositionData {
  x?: number;
  y?: number;
  z?: number;
  name?: string;
  sequence?: SequenceData;
  properties?: PropertyTuple[];
}

export interface SequenceData {
  metadata?: Record<string, unknown>;
  axisOrder?: string;
  stagePositions?: PositionData[];
  gridPlan?: GridPlanData;
  channels?: ChannelData[];
  timePlan?: TimePlanData;
  zPlan?: ZPlanData;
  autofocusPlan?: AutofocusPlanData;
}

export const channelSchema = z.union([
  z
    .string()
    .min(1)
    .transform((config): ChannelData => ({ config })),
  z
    .object({
      config: z.string().min(1),
      group: z.string().optional(),
      exposure: z.number().nonnegative().optional(),
      doStack: z.boolean().optional(),
      zOffset: z.number().optional(),
      acquireEvery: z.number().int().positive().optional(),
      camera: z.string().optional(),
    })
    .strict(),
]);

const propertySchema = z.tuple([z.string(), z.string(), z.union([z.string(), z.number(), z.boolean()])]);

const coordinateSchema = z
  .number()
  .nullable()
  .optional()
  .transform((value) => value ?? undefined);

const positionTupleSchema = z
  .array(z.number().nullable())
  .min(1)
  .max(3)
  .transform(([x, y, zPos]): PositionData => ({
    x: x ?? undefined,
    y: y ?? undefined,
    z: zPos ?? undefined,
  }));

export const positionSchema: z.ZodType<PositionData, z.ZodTypeDef, unknown> = z.union([
  positionTupleSchema,
  z
    .object({
      x: coordinateSchema,
      y: coordinateSchema,
      z: coordinateSchema,
      name: z.string().optional(),
      sequence: z.lazy(() => sequenceSchema).optional(),
      properties: z.array(propertySchema).optional(),
    })
    .strict(),
]);

export const sequenceSchema: z.ZodType<SequenceData, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      metadata: z.record(z.string(), z.unknown()).optional(),
      axisOrder: z.string().optional(),
      stagePositions: z.array(positionSchema).optional(),
      gridPlan: gridPlanSchema.optional(),
      channels: z.array(channelSchema).optional(),
      timePlan: timePlanSchema.optional(),
      zPlan: zPlanSchema.optional(),
      autofocusPlan: autofocusPlanSchema.optional(),
    })
    .strict()
);
