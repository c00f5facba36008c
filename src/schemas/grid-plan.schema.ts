/**
 * Grid plan literals
 *
 * `overlap` may be one percentage for both axes or an `[x, y]` pair.
 */

import { z } from 'zod';
import { GRID_ORDER_MODES, GridOrderMode } from '../plans/grid-plan';

const percentSchema = z.number().min(0).lt(100);

const overlapSchema = z
  .union([percentSchema, z.tuple([percentSchema, percentSchema])])
  .transform((overlap): [number, number] =>
    typeof overlap === 'number' ? [overlap, overlap] : overlap
  );

const modeSchema = z
  .string()
  .refine((mode): mode is GridOrderMode => GRID_ORDER_MODES.some((m) => m === mode), {
    message: `mode must be one of ${GRID_ORDER_MODES.join(', ')}`,
  });

const gridOptionsShape = {
  overlap: overlapSchema.optional(),
  mode: modeSchema.optional(),
  fovWidth: z.number().positive().optional(),
  fovHeight: z.number().positive().optional(),
};

const relativeToSchema = z.enum(['center', 'top_left']).optional();

export const gridRowsColumnsSchema = z
  .object({
    rows: z.number().int().positive(),
    columns: z.number().int().positive(),
    relativeTo: relativeToSchema,
    ...gridOptionsShape,
  })
  .strict()
  .transform((plan) => ({ kind: 'rows_columns' as const, ...plan }));

export const gridWidthHeightSchema = z
  .object({
    width: z.number().positive(),
    height: z.number().positive(),
    relativeTo: relativeToSchema,
    ...gridOptionsShape,
  })
  .strict()
  .transform((plan) => ({ kind: 'width_height' as const, ...plan }));

export const gridFromEdgesSchema = z
  .object({
    top: z.number(),
    left: z.number(),
    bottom: z.number(),
    right: z.number(),
    ...gridOptionsShape,
  })
  .strict()
  .transform((plan) => ({ kind: 'from_edges' as const, ...plan }));

export const gridPlanSchema = z.union([gridRowsColumnsSchema, gridWidthHeightSchema, gridFromEdgesSchema]);

export type GridPlanData = z.infer<typeof gridPlanSchema>;
