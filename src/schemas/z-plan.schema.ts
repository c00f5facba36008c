/**
 * Z plan literals
 */

import { z } from 'zod';

const stepSchema = z.number().nonnegative();
const goUpSchema = z.boolean().optional();

export const zTopBottomSchema = z
  .object({ top: z.number(), bottom: z.number(), step: stepSchema, goUp: goUpSchema })
  .strict()
  .transform((plan) => ({ kind: 'top_bottom' as const, ...plan }));

export const zRangeAroundSchema = z
  .object({ range: z.number(), step: stepSchema, goUp: goUpSchema })
  .strict()
  .transform((plan) => ({ kind: 'range_around' as const, ...plan }));

export const zAboveBelowSchema = z
  .object({ above: z.number(), below: z.number(), step: stepSchema, goUp: goUpSchema })
  .strict()
  .transform((plan) => ({ kind: 'above_below' as const, ...plan }));

export const zRelativePositionsSchema = z
  .object({ relative: z.array(z.number()), goUp: goUpSchema })
  .strict()
  .transform((plan) => ({ kind: 'relative_positions' as const, ...plan }));

export const zAbsolutePositionsSchema = z
  .object({ absolute: z.array(z.number()), goUp: goUpSchema })
  .strict()
  .transform((plan) => ({ kind: 'absolute_positions' as const, ...plan }));

export const zPlanSchema = z.union([
  zTopBottomSchema,
  zRangeAroundSchema,
  zAboveBelowSchema,
  zRelativePositionsSchema,
  zAbsolutePositionsSchema,
]);

export type ZPlanData = z.infer<typeof zPlanSchema>;
