/**
 * Time plan literals
 *
 * Durations are seconds, or an object of named units.
 */

import { z } from 'zod';

export const durationSchema = z.union([
  z.number().nonnegative(),
  z
    .object({
      hours: z.number().nonnegative().optional(),
      minutes: z.number().nonnegative().optional(),
      seconds: z.number().nonnegative().optional(),
      milliseconds: z.number().nonnegative().optional(),
    })
    .strict()
    .transform(
      ({ hours = 0, minutes = 0, seconds = 0, milliseconds = 0 }) =>
        hours * 3600 + minutes * 60 + seconds + milliseconds / 1000
    ),
]);

const loopsSchema = z.number().int().nonnegative();

export const intervalLoopsSchema = z
  .object({ interval: durationSchema, loops: loopsSchema })
  .strict()
  .transform((plan) => ({ kind: 'interval_loops' as const, ...plan }));

export const durationLoopsSchema = z
  .object({ duration: durationSchema, loops: loopsSchema })
  .strict()
  .transform((plan) => ({ kind: 'duration_loops' as const, ...plan }));

export const intervalDurationSchema = z
  .object({
    interval: durationSchema.refine((n) => n > 0, 'interval must be greater than 0'),
    duration: durationSchema,
    prioritizeDuration: z.boolean().optional(),
  })
  .strict()
  .transform((plan) => ({ kind: 'interval_duration' as const, ...plan }));

export const timePhaseSchema = z.union([intervalLoopsSchema, durationLoopsSchema, intervalDurationSchema]);

export const multiPhaseSchema = z
  .union([z.array(timePhaseSchema), z.object({ phases: z.array(timePhaseSchema) }).strict()])
  .transform((plan) => ({
    kind: 'multi_phase' as const,
    phases: Array.isArray(plan) ? plan : plan.phases,
  }));

export const timePlanSchema = z.union([timePhaseSchema, multiPhaseSchema]);

export type TimePhaseData = z.infer<typeof timePhaseSchema>;
export type TimePlanData = z.infer<typeof timePlanSchema>;
