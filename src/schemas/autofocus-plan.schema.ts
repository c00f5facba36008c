import { z } from 'zod';
import { ALL_AXES, Axis } from '../types/axis';

const axisSchema = z
  .string()
  .refine((tag): tag is Axis => ALL_AXES.some((axis) => axis === tag), {
    message: `axis must be one of ${ALL_AXES.join(', ')}`,
  });

export const axesBasedAutofocusSchema = z
  .object({
    autofocusDeviceName: z.string().min(1),
    autofocusMotorOffset: z.number().optional(),
    axes: z.array(axisSchema),
  })
  .strict()
  .transform((plan) => ({ kind: 'axes' as const, ...plan }));

export const autofocusPlanSchema = axesBasedAutofocusSchema;

export type AutofocusPlanData = z.infer<typeof autofocusPlanSchema>;
