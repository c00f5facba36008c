/**
 * Sequence input validation with Zod
 */

import { z } from 'zod';
import { SequenceData, sequenceSchema } from './sequence.schema';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a sequence literal
 */
export function validateSequenceInput(data: unknown): ValidationResult<SequenceData> {
  const result = sequenceSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse a sequence literal from a JSON string
 */
export function parseSequenceJson(json: string): ValidationResult<SequenceData> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validateSequenceInput(data);
}
