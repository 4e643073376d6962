/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands every option over as a string. These schemas
 * coerce and range-check them before they reach the config layer.
 */

import { z } from 'zod';

/**
 * Whole-number option with a lower bound, e.g. "300" -> 300
 */
function integerOption(label: string, min: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().min(min, `${label} must be at least ${min}`));
}

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z
  .object({
    model: z.string().trim().min(1, 'Model cannot be empty').optional(),
    output: z.string().trim().min(1, 'Output path cannot be empty').optional(),
    chunkSize: integerOption('Chunk size', 1).optional(),
    baseUrl: z.string().trim().min(1, 'Base URL cannot be empty').optional(),
    timeout: integerOption('Timeout', 1000).optional(),
    retries: integerOption('Retries', 0).optional(),
  })
  .transform((opts) => ({
    model: opts.model,
    output: opts.output,
    chunkSize: opts.chunkSize,
    baseUrl: opts.baseUrl,
    timeoutMs: opts.timeout,
    maxRetries: opts.retries,
  }));

// ============================================================================
// CHECK COMMAND SCHEMA
// ============================================================================

export const CheckOptionsSchema = z.object({
  baseUrl: z.string().trim().min(1, 'Base URL cannot be empty').optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(IngestOptionsSchema, options);
 * if (!result.success) {
 *   throw new CLIError(result.error);
 * }
 * const overrides = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  // Format Zod errors into a readable message
  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}
