/**
 * Zod Validation Schemas
 *
 * Input validation for pipeline step arguments, run options and
 * environment-driven configuration.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const FilePath = z.string().trim().min(1, 'File path must not be empty');

/**
 * Arguments of the parse step
 */
export const ParseSipInput = z.object({
  paths: z.array(FilePath).min(1, 'At least one METS XML file path must be provided'),
});

/**
 * Arguments of a full pipeline run
 */
export const RunPipelineInput = z.object({
  paths: z.array(FilePath).min(1, 'At least one METS XML file path must be provided'),
  verifyContent: z.boolean().optional(),
});

export type RunPipelineParams = z.infer<typeof RunPipelineInput>;

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const FileExtension = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, 'File extension must look like ".xml"');

/**
 * Resolved pipeline configuration
 */
export const PipelineConfigSchema = z.object({
  watchDirectory: z.string().min(1, 'Watch directory is required'),
  pollIntervalMs: z.number().int().positive('Poll interval must be positive'),
  fileExtension: FileExtension,
  verifyContent: z.boolean(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Environment variables read at startup; all optional
 */
export const EnvConfigInput = z.object({
  SIP_WATCH_DIR: z.string().min(1, 'SIP_WATCH_DIR must not be empty').optional(),
  SIP_POLL_INTERVAL_SECONDS: z.coerce
    .number()
    .int('SIP_POLL_INTERVAL_SECONDS must be an integer')
    .positive('SIP_POLL_INTERVAL_SECONDS must be positive')
    .optional(),
  SIP_FILE_EXTENSION: FileExtension.optional(),
  SIP_VERIFY_CONTENT: BooleanFlag.optional(),
});
