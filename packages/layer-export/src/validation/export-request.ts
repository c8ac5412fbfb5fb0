/**
 * Export request validation
 *
 * Requests arrive from the command line or an embedding UI as loose
 * strings. They are checked here, before any filesystem or database access.
 */

import { z } from 'zod';
import { EXPORT_FORMATS } from '../core/constants.js';
import { MissingInputError } from '../core/errors.js';
import type { ExportFormat, ExportRequest } from '../core/types.js';

const requiredText = (label: string) =>
  z
    .string({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be text`,
    })
    .trim()
    .min(1, `${label} is required`);

const FormatSchema = z
  .string({ required_error: 'Export format is required' })
  .trim()
  .toLowerCase()
  .min(1, 'Export format is required')
  .refine((value): value is ExportFormat => EXPORT_FORMATS.some((format) => format === value), {
    message: `Export format must be one of: ${EXPORT_FORMATS.join(', ')}`,
  });

const OutputNameSchema = z
  .string()
  .trim()
  .refine((value) => !/[\\/]/.test(value), 'Output name must not contain path separators')
  .optional()
  .nullable()
  .transform((value) => (value ? value : undefined));

export const ExportRequestSchema = z.object({
  sourceLocation: requiredText('Source location'),
  sourceIdentifier: requiredText('Source identifier'),
  outputDirectory: requiredText('Output directory'),
  format: FormatSchema,
  outputName: OutputNameSchema,
});

export type ExportRequestInput = z.input<typeof ExportRequestSchema>;

/**
 * Validate a request
 *
 * @throws MissingInputError listing every offending field
 */
export function validateExportRequest(input: unknown): ExportRequest {
  const result = ExportRequestSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.errors;
    const fields = [...new Set(issues.map((issue) => issue.path.join('.') || 'request'))];
    throw new MissingInputError(
      `All fields must be filled in: ${issues.map((issue) => issue.message).join('; ')}`,
      fields
    );
  }

  const { outputName, ...required } = result.data;
  return outputName === undefined ? required : { ...required, outputName };
}
