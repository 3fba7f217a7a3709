import { z, ZodError, ZodTypeAny } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * CLI Validation Schemas
 *
 * Zod schemas for the options of each command, applied to the raw argv split
 */

/**
 * Numeric flag given as a string. A bare flag arrives as `true` and is refused.
 */
function countOption(name: string, min: number, minMessage: string) {
  return z
    .preprocess(
      value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
      z
        .number({ invalid_type_error: `${name} needs a number`, required_error: `${name} needs a number` })
        .int(`${name} must be a whole number`)
        .min(min, minMessage)
    )
    .optional();
}

export const tagOptionsSchema = z.object({
  paths: z.array(z.string().min(1)).min(1, 'tag needs at least one file or directory'),
  workers: countOption('workers', 0, 'workers must not be negative'),
});

export const duplicatesOptionsSchema = z.object({
  directory: z.string().min(1).default('.'),
});

export const verifyOptionsSchema = z.object({
  paths: z.array(z.string().min(1)).min(1, 'verify needs at least one file'),
  concurrency: countOption('concurrency', 1, 'concurrency must be at least 1'),
});

export type TagOptions = z.infer<typeof tagOptionsSchema>;
export type DuplicatesOptions = z.infer<typeof duplicatesOptionsSchema>;
export type VerifyOptions = z.infer<typeof verifyOptionsSchema>;

/**
 * Parse raw command options, turning zod issues into one ValidationError
 */
export function parseOptions<T extends ZodTypeAny>(schema: T, raw: unknown, command: string): z.output<T> {
  try {
    return schema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(`invalid ${command} options: ${details}`, { service: 'cli', operation: command }, error);
    }
    throw error;
  }
}
