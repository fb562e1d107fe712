/**
 * Configuration Validator
 *
 * Zod schema for settings.json after all levels are merged.
 */

import { z } from 'zod';
import { logger } from './logger.js';

/**
 * settings.json schema
 */
export const SettingsSchema = z.object({
  selectionScopedUndo: z
    .boolean()
    .default(false)
    .describe('Scope undo to an active selection instead of clearing it'),
  redoAllLimit: z
    .number()
    .int()
    .positive()
    .default(Number.MAX_SAFE_INTEGER)
    .describe('Step count requested by redo-all'),
  notices: z
    .object({
      enabled: z.boolean().default(true).describe('Show step confirmations such as "Undo"'),
    })
    .default({}),
});

export type ResolvedSettings = z.infer<typeof SettingsSchema>;

/**
 * Validation result
 */
export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate configuration data against a Zod schema
 *
 * @param context - Context for error messages (e.g., file path)
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const issuePath = issue.path.join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });

  logger.warn('Validator', `Invalid configuration in ${context}`, { errors: errors.join('; ') });

  return { valid: false, errors };
}

/**
 * Validate merged settings
 */
export function validateSettings(data: unknown, context: string): ValidationResult<ResolvedSettings> {
  return validateConfig(SettingsSchema, data, context);
}

/**
 * Settings with every default applied
 */
export function defaultSettings(): ResolvedSettings {
  return SettingsSchema.parse({});
}
