/**
 * Option validation.
 *
 * Every plugin declares its options as a strict zod object with defaults.
 * Options are checked once, while the converter is set up; unknown keys and
 * wrong types raise a {@link ConfigurationError} listing every issue.
 *
 * @module core/config
 */
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Validate `input` against `schema`, applying defaults.
 *
 * @param owner - Plugin (or `core`) the options belong to.
 * @throws {@link ConfigurationError} when validation fails.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  owner: string,
  schema: S,
  input: unknown,
): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError(owner, issues);
  }
  return result.data;
}

/** Options of the pipeline itself. */
export const coreOptionsSchema = z
  .object({
    /** Maximum nesting depth for inline scanning. */
    maxRecursionDepth: z.number().int().positive().default(100),
    /** GitHub Flavored Markdown in the base lexer. */
    gfm: z.boolean().default(true),
    /** Treat single newlines as `<br>`. */
    breaks: z.boolean().default(false),
    /** Run the built-in sanitizer pass. */
    sanitize: z.boolean().default(true),
    /** Tab stop width used when expanding tabs. */
    tabLength: z.number().int().min(1).max(16).default(4),
  })
  .strict();

export type CoreOptions = z.output<typeof coreOptionsSchema>;
export type CoreOptionsInput = z.input<typeof coreOptionsSchema>;
