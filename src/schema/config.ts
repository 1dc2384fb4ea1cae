import { z } from 'zod';
import { DeclarationError } from '../model/errors.js';
import { declarationErrors } from '../strings/errors.js';

/**
 * Parser behaviour switches. Fixed when a Parser is constructed.
 */
export const ParserConfigSchema = z
  .object({
    /** Skip unknown options instead of failing the run */
    allowUnknownOptions: z.boolean().default(false),
    /** A bare `--` turns every later token into a positional value */
    doubleHyphenDelimiter: z.boolean().default(true),
    /** When false, option-looking tokens after the first positional are positional too */
    allowOptionsAfterArgs: z.boolean().default(true),
    /** Trace token handling to stderr (also enabled by ARGTREE_DEBUG=1) */
    debug: z.boolean().default(false),
  })
  .strict();

export type ParserConfig = z.output<typeof ParserConfigSchema>;
export type ParserConfigInput = z.input<typeof ParserConfigSchema>;

/**
 * Validate a partial configuration and fill in defaults. Accepts untyped
 * input so configuration read from JSON goes through the same checks.
 */
export function resolveParserConfig(input: unknown = {}): Readonly<ParserConfig> {
  const result = ParserConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new DeclarationError(declarationErrors.invalidConfig(issues), 'INVALID_CONFIG');
  }
  return Object.freeze(result.data);
}
