/**
 * Generation options with Zod validation
 */

import { z } from 'zod';
import { OptionsError } from './errors';
import { logDebug } from './logger';

export const GenerateOptionsSchema = z.object({
  /** Name of the root struct declaration */
  structName: z.string().min(1, 'Struct name cannot be empty').default('Foo'),

  /** Package/namespace of the generated code. Accepted for compatibility, not used. */
  packageName: z.string().default('main'),

  /** Render integral numbers as int64 instead of float */
  inferIntegers: z.boolean().default(false),

  /** Spaces per nesting level in the rendered output */
  indent: z.number().int('Indent must be a whole number').min(0).max(8).default(2),
}).strict();

// Input type keeps every field optional; defaults are applied by resolveOptions
export type GenerateOptions = z.input<typeof GenerateOptionsSchema>;
export type ResolvedGenerateOptions = z.output<typeof GenerateOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws OptionsError listing every failing option
 */
export function resolveOptions(options: GenerateOptions = {}): ResolvedGenerateOptions {
  const result = GenerateOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new OptionsError(issues);
  }
  logDebug('config', 'Resolved generate options', result.data);
  return result.data;
}
