/**
 * Configuration
 *
 * Option schemas for the parser, matcher and usage formatting, and the
 * environment-driven settings read by the CLI and the default logger.
 */

import { z } from 'zod';

export const SIMPLIFY_MODES = ['no', 'warn', 'yes', 'silently'] as const;

export const ParserSettingsSchema = z.object({
  /**
   * - no: return the tree as parsed
   * - warn: return the tree as parsed, log when it could be flattened
   * - yes: flatten, log when that changed the tree
   * - silently: flatten without logging
   */
  simplify: z.enum(SIMPLIFY_MODES).default('yes'),
  /** Treat every literal as if it were marked with `^`. */
  caseInsensitive: z.boolean().default(false),
});

export type ParserSettings = z.infer<typeof ParserSettingsSchema>;
export type ParserSettingsInput = z.input<typeof ParserSettingsSchema>;

export const MatcherSettingsSchema = z.object({
  /** How similar a token must be to a literal to count as a near miss. */
  literalThreshold: z.number().min(0).max(1).default(0.75),
  /** Score awarded for a near-miss literal. Above a miss (0), below an exact match (1). */
  partialScore: z.number().gt(0).lt(1).default(0.25),
  caseSensitive: z.boolean().default(true),
});

export type MatcherSettings = z.infer<typeof MatcherSettingsSchema>;
export type MatcherOptions = z.input<typeof MatcherSettingsSchema>;

export const UsageSettingsSchema = z.object({
  /** Width to wrap usage lines to; 0 disables wrapping. */
  maxWidth: z.number().int().min(0).default(70),
  /** Indent of the command description under its syntax. */
  indentWidth: z.number().int().min(0).default(4),
});

export type UsageSettings = z.infer<typeof UsageSettingsSchema>;
export type UsageOptions = z.input<typeof UsageSettingsSchema>;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const EnvConfigSchema = z.object({
  CMDSYNTAX_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
});

export interface Config {
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Read settings from the environment. Unknown variables are ignored; an
 * invalid log level throws a ZodError.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvConfigSchema.parse(env);
  return { logLevel: parsed.CMDSYNTAX_LOG_LEVEL };
}
