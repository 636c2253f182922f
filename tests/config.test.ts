import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  loadConfig,
  MatcherSettingsSchema,
  ParserSettingsSchema,
  UsageSettingsSchema,
} from '../src/config';
import { createLogger } from '../src/logger';

describe('config', () => {
  it('defaults to a silent log level', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'silent' });
  });

  it('reads the log level from the environment', () => {
    expect(loadConfig({ CMDSYNTAX_LOG_LEVEL: 'debug', OTHER: 'x' })).toEqual({ logLevel: 'debug' });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ CMDSYNTAX_LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });

  it('fills in parser defaults', () => {
    expect(ParserSettingsSchema.parse({})).toEqual({ simplify: 'yes', caseInsensitive: false });
    expect(ParserSettingsSchema.safeParse({ simplify: 'sometimes' }).success).toBe(false);
  });

  it('fills in matcher defaults', () => {
    expect(MatcherSettingsSchema.parse({})).toEqual({ literalThreshold: 0.75, partialScore: 0.25, caseSensitive: true });
    expect(MatcherSettingsSchema.safeParse({ partialScore: -0.1 }).success).toBe(false);
    expect(MatcherSettingsSchema.safeParse({ partialScore: 0 }).success).toBe(false);
  });

  it('fills in usage defaults', () => {
    expect(UsageSettingsSchema.parse({})).toEqual({ maxWidth: 70, indentWidth: 4 });
    expect(UsageSettingsSchema.safeParse({ maxWidth: 2.5 }).success).toBe(false);
  });
});

describe('logger', () => {
  it('uses the configured level', () => {
    expect(createLogger({ logLevel: 'warn' }).level).toBe('warn');
    expect(createLogger({ logLevel: 'silent' }).isLevelEnabled('error')).toBe(false);
  });
});
