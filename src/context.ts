/**
 * Call Matcher Context
 *
 * Configuration shared by every node while a call is matched: the registry
 * of parameter types and the literal comparison policy. Register types while
 * setting up; the matcher is only read during matching.
 */

import { MatcherSettingsSchema } from './config';
import type { MatcherOptions, MatcherSettings } from './config';
import { UndefinedTypeError } from './errors';

/** Builds a parameter value from a token. Throws when the text is not valid. */
export type TypeConstructor = (text: string) => unknown;

export type CallMatcherOptions = MatcherOptions;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

const AFFIRMATIVE = ['y', 'yes', 't', 'true', 'do', 'ok', 'sure', 'alright'];
const NEGATIVE = ['n', 'no', 'f', 'false', 'dont'];

/**
 * Parse a decimal integer, allowing a sign and surrounding whitespace.
 * Values a number cannot hold exactly are rejected.
 */
export function parseInteger(text: string): number {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) {
    throw new Error(`'${text}' is not an integer`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`'${text}' is out of the safe integer range`);
  }
  return value;
}

function toNumber(text: string): number | null {
  const trimmed = text.trim();
  if (DECIMAL.test(trimmed)) {
    return Number(trimmed);
  }
  const special = SPECIAL_FLOAT.exec(trimmed);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  return null;
}

/**
 * Parse a floating point number. Accepts exponents and inf/infinity/nan.
 */
export function parseFloatStrict(text: string): number {
  const value = toNumber(text);
  if (value === null) {
    throw new Error(`'${text}' is not a number`);
  }
  return value;
}

/**
 * Loosely convert a string to a boolean: numbers first (non-zero is true),
 * then a fixed set of affirmative and negative words, case-insensitively.
 */
export function looseBool(text: string): boolean {
  const value = toNumber(text);
  if (value !== null) {
    return value !== 0;
  }

  const word = text.trim().toLowerCase();
  if (AFFIRMATIVE.includes(word)) return true;
  if (NEGATIVE.includes(word)) return false;

  throw new Error(`'${text}' cannot be loosely converted to a boolean`);
}

/**
 * Jaro–Winkler similarity in [0, 1]; 1 means identical.
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatched: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatched: boolean[] = new Array<boolean>(b.length).fill(false);
  let matches = 0;

  for (let i = 0; i < a.length; i++) {
    const lo = Math.max(0, i - window);
    const hi = Math.min(b.length - 1, i + window);
    for (let j = lo; j <= hi; j++) {
      if (!bMatched[j] && a[i] === b[j]) {
        aMatched[i] = true;
        bMatched[j] = true;
        matches++;
        break;
      }
    }
  }

  if (matches === 0) return 0;

  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatched[i]) continue;
    while (!bMatched[k]) k++;
    if (a[i] !== b[k]) halfTranspositions++;
    k++;
  }

  const transpositions = halfTranspositions / 2;
  const jaro = (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3;

  let prefix = 0;
  while (prefix < 4 && prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }

  return jaro + prefix * 0.1 * (1 - jaro);
}

export class CallMatcher {
  readonly literalThreshold: number;
  readonly partialScore: number;
  readonly caseSensitive: boolean;

  private readonly types = new Map<string, TypeConstructor>();

  constructor(options: CallMatcherOptions = {}) {
    const settings: MatcherSettings = MatcherSettingsSchema.parse(options);
    this.literalThreshold = settings.literalThreshold;
    this.partialScore = settings.partialScore;
    this.caseSensitive = settings.caseSensitive;

    this.registerType('str', text => text);
    this.registerType('int', parseInteger);
    this.registerType('float', parseFloatStrict);
    this.registerType('bool', looseBool);
  }

  /** Register (or replace) a parameter type. */
  registerType(name: string, constructor: TypeConstructor): this {
    this.types.set(name, constructor);
    return this;
  }

  hasType(name: string): boolean {
    return this.types.has(name);
  }

  getType(name: string): TypeConstructor {
    const constructor = this.types.get(name);
    if (constructor === undefined) {
      throw new UndefinedTypeError(name);
    }
    return constructor;
  }

  /**
   * Build a value of the named type. Throws UndefinedTypeError for unknown
   * types and whatever the constructor throws for invalid text.
   */
  parseArgument(typeName: string, text: string): unknown {
    return this.getType(typeName)(text);
  }

  /** Whether a token equals a literal under the given case policy. */
  equals(literal: string, text: string, caseSensitive: boolean): boolean {
    if (caseSensitive && this.caseSensitive) {
      return literal === text;
    }
    return literal.toLowerCase() === text.toLowerCase();
  }

  /** Similarity of a token to a literal under the given case policy. */
  similarity(literal: string, text: string, caseSensitive: boolean): number {
    if (caseSensitive && this.caseSensitive) {
      return similarity(literal, text);
    }
    return similarity(literal.toLowerCase(), text.toLowerCase());
  }
}
