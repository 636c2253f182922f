/**
 * Call Match
 *
 * The accumulator threaded through one match attempt. Nodes that explore a
 * branch speculatively fork() it, match against the fork, and either join()
 * the fork back or drop it.
 */

import type { Token } from './types';

/** The kind of group an identifier was bound by. */
export type GroupKind = 'optional' | 'variant' | 'unordered';

export class CallMatch {
  /** Tokens not yet consumed. */
  private tokens: readonly Token[];

  /** Heuristic measure of how well the call fits so far. */
  score = 0;

  /** Set by a tail; nothing may be matched afterwards. */
  terminated = false;

  private readonly bindings = new Map<string, unknown>();
  private readonly groups = new Map<string, GroupKind>();
  private readonly optionalFlags: boolean[] = [];
  private readonly variantChoices: number[] = [];

  constructor(
    /** The call string the tokens were read from. */
    readonly raw: string,
    tokens: readonly Token[],
  ) {
    this.tokens = tokens;
  }

  /** The tokens left for further matching. */
  get remaining(): readonly Token[] {
    return this.tokens;
  }

  hasTokens(): boolean {
    return this.tokens.length > 0;
  }

  /** The next token, if any. */
  peek(): Token | undefined {
    return this.tokens[0];
  }

  /** Consume `count` tokens and return them. */
  take(count: number): readonly Token[] {
    const taken = this.tokens.slice(0, count);
    this.tokens = this.tokens.slice(count);
    return taken;
  }

  /**
   * A branch starting at the same position with its own score and bindings.
   */
  fork(): CallMatch {
    const fork = new CallMatch(this.raw, this.tokens);
    fork.terminated = this.terminated;
    return fork;
  }

  /** Fold a successful branch back into this match. */
  join(fork: CallMatch): void {
    this.joinState(fork);
    this.joinRecords(fork);
  }

  /**
   * Take over a branch's position, score and bindings but not its positional
   * records. Pair with joinRecords() when branches finish out of syntax order.
   */
  joinState(fork: CallMatch): void {
    this.tokens = fork.tokens;
    this.terminated = this.terminated || fork.terminated;
    this.score += fork.score;
    for (const [name, value] of fork.bindings) {
      this.bindings.set(name, value);
    }
    for (const [name, kind] of fork.groups) {
      this.groups.set(name, kind);
    }
  }

  /** Append a branch's unnamed optional and variant records. */
  joinRecords(fork: CallMatch): void {
    this.optionalFlags.push(...fork.optionalFlags);
    this.variantChoices.push(...fork.variantChoices);
  }

  set(name: string, value: unknown): void {
    this.bindings.set(name, value);
  }

  /** Bind a group identifier, remembering which kind of group it names. */
  setGroup(kind: GroupKind, name: string, value: unknown): void {
    this.bindings.set(name, value);
    this.groups.set(name, kind);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /** A bound parameter or identifier, or undefined when absent. */
  get(name: string): unknown {
    return this.bindings.get(name);
  }

  /** Snapshot of every bound parameter and identifier. */
  get params(): Record<string, unknown> {
    return Object.fromEntries(this.bindings);
  }

  /** Presence flags of unnamed optional sequences, in syntax order. */
  get optionals(): readonly boolean[] {
    return this.optionalFlags;
  }

  /** Chosen variant indices of unnamed variant groups, in syntax order. */
  get variants(): readonly number[] {
    return this.variantChoices;
  }

  addOptional(present: boolean): void {
    this.optionalFlags.push(present);
  }

  addVariant(index: number): void {
    this.variantChoices.push(index);
  }

  /**
   * Whether an optional sequence was present, by position among unnamed
   * optionals or by identifier.
   */
  optional(key: number | string): boolean {
    if (typeof key === 'string') {
      const value = this.bindings.get(key);
      if (this.groups.get(key) !== 'optional' || typeof value !== 'boolean') {
        throw new RangeError(`No optional sequence identified as '${key}'`);
      }
      return value;
    }
    if (key < 0 || key >= this.optionalFlags.length) {
      throw new RangeError(`No optional sequence at index ${key}`);
    }
    return this.optionalFlags[key];
  }

  /**
   * The index of the chosen variant, by position among unnamed variant
   * groups or by identifier.
   */
  variant(key: number | string): number {
    if (typeof key === 'string') {
      const value = this.bindings.get(key);
      if (this.groups.get(key) !== 'variant' || typeof value !== 'number') {
        throw new RangeError(`No variant group identified as '${key}'`);
      }
      return value;
    }
    if (key < 0 || key >= this.variantChoices.length) {
      throw new RangeError(`No variant group at index ${key}`);
    }
    return this.variantChoices[key];
  }

  /** The order in which the children of an identified unordered group matched. */
  order(identifier: string): number[] {
    const value = this.bindings.get(identifier);
    if (this.groups.get(identifier) !== 'unordered' || !Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
      throw new RangeError(`No unordered group identified as '${identifier}'`);
    }
    return value;
  }

  toString(): string {
    return `params: ${JSON.stringify(this.params)}, optionals: ${JSON.stringify(this.optionalFlags)}, ` +
      `variants: ${JSON.stringify(this.variantChoices)}`;
  }
}
