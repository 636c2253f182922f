/**
 * Error classes
 */

import { describeFailure } from './failures';
import type { MatchFailure } from './failures';

/** A malformed syntax specification. */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(`Parse error at position ${position}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * A call that does not match a syntax tree. `score` is the partial score the
 * match reached before failing.
 */
export class CallMatchError extends Error {
  constructor(
    public readonly failure: MatchFailure,
    public readonly score: number,
  ) {
    super(describeFailure(failure));
    this.name = 'CallMatchError';
  }
}

/** A parameter refers to a type that was never registered with the matcher. */
export class UndefinedTypeError extends Error {
  constructor(public readonly typeName: string) {
    super(`Undefined type '${typeName}'`);
    this.name = 'UndefinedTypeError';
  }
}

/** A node was matched after a tail had already consumed the call. */
export class MatchTerminatedError extends Error {
  constructor(nodeType: string) {
    super(`Tried matching ${nodeType} after matching was terminated`);
    this.name = 'MatchTerminatedError';
  }
}

export class CommandDispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandDispatchError';
  }
}

/** No registered command scored above zero for a call. */
export class UnknownCommandError extends CommandDispatchError {
  constructor(public readonly call: string) {
    super('Unknown command');
    this.name = 'UnknownCommandError';
  }
}
