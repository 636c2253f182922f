/**
 * Dispatcher
 *
 * Holds a list of commands and routes each call to the one that fits it
 * best. When nothing fits, the failure of the closest command is reported.
 */

import type { CallMatch } from './call-match';
import type { ParserSettingsInput, UsageOptions } from './config';
import { CallMatcher } from './context';
import { CallMatchError, UnknownCommandError } from './errors';
import { getDefaultLogger } from './logger';
import type { Logger } from './logger';
import { parse } from './parser';
import { Command } from './command';
import type { CommandCallback, CommandOptions } from './command';

export interface DispatcherOptions {
  /** Parser settings applied to every syntax passed to command(). */
  parser?: ParserSettingsInput;
  logger?: Logger;
}

export class Dispatcher<C = void, R = unknown> {
  private readonly commands: Command<C, R>[] = [];
  private readonly parserSettings: ParserSettingsInput;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions = {}) {
    this.parserSettings = options.parser ?? {};
    this.baseLogger = options.logger ?? getDefaultLogger();
    this.logger = this.baseLogger.child({ component: 'dispatcher' });
  }

  /**
   * Compile `syntax` and register it with `callback`. Parameter types are
   * checked against the command's matcher, so a ParseError is thrown here
   * rather than on the first call.
   */
  command(syntax: string, callback: CommandCallback<C, R>, options: CommandOptions = {}): Command<C, R> {
    const matcher = options.matcher ?? new CallMatcher();
    const tree = parse(syntax, { ...this.parserSettings, matcher, logger: this.baseLogger });
    const command = new Command(tree, callback, { ...options, matcher });
    this.register(command);
    return command;
  }

  register(command: Command<C, R>): void {
    this.commands.push(command);
  }

  get size(): number {
    return this.commands.length;
  }

  /**
   * Execute the command that matches `call` with the highest score; the one
   * registered first wins a tie.
   *
   * Throws the CallMatchError of the closest command when none matches and
   * it scored above zero, otherwise UnknownCommandError.
   */
  dispatch(call: string, context: C): R {
    let best: { command: Command<C, R>; match: CallMatch } | null = null;
    let closest: CallMatchError | null = null;

    for (const command of this.commands) {
      try {
        const match = command.match(call);
        this.logger.debug({ call, score: match.score }, 'Command matched');
        if (best === null || match.score > best.match.score) {
          best = { command, match };
        }
      } catch (error) {
        if (!(error instanceof CallMatchError)) {
          throw error;
        }
        this.logger.debug({ call, score: error.score, failure: error.failure.kind }, 'Command did not match');
        if (closest === null || error.score > closest.score) {
          closest = error;
        }
      }
    }

    if (best !== null) {
      return best.command.execute(best.match, context);
    }
    if (closest !== null && closest.score > 0) {
      throw closest;
    }
    throw new UnknownCommandError(call);
  }

  /** Usage lines of every command, with `separator` between commands. */
  usageLines(separator?: string, options: UsageOptions = {}): string[] {
    const lines: string[] = [];

    this.commands.forEach((command, index) => {
      const commandLines = command.usageLines(options);
      if (commandLines.length === 0) return;
      if (separator !== undefined && index > 0) {
        lines.push(separator);
      }
      lines.push(...commandLines);
    });

    return lines;
  }
}
