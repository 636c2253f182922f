/**
 * Demo commands
 *
 * A small alarm-clock command set used by `cmdsyntax demo`.
 */

import { CallMatcher } from './context';
import { Dispatcher } from './dispatcher';
import type { Logger } from './logger';

export interface DemoContext {
  print: (line: string) => void;
  /** Ask the session to end after this command. */
  exit: () => void;
}

export function createDemoDispatcher(logger?: Logger): Dispatcher<DemoContext, void> {
  const dispatcher = new Dispatcher<DemoContext, void>({ logger });

  dispatcher.command(
    'set [loud] alarm at <time: int> (am|pm) [with message <message...*>]',
    (match, { print }) => {
      const loud = match.optional(0);
      const period = match.variant(0) === 0 ? 'AM' : 'PM';
      let line = `Setting ${loud ? 'a loud' : 'an'} alarm at ${String(match.get('time'))} ${period}`;
      if (match.optional(1)) {
        line += ` with message: "${String(match.get('message'))}"`;
      }
      print(line);
    },
    { description: 'Sets an alarm, optionally a loud one with a message.' },
  );

  dispatcher.command(
    "i [don't] like bread",
    (match, { print }) => {
      print(match.optional(0) ? "I don't like bread either" : 'I like bread too');
    },
    { description: 'Shares your opinion on bread.' },
  );

  dispatcher.command(
    'help',
    (_match, { print }) => {
      print('Known commands');
      print('--------------');
      for (const line of dispatcher.usageLines()) {
        print(line);
      }
    },
    { description: 'Shows this list.', matcher: new CallMatcher({ caseSensitive: false }) },
  );

  dispatcher.command(
    'exit',
    (_match, { print, exit }) => {
      print('Bye!');
      exit();
    },
    { description: 'Ends the session.' },
  );

  return dispatcher;
}
