#!/usr/bin/env node
/**
 * cmdsyntax CLI
 *
 * - render: print the canonical form of a syntax specification
 * - match: match one call against a syntax and print the result as JSON
 * - demo: interactive session over the demo commands
 */

import * as readline from 'readline';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config';
import { CallMatcher } from './context';
import { createDemoDispatcher } from './demo';
import { CallMatchError, ParseError, UnknownCommandError } from './errors';
import { createLogger } from './logger';
import { matchCall } from './matcher';
import { parse } from './parser';
import { render } from './render';

interface RenderOptions {
  raw?: boolean;
  caseInsensitive?: boolean;
}

interface MatchOptions {
  caseInsensitive?: boolean;
}

const logger = createLogger(loadConfig());
const program = new Command();

program
  .name('cmdsyntax')
  .description('Compile command syntax specifications and match calls against them')
  .version('0.4.0');

program
  .command('render')
  .description('Print the canonical form of a syntax specification')
  .argument('<syntax>', 'syntax specification')
  .option('--raw', 'print the tree as parsed, without flattening')
  .option('--case-insensitive', 'treat every literal as case-insensitive')
  .action((syntax: string, options: RenderOptions) => {
    const tree = parse(syntax, {
      simplify: options.raw === true ? 'no' : 'silently',
      caseInsensitive: options.caseInsensitive === true,
      logger,
    });
    console.log(render(tree));
  });

program
  .command('match')
  .description('Match a call against a syntax specification')
  .argument('<syntax>', 'syntax specification')
  .argument('<call>', 'the call to match')
  .option('--case-insensitive', 'compare literals case-insensitively')
  .action((syntax: string, call: string, options: MatchOptions) => {
    const matcher = new CallMatcher({ caseSensitive: options.caseInsensitive !== true });
    const tree = parse(syntax, { matcher, logger });
    try {
      const match = matchCall(tree, call, { matcher });
      console.log(JSON.stringify({
        params: match.params,
        optionals: match.optionals,
        variants: match.variants,
        score: match.score,
      }, null, 2));
    } catch (error) {
      if (!(error instanceof CallMatchError)) {
        throw error;
      }
      console.error(chalk.red(`No match: ${error.message}`));
      console.error(chalk.gray(`score: ${error.score}`));
      process.exitCode = 1;
    }
  });

program
  .command('demo')
  .description('Try the demo commands interactively (type "help")')
  .action(() => {
    const dispatcher = createDemoDispatcher(logger);
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    const context = {
      print: (line: string) => console.log(line),
      exit: () => rl.close(),
    };

    let open = true;
    rl.on('close', () => {
      open = false;
    });

    rl.setPrompt(chalk.cyan('> '));
    rl.on('line', (line) => {
      try {
        dispatcher.dispatch(line, context);
      } catch (error) {
        if (error instanceof CallMatchError) {
          console.log(chalk.yellow(`Invalid syntax: ${error.message}`));
        } else if (error instanceof UnknownCommandError) {
          console.log(chalk.yellow('Unknown command'));
        } else {
          throw error;
        }
      }
      if (open) {
        rl.prompt();
      }
    });
    rl.prompt();
  });

try {
  program.parse();
} catch (error) {
  if (error instanceof ParseError) {
    console.error(chalk.red(error.message));
    process.exit(1);
  }
  throw error;
}
