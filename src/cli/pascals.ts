#!/usr/bin/env node
import { cac } from 'cac';
import { ConfigService } from '../config/config-service.js';
import { tokensCommand } from './commands/tokens.js';
import { parseCommand } from './commands/parse.js';
import type { ParseOptions } from './commands/parse.js';
import { handleError } from './utils/error-handler.js';
import { warn } from './utils/logger.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => number) {
  return (...args: Args): void => {
    try {
      process.exitCode = fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function main(): void {
  for (const message of ConfigService.getInstance().warnings) {
    warn(message);
  }

  const cli = cac('pascals');

  cli
    .command('tokens <file>', 'Print the token listing of a Pascal-S source file')
    .action(wrapAction((file: string) => tokensCommand(file)));

  cli
    .command('parse <file>', 'Print the syntax tree of a Pascal-S source file')
    .option('--json', 'Print the tree and diagnostics as JSON', { default: false })
    .action(wrapAction((file: string, options: ParseOptions) => parseCommand(file, options)));

  cli.help();
  cli.version('0.1.0');

  cli.parse(process.argv, { run: false });
  if (!cli.matchedCommand) {
    // --help and --version were already printed by parse()
    if (!cli.options.help && !cli.options.version) {
      cli.outputHelp();
      process.exitCode = cli.args.length > 0 ? 1 : 0;
    }
    return;
  }
  cli.runMatchedCommand();
}

try {
  main();
} catch (error) {
  handleError(error);
}
