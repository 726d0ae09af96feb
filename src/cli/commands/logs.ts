import type { Command } from 'commander';
import chalk from 'chalk';
import { getContext } from '../context.js';
import { printTable, printJson, printInfo, printError, isJsonOutput } from '../output.js';

function shorten(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 1) + '…' : text;
}

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show recent credential attempts')
    .option('-n, --limit <count>', 'number of entries', '20')
    .action(async (options: { limit: string }) => {
      const limit = Number(options.limit);
      if (!Number.isInteger(limit) || limit < 1) {
        printError(`Invalid limit: ${options.limit}`);
        return;
      }

      const ctx = await getContext();
      const entries = await ctx.attempts.recent(limit);

      if (isJsonOutput()) {
        printJson(entries);
        return;
      }
      if (entries.length === 0) {
        printInfo('No generation attempts logged yet.');
        return;
      }

      printTable(
        ['Time', 'Credential', 'Size', 'Outcome', 'Prompt', 'Detail'],
        entries.map(e => [
          e.timestamp.replace('T', ' ').slice(0, 19),
          e.credentialId,
          `${e.width}x${e.height}`,
          e.outcome === 'success' ? chalk.green('success') : chalk.red(e.errorKind ?? 'failure'),
          shorten(e.prompt, 40),
          shorten(e.errorMessage ?? e.imageRef ?? '', 50),
        ]),
      );
    });
}
