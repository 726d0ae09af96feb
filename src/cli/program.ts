import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { registerServeCommand } from './commands/serve.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerCredentialsCommand } from './commands/credentials.js';
import { registerPoolCommand } from './commands/pool.js';
import { registerLogsCommand } from './commands/logs.js';
import { setLogLevel } from '../utils/logger.js';
import { setCliOverrides } from './context.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('imagerelay')
    .description('Relay text-to-image requests across a pool of rate-limited credentials')
    .version('0.1.0')
    .option('--json', 'output in JSON format')
    .option('--verbose', 'log debug output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean }>();
      if (opts.json) {
        setJsonOutput(true);
        setCliOverrides({ jsonOutput: true });
      }
      if (opts.verbose) {
        setLogLevel('debug');
        setCliOverrides({ logLevel: 'debug' });
      }
    });

  registerServeCommand(program);
  registerGenerateCommand(program);
  registerCredentialsCommand(program);
  registerPoolCommand(program);
  registerLogsCommand(program);

  return program;
}

export async function run(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}
