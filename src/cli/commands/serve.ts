import type { Command } from 'commander';
import { getContext, closeContext } from '../context.js';
import { printError } from '../output.js';
import { createApp, startServer } from '../../server/app.js';
import { logger } from '../../utils/logger.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP generation server')
    .option('-H, --host <host>', 'interface to bind (overrides config)')
    .option('-p, --port <port>', 'port to listen on (overrides config)')
    .action(async (options: { host?: string; port?: string }) => {
      const ctx = await getContext();
      const host = options.host ?? ctx.config.server.host;
      const port = options.port !== undefined ? Number(options.port) : ctx.config.server.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        printError(`Invalid port: ${options.port}`);
        return;
      }

      await ctx.scheduler.refresh(true);
      if (ctx.scheduler.size === 0) {
        logger.warn('No active credentials yet. Add one with `imagerelay credentials add`.');
      }

      const app = createApp(ctx);
      const server = await startServer(app, host, port);

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(() => {
          closeContext(ctx)
            .catch((err: unknown) => logger.error(`Shutdown cleanup failed: ${err instanceof Error ? err.message : String(err)}`))
            .finally(() => process.exit(0));
        });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
