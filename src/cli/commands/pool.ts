import type { Command } from 'commander';
import chalk from 'chalk';
import { getContext } from '../context.js';
import { printTable, printJson, printInfo, isJsonOutput, usageBar, activeLabel } from '../output.js';

export function registerPoolCommand(program: Command): void {
  program
    .command('pool')
    .description('Show credential pool usage for today')
    .action(async () => {
      const ctx = await getContext();
      const stats = await ctx.scheduler.getStats();
      const quota = ctx.scheduler.getQuota();
      const all = await ctx.store.list();

      const usage = await Promise.all(all.map(async c => ({
        credential: c,
        today: (await ctx.store.dailyUsage(c.id)).count,
      })));

      if (isJsonOutput()) {
        printJson({
          ...stats,
          dailyQuota: quota,
          credentials: usage.map(u => ({
            id: u.credential.id,
            label: u.credential.label,
            active: u.credential.active,
            usedToday: u.today,
            remainingToday: Math.max(0, quota - u.today),
          })),
        });
        return;
      }

      console.log(chalk.bold('Credential Pool'));
      console.log(`  Total:      ${stats.total}`);
      console.log(`  Active:     ${chalk.green(String(stats.active))}`);
      console.log(`  Disabled:   ${chalk.gray(String(stats.inactive))}`);
      console.log(`  Exhausted:  ${stats.exhausted > 0 ? chalk.red(String(stats.exhausted)) : '0'}`);
      console.log(`  Uses:       ${stats.totalUses}`);
      console.log(`  Errors:     ${stats.totalErrors} (${(stats.errorRate * 100).toFixed(1)}%)`);

      if (usage.length === 0) {
        printInfo('No credentials in the pool.');
        return;
      }

      console.log('');
      printTable(
        ['Label', 'Status', 'Today', 'Uses', 'Errors'],
        usage.map(u => [
          u.credential.label,
          activeLabel(u.credential.active),
          usageBar(u.today, quota),
          String(u.credential.lifetimeSuccessCount),
          String(u.credential.lifetimeErrorCount),
        ]),
      );
    });
}
