import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printTable, printJson, printSuccess, printError, printInfo, isJsonOutput, activeLabel } from '../output.js';
import { toCredentialView } from '../../credentials/credential.js';
import type { CredentialPatch } from '../../credentials/credential.js';
import { CredentialNotFoundError, InvalidCredentialError } from '../../credentials/store.js';
import { redactProxy } from '../../backend/proxy.js';

/** Store errors the operator can fix are printed; anything else propagates */
function reportStoreError(err: unknown): void {
  if (err instanceof CredentialNotFoundError || err instanceof InvalidCredentialError) {
    printError(err.message);
    return;
  }
  throw err;
}

async function setActive(id: string, active: boolean): Promise<void> {
  const ctx = await getContext();
  try {
    const credential = await ctx.store.update(id, { active });
    printSuccess(`Credential ${credential.label} (${credential.id}) ${active ? 'enabled' : 'disabled'}`);
  } catch (err) {
    reportStoreError(err);
  }
}

export function registerCredentialsCommand(program: Command): void {
  const credentials = program
    .command('credentials')
    .alias('creds')
    .description('Manage the credential pool');

  credentials
    .command('list')
    .description('List all credentials (secrets masked)')
    .action(async () => {
      const ctx = await getContext();
      const all = await ctx.store.list();

      if (isJsonOutput()) {
        printJson(all.map(toCredentialView));
        return;
      }
      if (all.length === 0) {
        printInfo('No credentials. Run `imagerelay credentials add <label> <token>` to add one.');
        return;
      }

      const rows = await Promise.all(all.map(async c => {
        const view = toCredentialView(c);
        const remaining = await ctx.scheduler.remainingQuota(c.id);
        return [
          c.id,
          c.label,
          view.secret,
          c.proxy ? redactProxy(c.proxy) : '-',
          activeLabel(c.active),
          String(c.lifetimeSuccessCount),
          String(c.lifetimeErrorCount),
          `${remaining}/${ctx.scheduler.getQuota()}`,
          c.lastUsedAt?.replace('T', ' ').slice(0, 19) ?? '-',
        ];
      }));

      printTable(
        ['ID', 'Label', 'Token', 'Proxy', 'Status', 'Uses', 'Errors', 'Left Today', 'Last Used'],
        rows,
      );
    });

  credentials
    .command('add <label> <token>')
    .description('Add a credential to the pool')
    .option('-x, --proxy <url>', 'outbound proxy (http://, https://, socks4://, socks5://)')
    .option('--disabled', 'add without enabling it')
    .action(async (label: string, token: string, options: { proxy?: string; disabled?: boolean }) => {
      const ctx = await getContext();
      try {
        const credential = await ctx.store.add({
          label,
          secret: token,
          proxy: options.proxy,
          active: !options.disabled,
        });
        if (isJsonOutput()) {
          printJson(toCredentialView(credential));
          return;
        }
        printSuccess(`Added credential ${credential.label} (${credential.id})`);
      } catch (err) {
        reportStoreError(err);
      }
    });

  credentials
    .command('update <id>')
    .description('Change a credential\'s label, token or proxy')
    .option('-l, --label <label>', 'new label')
    .option('-t, --token <token>', 'new token')
    .option('-x, --proxy <url>', 'new proxy URL')
    .option('--no-proxy', 'connect directly')
    .action(async (id: string, options: { label?: string; token?: string; proxy?: string | false }) => {
      const ctx = await getContext();
      const patch: CredentialPatch = {
        label: options.label,
        secret: options.token,
        proxy: options.proxy === false ? null : options.proxy,
      };
      try {
        const credential = await ctx.store.update(id, patch);
        printSuccess(`Updated credential ${credential.label} (${credential.id})`);
      } catch (err) {
        reportStoreError(err);
      }
    });

  credentials
    .command('remove <id>')
    .alias('rm')
    .description('Delete a credential')
    .action(async (id: string) => {
      const ctx = await getContext();
      if (await ctx.store.remove(id)) {
        printSuccess(`Removed credential ${id}`);
      } else {
        printError(`Credential ${id} not found`);
      }
    });

  credentials
    .command('enable <id>')
    .description('Put a credential back into rotation')
    .action((id: string) => setActive(id, true));

  credentials
    .command('disable <id>')
    .description('Take a credential out of rotation')
    .action((id: string) => setActive(id, false));
}
