import type { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import Table from 'cli-table3';
import { ProviderNameSchema, type ProviderName, type SessionState } from '../config/schema.js';
import { FleetError } from '../core/errors.js';
import { SessionStore, remainingRepositories } from '../core/session-store.js';
import { runCommand } from './shared.js';

/** Count repositories per lifecycle status. */
export function lifecycleCounts(state: SessionState): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of Object.values(state.repositories)) {
    counts[record.status] = (counts[record.status] ?? 0) + 1;
  }
  return counts;
}

function formatCounts(counts: Record<string, number>): string {
  return Object.entries(counts).map(([status, n]) => `${n} ${status}`).join(', ') || 'empty';
}

interface StateFlags {
  target?: string;
  provider: string;
  json?: boolean;
}

function storeFor(organization: string | undefined, flags: StateFlags): SessionStore {
  return new SessionStore(resolve(flags.target ?? organization ?? '.'));
}

function providerOf(flags: StateFlags): ProviderName {
  const parsed = ProviderNameSchema.safeParse(flags.provider);
  if (!parsed.success) throw new FleetError('validation', `unknown provider "${flags.provider}"`);
  return parsed.data;
}

export function registerState(program: Command): void {
  const stateCmd = program.command('state').description('Inspect or remove resumable sync sessions');

  stateCmd
    .command('list')
    .description('List sync sessions recorded in a target directory')
    .argument('[target]', 'Sync target directory', '.')
    .option('--json', 'Print as JSON')
    .action((target: string, opts: { json?: boolean }) =>
      runCommand(async () => {
        const sessions = await new SessionStore(resolve(target)).list();
        if (opts.json) {
          console.log(JSON.stringify(sessions, null, 2));
          return;
        }
        if (sessions.length === 0) {
          console.log(chalk.dim('  No sync sessions.'));
          return;
        }
        const table = new Table({ head: ['Session', 'Status', 'Strategy', 'Repositories', 'Updated'].map((h) => chalk.dim(h)) });
        for (const s of sessions) {
          table.push([`${s.provider}/${s.organization}`, s.status, s.options.strategy, formatCounts(lifecycleCounts(s)), s.updatedAt]);
        }
        console.log(table.toString());
      }),
    );

  stateCmd
    .command('show')
    .description('Show one session and the repositories it still has to process')
    .argument('<organization>', 'Organization of the session')
    .option('-t, --target <dir>', 'Sync target directory (default: ./<organization>)')
    .option('-p, --provider <name>', 'Hosting provider', 'github')
    .option('--json', 'Print as JSON')
    .action((organization: string, flags: StateFlags) =>
      runCommand(async () => {
        const state = await storeFor(organization, flags).load(providerOf(flags), organization);
        if (!state) throw new FleetError('validation', `no session for ${flags.provider}/${organization}`);
        if (flags.json) {
          console.log(JSON.stringify(state, null, 2));
          return;
        }
        console.log(chalk.bold(`\n  ${state.provider}/${state.organization}  │  ${state.status}  │  ${state.targetPath}`));
        console.log(chalk.dim(`  token ${state.resumeToken}, started ${state.startedAt}, strategy ${state.options.strategy}`));
        console.log(`  ${formatCounts(lifecycleCounts(state))}`);
        const remaining = remainingRepositories(state);
        if (remaining.length > 0) {
          console.log(chalk.yellow(`\n  Remaining (${remaining.length}):`));
          for (const name of remaining) {
            const record = state.repositories[name];
            const detail = record?.message ? chalk.dim(` ${record.message}`) : '';
            console.log(`    ${name} ${chalk.dim(record?.status ?? '')}${detail}`);
          }
        }
        console.log();
      }),
    );

  stateCmd
    .command('clean')
    .description('Delete a session so the next sync starts fresh')
    .argument('<organization>', 'Organization of the session')
    .option('-t, --target <dir>', 'Sync target directory (default: ./<organization>)')
    .option('-p, --provider <name>', 'Hosting provider', 'github')
    .action((organization: string, flags: StateFlags) =>
      runCommand(async () => {
        const store = storeFor(organization, flags);
        const provider = providerOf(flags);
        if (!store.has(provider, organization)) {
          console.log(chalk.dim(`  No session for ${provider}/${organization}.`));
          return;
        }
        await store.delete(provider, organization);
        console.log(chalk.green(`✓ Removed session for ${provider}/${organization}`));
      }),
    );
}
