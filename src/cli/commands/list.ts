import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { SessionPresence } from '../../session/manager.js';
import { describeCredentials, describeNetwork } from '../common/session.js';

export async function listCommand(options: { verify?: boolean }, ctx: EnclaveContext): Promise<void> {
  const entries: SessionPresence[] = options.verify
    ? await ctx.manager.verify()
    : ctx.manager.list().map((session) => ({ session, present: true }));

  if (entries.length === 0) {
    console.log(chalk.gray('No sessions.'));
    return;
  }

  console.log(chalk.cyan('\n📦 Sessions:\n'));
  for (const { session, present } of entries) {
    const state = present ? session.state : `${session.state}, workload missing`;
    console.log(chalk.white(`  • ${session.id}`) + chalk.gray(` [${session.backend}] ${state}`));
    console.log(chalk.gray(`    Workspace: ${session.workspace}`));
    console.log(chalk.gray(`    Network: ${describeNetwork(session)}`));
    console.log(chalk.gray(`    Credentials: ${describeCredentials(session)}`));
    console.log(chalk.gray(`    Last activity: ${session.lastActivityAt}`));
  }

  const missing = entries.filter((entry) => !entry.present);
  if (missing.length > 0) {
    console.log(chalk.yellow(`\n⚠️  ${missing.length} session(s) have no workload on their substrate; start or delete them.`));
  }
  console.log('');
}
