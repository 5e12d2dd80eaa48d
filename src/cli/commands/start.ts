import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { GlobalCliOptions } from '../common/options.js';
import { resolveSessionId } from '../common/session.js';

export async function startCommand(id: string | undefined, options: GlobalCliOptions, ctx: EnclaveContext): Promise<void> {
  const sessionId = resolveSessionId(ctx, id, options.backend);
  const session = await ctx.manager.start(sessionId);
  console.log(chalk.green(`✅ Session ${session.id} is running`));
  if (session.watchdogPid !== undefined) {
    console.log(chalk.gray(`   Watchdog pid: ${session.watchdogPid}`));
  }
  console.log(chalk.gray(`   Attach with: enclave connect ${session.id}`));
}
