import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { GlobalCliOptions } from '../common/options.js';
import { resolveSessionId } from '../common/session.js';

export async function stopCommand(id: string | undefined, options: GlobalCliOptions, ctx: EnclaveContext): Promise<void> {
  const sessionId = resolveSessionId(ctx, id, options.backend);
  await ctx.manager.stop(sessionId);
  console.log(chalk.green(`✅ Session ${sessionId} stopped; its workspace storage is kept`));
}
