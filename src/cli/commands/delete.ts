import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { GlobalCliOptions } from '../common/options.js';
import { resolveSessionId } from '../common/session.js';

export async function deleteCommand(
  id: string | undefined,
  options: GlobalCliOptions & { confirm?: string },
  ctx: EnclaveContext,
): Promise<void> {
  const sessionId = resolveSessionId(ctx, id, options.backend);
  await ctx.manager.delete(sessionId, options.confirm);
  console.log(chalk.green(`✅ Session ${sessionId} deleted with its workspace storage`));
}
