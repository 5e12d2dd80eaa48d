import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { GlobalCliOptions } from '../common/options.js';
import { resolveSessionId } from '../common/session.js';

/**
 * Refresh credentials and attach the terminal. Exits with the attach
 * command's status.
 */
export async function connectCommand(id: string | undefined, options: GlobalCliOptions, ctx: EnclaveContext): Promise<void> {
  const sessionId = resolveSessionId(ctx, id, options.backend);
  const attach = await ctx.manager.connect(sessionId);
  console.log(chalk.gray(`Attaching to ${sessionId} (${[attach.command, ...attach.args].join(' ')})`));

  const child = ctx.executor.interactive(attach.command, attach.args);
  const code = await child.exited;
  if (code !== 0) {
    console.error(chalk.yellow(`attach exited with status ${code}`));
    process.exitCode = code;
  }
}
