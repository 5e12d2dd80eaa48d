import type { EnclaveContext } from '../../context.js';
import { watchdogSettings } from '../../context.js';
import { InProcessWatchdogSupervisor } from '../../watchdog/supervisor.js';

/**
 * Body of the detached watchdog process: run the loop for one session
 * until it evicts or is told to stop.
 */
export async function watchdogCommand(id: string, ctx: EnclaveContext): Promise<void> {
  const logger = ctx.logger.child(`watchdog:${id}`);
  const session = ctx.manager.get(id);
  if (session.state !== 'running') {
    logger.info(`session is ${session.state}; nothing to watch`);
    return;
  }

  const supervisor = new InProcessWatchdogSupervisor(ctx.store, watchdogSettings(ctx.config), logger, { unref: false });
  await supervisor.start(session, ctx.backendFor(session.backend));

  const stop = () => {
    logger.info('stopping');
    supervisor.get(id)?.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const phase = await supervisor.wait(id);
  await supervisor.stop(session);
  process.removeListener('SIGINT', stop);
  process.removeListener('SIGTERM', stop);
  logger.info(`finished (${phase})`);
}
