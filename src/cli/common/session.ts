import chalk from 'chalk';
import type { BackendKind, Session } from '../../types/index.js';
import type { EnclaveContext } from '../../context.js';

/** The explicit id, else the session registered for the current directory. */
export function resolveSessionId(ctx: EnclaveContext, id: string | undefined, backend?: BackendKind): string {
  return ctx.manager.resolveId(id, ctx.env.cwd(), backend);
}

export function describeNetwork(session: Session): string {
  if (session.network.mode === 'unrestricted') return chalk.red('unrestricted');
  return `${session.network.mode} (${session.network.allowedDomains.join(', ')})`;
}

export function describeCredentials(session: Session): string {
  if (!session.credentials) return 'none';
  if (session.credentials.stale) return chalk.yellow(`evicted at ${session.credentials.evictedAt ?? 'unknown time'}`);
  return `synced at ${session.credentials.syncedAt}`;
}
