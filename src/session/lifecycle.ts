import type { SessionState } from '../types/index.js';
import { ValidationError } from '../errors.js';

export type LifecycleOperation = 'start' | 'stop' | 'connect' | 'delete';

/** States each operation may be invoked from. */
const ALLOWED_FROM: Record<LifecycleOperation, ReadonlyArray<SessionState>> = {
  start: ['created', 'stopped'],
  stop: ['running'],
  connect: ['running'],
  delete: ['created', 'running', 'stopped'],
};

export function canTransition(operation: LifecycleOperation, from: SessionState): boolean {
  return ALLOWED_FROM[operation].includes(from);
}

export function assertTransition(operation: LifecycleOperation, from: SessionState, sessionId: string): void {
  if (canTransition(operation, from)) return;
  const expected = ALLOWED_FROM[operation].join(' or ');
  throw new ValidationError(
    `Cannot ${operation} session ${sessionId}: it is ${from}, expected ${expected}`,
    { sessionId, operation },
  );
}
