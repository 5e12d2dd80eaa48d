/**
 * Error taxonomy for lifecycle operations.
 *
 * - ValidationError / SessionBusyError: rejected before any substrate call
 * - TransientSubstrateError: retried within the provisioning budget
 * - AuthorizationError / QuotaError: surfaced at once, never retried
 * - SubstrateError: any other failed substrate call
 * - ProvisioningError: a failed attempt whose resources were rolled back
 */

export interface ErrorContext {
  sessionId?: string;
  operation?: string;
  /** Substrate call that failed, e.g. `kubectl apply`. */
  command?: string;
}

export class EnclaveError extends Error {
  readonly sessionId?: string;
  readonly operation?: string;
  readonly command?: string;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.sessionId = context.sessionId;
    this.operation = context.operation;
    this.command = context.command;
  }
}

export class ValidationError extends EnclaveError {}

export class SessionBusyError extends EnclaveError {}

export class SubstrateError extends EnclaveError {
  readonly stderr: string;
  readonly exitCode: number;

  constructor(message: string, context: ErrorContext & { stderr?: string; exitCode?: number }) {
    super(message, context);
    this.stderr = context.stderr ?? '';
    this.exitCode = context.exitCode ?? 1;
  }
}

export class TransientSubstrateError extends SubstrateError {}

export class AuthorizationError extends SubstrateError {}

export class QuotaError extends SubstrateError {}

export class ProvisioningError extends EnclaveError {}

const AUTHORIZATION_PATTERNS = [
  /forbidden/i,
  /unauthorized/i,
  /must be logged in/i,
  /permission denied/i,
  /access denied/i,
  /denied: requested access/i,
];

const QUOTA_PATTERNS = [/exceeded quota/i, /quota exceeded/i, /forbidden: exceeded/i];

const TRANSIENT_PATTERNS = [
  /timed out/i,
  /timeout/i,
  /connection refused/i,
  /connection reset/i,
  /i\/o timeout/i,
  /temporarily unavailable/i,
  /try again/i,
  /unschedulable/i,
  /insufficient (cpu|memory)/i,
  /manifest unknown/i,
  /not found: manifest/i,
  /blob upload unknown/i,
  /the object has been modified/i,
  /is being deleted/i,
  /TLS handshake timeout/i,
  /too many requests/i,
];

/**
 * Map a failed tool invocation onto the taxonomy.
 * Quota wins over authorization because quota rejections also say "forbidden".
 */
export function classifySubstrateFailure(
  command: string,
  stderr: string,
  context: ErrorContext & { exitCode?: number } = {},
): SubstrateError {
  const detail = stderr.trim() || `exit code ${context.exitCode ?? 1}`;
  const where = context.sessionId ? ` (session ${context.sessionId})` : '';
  const message = `${command} failed${where}: ${detail}`;
  const full = { ...context, command, stderr };

  if (QUOTA_PATTERNS.some((pattern) => pattern.test(stderr))) return new QuotaError(message, full);
  if (AUTHORIZATION_PATTERNS.some((pattern) => pattern.test(stderr))) return new AuthorizationError(message, full);
  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(stderr))) return new TransientSubstrateError(message, full);
  return new SubstrateError(message, full);
}

/** Transient failures, including a rolled-back attempt that failed transiently. */
export function isTransient(error: unknown): boolean {
  if (error instanceof TransientSubstrateError) return true;
  return error instanceof ProvisioningError && error.cause instanceof TransientSubstrateError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
