import chalk from 'chalk';
import type { IEnvironment, ILogger } from '../../types/interfaces.js';
import { parseDomainList, DEFAULT_RELAY_PORT } from '../../config/index.js';
import { normalizeAllowlist } from '../../network/allowlist.js';
import { RelayServer } from '../../network/relay-server.js';
import { ValidationError } from '../../errors.js';

export interface RelayCliOptions {
  port?: number;
  host?: string;
  allow?: string[];
}

/** `--allow` wins; otherwise the comma-separated `ENCLAVE_ALLOWED_DOMAINS`. */
export function relayAllowlist(options: RelayCliOptions, env: IEnvironment): string[] {
  const raw = options.allow && options.allow.length > 0 ? options.allow : parseDomainList(env.get('ENCLAVE_ALLOWED_DOMAINS'));
  const domains = normalizeAllowlist(raw ?? []);
  if (domains.length === 0) {
    throw new ValidationError('The relay needs at least one domain: pass --allow or set ENCLAVE_ALLOWED_DOMAINS');
  }
  return domains;
}

/**
 * Serve the allowlisting proxy until SIGINT or SIGTERM.
 */
export async function relayCommand(options: RelayCliOptions, env: IEnvironment, logger: ILogger): Promise<void> {
  const server = new RelayServer({
    allowedDomains: relayAllowlist(options, env),
    port: options.port ?? DEFAULT_RELAY_PORT,
    host: options.host,
    logger: logger.child('relay'),
  });
  const port = await server.start();
  console.log(chalk.green(`✅ Relay listening on port ${port}`));

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      server.stop();
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
