/**
 * Images for sessions and relays.
 *
 * The two built-in images are built locally from generated Dockerfiles and
 * carry a hash label, so a changed recipe triggers a rebuild. Any other image
 * name is pulled. For the cluster, images are tagged and pushed to the
 * configured registry.
 *
 * Agent image:
 * - non-root `agent` user (uid 1000), home /home/agent
 * - the agent runs inside tmux session `agent`
 *
 * Relay image:
 * - this package's build, running `enclave relay`
 */

import { createHash } from 'crypto';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import type { ICommandExecutor, ILogger, IStorage } from '../types/interfaces.js';
import { DEFAULT_IMAGE, DEFAULT_RELAY_IMAGE, DEFAULT_RELAY_PORT } from '../config/index.js';
import { ToolRunner } from '../backends/tool.js';
import { EnclaveError, isTransient, describeError } from '../errors.js';
import { withRetry, type RetryOptions } from '../infra/retry.js';
import { TMUX_SESSION } from '../backends/cluster.js';

const HASH_LABEL = 'enclave.dockerfile.hash';
const BUILD_TIMEOUT_MS = 900_000;
const PUSH_TIMEOUT_MS = 600_000;

export type ImageRecipe = 'agent' | 'relay';

function agentDockerfileBody(): string {
  return `FROM node:20-slim

RUN apt-get update && apt-get install -y --no-install-recommends \\
    git curl ca-certificates ripgrep tmux procps \\
    && rm -rf /var/lib/apt/lists/*

RUN npm install -g @anthropic-ai/claude-code

# uid/gid 1000 may already belong to the base image's node user
RUN if getent passwd 1000 >/dev/null 2>&1; then \\
      old_user=$(getent passwd 1000 | cut -d: -f1); \\
      usermod -l agent -d /home/agent -m "$old_user"; \\
      old_group=$(getent group 1000 | cut -d: -f1); \\
      [ "$old_group" != "agent" ] && groupmod -n agent "$old_group" || true; \\
    else \\
      groupadd -g 1000 agent && useradd -m -u 1000 -g 1000 -s /bin/bash agent; \\
    fi

RUN mkdir -p /workspace /home/agent/.claude /home/agent/.config && \\
    chown -R 1000:1000 /workspace /home/agent

USER agent
WORKDIR /workspace

ENTRYPOINT ["tmux", "new-session", "-A", "-s", "${TMUX_SESSION}"]
CMD ["claude"]
`;
}

function relayDockerfileBody(): string {
  return `FROM node:20-slim

WORKDIR /opt/enclave
COPY package.json ./
RUN npm install --omit=dev --ignore-scripts
COPY dist ./dist

USER node
EXPOSE ${DEFAULT_RELAY_PORT}
ENTRYPOINT ["node", "/opt/enclave/dist/bin/enclave.js"]
CMD ["relay"]
`;
}

export function dockerfileBody(recipe: ImageRecipe): string {
  return recipe === 'agent' ? agentDockerfileBody() : relayDockerfileBody();
}

export function dockerfileHash(recipe: ImageRecipe): string {
  return createHash('sha256').update(dockerfileBody(recipe)).digest('hex').slice(0, 12);
}

export function generateDockerfile(recipe: ImageRecipe): string {
  return `${dockerfileBody(recipe)}LABEL ${HASH_LABEL}="${dockerfileHash(recipe)}"\n`;
}

export function recipeFor(image: string): ImageRecipe | null {
  if (image === DEFAULT_IMAGE) return 'agent';
  if (image === DEFAULT_RELAY_IMAGE) return 'relay';
  return null;
}

/** `registry.example.test/team` + `enclave-agent:latest` */
export function remoteReference(image: string, registry: string): string {
  return `${registry.replace(/\/+$/, '')}/${image}`;
}

/**
 * Nearest directory above `start` holding a package.json.
 */
export function findPackageRoot(storage: IStorage, start: string): string | null {
  let dir = start;
  for (;;) {
    if (storage.exists(join(dir, 'package.json'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export interface ImageProviderOptions {
  executor: ICommandExecutor;
  engine: 'docker' | 'podman';
  storage: IStorage;
  logger: ILogger;
  /** Build context for the relay image; found from this module's location by default. */
  packageRoot?: string;
  retry?: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>>;
}

export class ImageProvider {
  private tool: ToolRunner;
  private storage: IStorage;
  private logger: ILogger;
  private packageRoot?: string;
  private retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;

  constructor(options: ImageProviderOptions) {
    this.tool = new ToolRunner(options.executor, options.engine, [], options.logger);
    this.storage = options.storage;
    this.logger = options.logger;
    this.packageRoot = options.packageRoot;
    this.retry = {
      attempts: options.retry?.attempts ?? 3,
      baseDelayMs: options.retry?.baseDelayMs ?? 2_000,
      maxDelayMs: options.retry?.maxDelayMs ?? 30_000,
      sleep: options.retry?.sleep,
    };
  }

  async exists(image: string): Promise<boolean> {
    return this.tool.succeeds(['image', 'inspect', image]);
  }

  /**
   * Make `image` available locally. Built-in images are rebuilt when their
   * recipe changed or `rebuild` is set; other images are pulled.
   */
  async ensure(image: string, options: { rebuild?: boolean } = {}): Promise<void> {
    const recipe = recipeFor(image);
    const present = await this.exists(image);

    if (!recipe) {
      if (present && !options.rebuild) return;
      this.logger.info(`pulling ${image}`);
      await this.withRetry(() => this.tool.run(['pull', image], { operation: 'image', timeoutMs: PUSH_TIMEOUT_MS }));
      return;
    }

    if (present && !options.rebuild && (await this.imageHash(image)) === dockerfileHash(recipe)) return;
    await this.build(image, recipe);
  }

  /**
   * Tag `image` for `registry` and push it. Returns the remote reference.
   */
  async publish(image: string, registry: string): Promise<string> {
    const remote = remoteReference(image, registry);
    await this.tool.run(['tag', image, remote], { operation: 'image' });
    this.logger.info(`pushing ${remote}`);
    await this.withRetry(() => this.tool.run(['push', remote], { operation: 'image', timeoutMs: PUSH_TIMEOUT_MS }));
    return remote;
  }

  private async imageHash(image: string): Promise<string | null> {
    const result = await this.tool.probe(['inspect', '--format', `{{index .Config.Labels "${HASH_LABEL}"}}`, image]);
    const hash = result.stdout.trim();
    return result.exitCode === 0 && hash && hash !== '<no value>' ? hash : null;
  }

  private async build(image: string, recipe: ImageRecipe): Promise<void> {
    const buildDir = join(tmpdir(), `enclave-image-build-${Date.now()}`);
    this.storage.mkdirp(buildDir);
    const dockerfile = join(buildDir, 'Dockerfile');
    try {
      this.storage.writeFile(dockerfile, generateDockerfile(recipe));
      const context = recipe === 'relay' ? this.relayContext() : buildDir;
      this.logger.info(`building ${image}`);
      await this.tool.run(['build', '-t', image, '-f', dockerfile, context], {
        operation: 'image',
        timeoutMs: BUILD_TIMEOUT_MS,
      });
    } finally {
      this.storage.remove(buildDir);
    }
  }

  private relayContext(): string {
    const root = this.packageRoot ?? findPackageRoot(this.storage, dirname(fileURLToPath(import.meta.url)));
    if (!root || !this.storage.exists(join(root, 'dist'))) {
      throw new EnclaveError(`Cannot build ${DEFAULT_RELAY_IMAGE}: no dist/ directory under ${root ?? 'the package root'}; run the build first`, {
        operation: 'image',
      });
    }
    return root;
  }

  private withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.retry,
      shouldRetry: isTransient,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`attempt ${attempt} failed (${describeError(error)}), retrying in ${delayMs}ms`);
      },
    });
  }
}
