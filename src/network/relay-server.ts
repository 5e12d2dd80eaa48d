/**
 * Allowlisting forward proxy.
 *
 * Serves the two forms an HTTP client sends through a proxy:
 * - `CONNECT host:port` tunnels (HTTPS)
 * - absolute-URI requests (`GET http://host/path`)
 *
 * Hosts outside the allowlist get `403` and no upstream connection is made.
 */

import { createServer, request as httpRequest, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { connect, type Socket } from 'net';
import type { Duplex } from 'stream';
import type { ILogger } from '../types/interfaces.js';
import { hostMatches } from './allowlist.js';

export type Dialer = (host: string, port: number) => Socket;

export interface RelayServerOptions {
  allowedDomains: string[];
  port?: number;
  host?: string;
  logger?: ILogger;
  /** Opens upstream connections; replaced in tests. */
  dial?: Dialer;
}

const DEFAULT_PORT = 3128;

const defaultDialer: Dialer = (host, port) => connect({ host, port });

function splitAuthority(authority: string, defaultPort: number): { host: string; port: number } | null {
  const match = /^\[?([^\]]+?)\]?(?::(\d+))?$/.exec(authority);
  if (!match) return null;
  const port = match[2] ? parseInt(match[2], 10) : defaultPort;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) return null;
  return { host: match[1], port };
}

export class RelayServer {
  private server: Server | null = null;
  private connections = new Set<Duplex>();
  private readonly allowedDomains: string[];
  private readonly port: number;
  private readonly host: string;
  private readonly logger?: ILogger;
  private readonly dial: Dialer;

  constructor(options: RelayServerOptions) {
    this.allowedDomains = [...options.allowedDomains];
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host ?? '0.0.0.0';
    this.logger = options.logger;
    this.dial = options.dial ?? defaultDialer;
  }

  isAllowed(host: string): boolean {
    return hostMatches(host, this.allowedDomains);
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  async start(): Promise<number> {
    if (this.server) return this.getPort();

    const server = createServer((req, res) => this.handleRequest(req, res));
    server.on('connect', (req: IncomingMessage, socket: Duplex, head: Buffer) => this.handleConnect(req, socket, head));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', (err) => {
        this.stop();
        reject(err);
      });
      server.listen(this.port, this.host, () => resolve());
    });

    this.logger?.info(`listening on ${this.host}:${this.getPort()} for ${this.allowedDomains.join(', ')}`);
    return this.getPort();
  }

  stop(): void {
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }

  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  private track(socket: Duplex): void {
    this.connections.add(socket);
    socket.once('close', () => this.connections.delete(socket));
  }

  private handleConnect(req: IncomingMessage, client: Duplex, head: Buffer): void {
    this.track(client);
    client.on('error', () => client.destroy());

    const target = splitAuthority(req.url ?? '', 443);
    if (!target || !this.isAllowed(target.host)) {
      this.logger?.warn(`denied CONNECT ${req.url ?? ''}`);
      client.end('HTTP/1.1 403 Forbidden\r\nContent-Length: 0\r\n\r\n');
      return;
    }

    const upstream = this.dial(target.host, target.port);
    this.track(upstream);
    upstream.once('connect', () => {
      this.logger?.debug(`CONNECT ${target.host}:${target.port}`);
      client.write('HTTP/1.1 200 Connection Established\r\n\r\n');
      if (head.length > 0) upstream.write(head);
      upstream.pipe(client);
      client.pipe(upstream);
    });
    upstream.on('error', (err) => {
      this.logger?.warn(`upstream ${target.host}:${target.port} failed: ${err.message}`);
      if (client.writable) client.end('HTTP/1.1 502 Bad Gateway\r\nContent-Length: 0\r\n\r\n');
      else client.destroy();
    });
    client.on('close', () => upstream.destroy());
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    let url: URL;
    try {
      url = new URL(req.url ?? '');
    } catch {
      res.writeHead(400, { 'Content-Type': 'text/plain' });
      res.end('Proxy requests must use an absolute URI\n');
      return;
    }

    if (url.protocol !== 'http:' || !this.isAllowed(url.hostname)) {
      this.logger?.warn(`denied ${req.method ?? 'GET'} ${url.href}`);
      res.writeHead(403, { 'Content-Type': 'text/plain' });
      res.end(`Domain not allowed: ${url.hostname}\n`);
      return;
    }

    const port = url.port ? parseInt(url.port, 10) : 80;
    const headers = { ...req.headers };
    delete headers['proxy-connection'];
    delete headers['proxy-authorization'];

    const upstream = httpRequest({
      method: req.method,
      path: `${url.pathname}${url.search}`,
      headers,
      createConnection: () => this.dial(url.hostname, port),
    });
    upstream.on('response', (upstreamRes) => {
      res.writeHead(upstreamRes.statusCode ?? 502, upstreamRes.headers);
      upstreamRes.pipe(res);
    });
    upstream.on('error', (err) => {
      this.logger?.warn(`upstream ${url.host} failed: ${err.message}`);
      if (!res.headersSent) res.writeHead(502, { 'Content-Type': 'text/plain' });
      res.end();
    });
    req.pipe(upstream);
  }
}
