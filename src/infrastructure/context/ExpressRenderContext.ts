/**
 * Express Render Context
 * Layer: Infrastructure
 * Pattern: Adapter Pattern
 *
 * Presents an Express `req`/`res` pair as the IRenderContext the renderer
 * reads from. Most properties are getters, so response-side values (status,
 * body size, response headers) are read when the line is rendered after
 * the response has finished, not when the context is created.
 *
 * The socket peer is captured in the constructor: by the time a response
 * finishes the socket may already be gone and Node then reports no address.
 *
 * The request body size comes from Content-Length, 0 when absent. The
 * response body size is counted as accessLogger sees bytes written, after
 * any content encoding, and is null when nothing was written (204/304, HEAD).
 */
import type { IRenderContext } from '@domain/interfaces/IRenderContext';
import { parse as parseCookies } from 'cookie';
import type { Request, Response } from 'express';
import { TLSSocket } from 'node:tls';

type HeaderValue = string | number | string[] | undefined;

function firstValue(value: HeaderValue): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return value[0] ?? '';
  return String(value);
}

function parseLength(value: HeaderValue): number | null {
  const raw = firstValue(value);
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export class ExpressRenderContext implements IRenderContext {
  private readonly remoteAddress: string | undefined;
  private readonly remotePort: number | undefined;
  private cookies?: Record<string, string | undefined>;
  private bodyBytes = 0;

  constructor(
    private readonly req: Request,
    private readonly res: Response,
  ) {
    this.remoteAddress = req.socket.remoteAddress;
    this.remotePort = req.socket.remotePort;
  }

  get host(): string {
    return this.requestHeader('host');
  }

  get method(): string {
    return this.req.method;
  }

  get uri(): string {
    return this.req.originalUrl;
  }

  get path(): string {
    const queryStart = this.uri.indexOf('?');
    const raw = queryStart === -1 ? this.uri : this.uri.slice(0, queryStart);
    try {
      return decodeURIComponent(raw);
    } catch {
      // Malformed escapes are logged as received.
      return raw;
    }
  }

  get query(): string {
    const queryStart = this.uri.indexOf('?');
    return queryStart === -1 ? '' : this.uri.slice(queryStart + 1);
  }

  get proto(): string {
    return `HTTP/${this.req.httpVersion}`;
  }

  get remote(): string {
    if (!this.remoteAddress) return '';
    const host = this.remoteAddress.includes(':') ? `[${this.remoteAddress}]` : this.remoteAddress;
    return this.remotePort === undefined ? host : `${host}:${this.remotePort}`;
  }

  get realIp(): string {
    const forwardedFor = this.requestHeader('x-forwarded-for').split(',')[0].trim();
    if (forwardedFor) return forwardedFor;
    const realIp = this.requestHeader('x-real-ip').trim();
    if (realIp) return realIp;
    return this.remoteAddress ?? '';
  }

  get referer(): string {
    return this.requestHeader('referer');
  }

  get userAgent(): string {
    return this.requestHeader('user-agent');
  }

  get isTls(): boolean {
    return this.req.socket instanceof TLSSocket;
  }

  get statusCode(): number {
    return this.res.statusCode;
  }

  get requestBodyLength(): number {
    return parseLength(this.req.headers['content-length']) ?? 0;
  }

  get responseBodyLength(): number | null {
    return this.bodyBytes > 0 ? this.bodyBytes : null;
  }

  /** Adds to the response body size. Called for every chunk written. */
  addBodyBytes(count: number): void {
    this.bodyBytes += count;
  }

  cookie(name: string): string | undefined {
    this.cookies ??= parseCookies(this.requestHeader('cookie'));
    return Object.hasOwn(this.cookies, name) ? this.cookies[name] : undefined;
  }

  requestHeader(name: string): string {
    return firstValue(this.req.headers[name.toLowerCase()]);
  }

  responseHeader(name: string): string {
    return firstValue(this.res.getHeader(name));
  }
}
