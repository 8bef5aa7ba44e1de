/**
 * Render Context Interface
 * Layer: Domain
 * Pattern: Adapter Pattern (see ExpressRenderContext)
 *
 * Everything the renderer is allowed to know about a request, as a read-only
 * capability set. The renderer never touches Express directly: in production
 * an ExpressRenderContext wraps `req`/`res`, in tests a plain fake does.
 *
 * Lookups are lenient. `cookie()` returns undefined for a missing cookie and
 * the header lookups return '' for a missing header; none of them throw.
 */
export interface IRenderContext {
  readonly host: string;
  readonly method: string;
  /** May be empty; the renderer substitutes `/`. */
  readonly path: string;
  /** e.g. `HTTP/1.1` */
  readonly proto: string;
  /** Raw query string without the leading `?`. */
  readonly query: string;
  /** Socket peer as `ip:port`. */
  readonly remote: string;
  /** Client IP, preferring proxy headers over the socket peer. */
  readonly realIp: string;
  readonly uri: string;
  readonly referer: string;
  readonly userAgent: string;
  readonly isTls: boolean;
  readonly statusCode: number;
  readonly requestBodyLength: number;
  /** null when the response carries no body. */
  readonly responseBodyLength: number | null;

  cookie(name: string): string | undefined;
  requestHeader(name: string): string;
  responseHeader(name: string): string;
}
