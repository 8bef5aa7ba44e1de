/**
 * Renderer
 * Layer: Application
 *
 * Evaluates a CompiledTemplate against one request. Each `field` segment is
 * looked up in FIELD_RESOLVERS; cookie and header segments go straight to the
 * context's lookups. Results are concatenated in template order.
 *
 * The wall clock is read once per render, so every `when*` field and both
 * latency fields in one line agree with each other. Nothing here can throw
 * for bad input: an unknown field, a missing cookie or a missing header all
 * become ''.
 */
import { formatDuration, getHumanReadableSize } from '@application/template/humanize';
import { parse } from '@application/template/tagParser';
import {
  formatRfc1123Z,
  formatRfc3339,
  formatRfc3339Millis,
  formatUnixSeconds,
  formatUtcIso,
  formatUtcIsoMillis,
} from '@application/template/timeFormats';
import type { CompiledTemplate, Segment } from '@domain/entities/Segment';
import type { IRenderContext } from '@domain/interfaces/IRenderContext';
import { FIELDS, SCHEMES } from '@shared/constants';
import type { Timestamp } from '@shared/types';

const NS_PER_MS = 1_000_000;

interface RenderClock {
  now: Date;
  /** Nanoseconds between startedAt and now. */
  elapsedNs: number;
}

type FieldResolver = (ctx: IRenderContext, clock: RenderClock) => string;

const FIELD_RESOLVERS: ReadonlyMap<string, FieldResolver> = new Map<string, FieldResolver>([
  [FIELDS.HOST, (ctx) => ctx.host],
  [FIELDS.METHOD, (ctx) => ctx.method],
  [FIELDS.PATH, (ctx) => ctx.path || '/'],
  [FIELDS.PROTO, (ctx) => ctx.proto],
  [FIELDS.QUERY, (ctx) => ctx.query],
  [FIELDS.REMOTE, (ctx) => ctx.remote],
  [FIELDS.REAL_IP, (ctx) => ctx.realIp],
  [FIELDS.SCHEME, (ctx) => (ctx.isTls ? SCHEMES.HTTPS : SCHEMES.HTTP)],
  [FIELDS.URI, (ctx) => ctx.uri],
  [FIELDS.REFERER, (ctx) => ctx.referer],
  [FIELDS.USER_AGENT, (ctx) => ctx.userAgent],
  [FIELDS.STATUS, (ctx) => String(ctx.statusCode)],
  [FIELDS.PAYLOAD_SIZE, (ctx) => String(ctx.requestBodyLength)],
  [FIELDS.PAYLOAD_SIZE_HUMAN, (ctx) => getHumanReadableSize(ctx.requestBodyLength)],
  [FIELDS.SIZE, (ctx) => String(ctx.responseBodyLength ?? 0)],
  [
    FIELDS.SIZE_HUMAN,
    (ctx) => (ctx.responseBodyLength === null ? '0B' : getHumanReadableSize(ctx.responseBodyLength)),
  ],
  [FIELDS.WHEN, (_ctx, { now }) => formatRfc1123Z(now)],
  [FIELDS.WHEN_ISO, (_ctx, { now }) => formatRfc3339(now)],
  [FIELDS.WHEN_UTC_ISO, (_ctx, { now }) => formatUtcIso(now)],
  [FIELDS.WHEN_ISO_MS, (_ctx, { now }) => formatRfc3339Millis(now)],
  [FIELDS.WHEN_UTC_ISO_MS, (_ctx, { now }) => formatUtcIsoMillis(now)],
  [FIELDS.WHEN_UNIX, (_ctx, { now }) => formatUnixSeconds(now)],
  [FIELDS.LATENCY, (_ctx, { elapsedNs }) => formatDuration(elapsedNs)],
  [FIELDS.LATENCY_MS, (_ctx, { elapsedNs }) => String(Math.trunc(elapsedNs / NS_PER_MS))],
]);

function resolve(segment: Segment, ctx: IRenderContext, clock: RenderClock): string {
  switch (segment.kind) {
    case 'literal':
      return segment.text;
    case 'cookie':
      return ctx.cookie(segment.text) ?? '';
    case 'requestHeader':
      return ctx.requestHeader(segment.text);
    case 'responseHeader':
      return ctx.responseHeader(segment.text);
    case 'field': {
      const resolver = FIELD_RESOLVERS.get(segment.text);
      return resolver ? resolver(ctx, clock) : '';
    }
  }
}

export function render(template: CompiledTemplate, ctx: IRenderContext, startedAt: Timestamp): string {
  const nowMs = Date.now();
  const clock: RenderClock = {
    now: new Date(nowMs),
    elapsedNs: Math.round((nowMs - startedAt) * NS_PER_MS),
  };

  let line = '';
  for (const segment of template) {
    line += resolve(segment, ctx, clock);
  }
  return line;
}

/**
 * Compiles `format` once and returns a renderer bound to it, for callers that
 * want the line without going through AccessLogService.
 */
export function generateLog(format: string): (ctx: IRenderContext, startedAt: Timestamp) => string {
  const template = parse(format);
  return (ctx, startedAt) => render(template, ctx, startedAt);
}
