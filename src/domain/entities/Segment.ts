/**
 * Segment Entity — One Unit of a Compiled Template
 * Layer: Domain
 *
 * A format string such as `{method} {path} {~session}` is compiled once into
 * an ordered list of segments:
 *
 *   literal         — text emitted verbatim (`text` is that text).
 *   field           — a named field such as `status` (`text` is the name).
 *   cookie          — `{~name}`, looked up in the request cookies.
 *   requestHeader   — `{>Name}`, looked up in the request headers.
 *   responseHeader  — `{<Name}`, looked up in the response headers.
 *
 * Segments never point at a request. The parser freezes both the segments
 * and the array that holds them, so one CompiledTemplate is shared by every
 * request a process serves.
 */
export type SegmentKind = 'literal' | 'field' | 'cookie' | 'requestHeader' | 'responseHeader';

export interface Segment {
  readonly kind: SegmentKind;
  readonly text: string;
}

export type CompiledTemplate = readonly Segment[];
