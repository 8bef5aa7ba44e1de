/**
 * Tag Parser
 * Layer: Application
 *
 * Turns a format string into a CompiledTemplate, once, at setup time:
 *
 *   '{method} {path} {~session}'
 *     → field(method) · literal(' ') · field(path) · literal(' ') · cookie(session)
 *
 * A tag is `{` + one or more characters other than ASCII space, tab, CR, LF
 * or form feed + `}`, matched lazily and left to right, so `{a}{b}` is two
 * tags and `{{a}` is a single tag named `{a`. Other whitespace (a vertical
 * tab, U+00A0) is part of the name. Anything that doesn't match (`{}`,
 * `{ method }`, a lone `}`) stays in the surrounding literal text. There is
 * no escape syntax for braces.
 *
 * The parser never fails and never checks field names. Unknown names are kept
 * as `field` segments and render empty.
 */
import type { CompiledTemplate, Segment, SegmentKind } from '@domain/entities/Segment';
import { TAG_PREFIXES } from '@shared/constants';

const TAG_PATTERN = /\{[^\t\n\f\r ]+?\}/g;

const PREFIX_KINDS: Readonly<Record<string, SegmentKind>> = {
  [TAG_PREFIXES.COOKIE]: 'cookie',
  [TAG_PREFIXES.REQUEST_HEADER]: 'requestHeader',
  [TAG_PREFIXES.RESPONSE_HEADER]: 'responseHeader',
};

function segment(kind: SegmentKind, text: string): Segment {
  return Object.freeze({ kind, text });
}

function toSegment(tag: string): Segment {
  const prefixKind = Object.hasOwn(PREFIX_KINDS, tag[0]) ? PREFIX_KINDS[tag[0]] : undefined;
  if (prefixKind) {
    return segment(prefixKind, tag.slice(1));
  }
  return segment('field', tag);
}

export function parse(format: string): CompiledTemplate {
  const segments: Segment[] = [];
  let index = 0;

  for (const match of format.matchAll(TAG_PATTERN)) {
    const start = match.index ?? index;
    if (start > index) {
      segments.push(segment('literal', format.slice(index, start)));
    }
    segments.push(toSegment(match[0].slice(1, -1)));
    index = start + match[0].length;
  }

  if (index < format.length) {
    segments.push(segment('literal', format.slice(index)));
  }

  return Object.freeze(segments);
}
