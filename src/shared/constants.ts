/**
 * Field names recognised by the renderer. Anything else inside `{...}` is kept
 * by the parser but renders as an empty string.
 */
export const FIELDS = {
  HOST: 'host',
  METHOD: 'method',
  PATH: 'path',
  PROTO: 'proto',
  QUERY: 'query',
  REMOTE: 'remote',
  REAL_IP: 'real-ip',
  SCHEME: 'scheme',
  URI: 'uri',
  REFERER: 'referer',
  USER_AGENT: 'userAgent',
  WHEN: 'when',
  WHEN_ISO: 'when-iso',
  WHEN_UTC_ISO: 'when-utc-iso',
  WHEN_UNIX: 'when-unix',
  WHEN_ISO_MS: 'when-iso-ms',
  WHEN_UTC_ISO_MS: 'when-utc-iso-ms',
  SIZE: 'size',
  SIZE_HUMAN: 'size-human',
  STATUS: 'status',
  LATENCY: 'latency',
  LATENCY_MS: 'latency-ms',
  PAYLOAD_SIZE: 'payload-size',
  PAYLOAD_SIZE_HUMAN: 'payload-size-human',
} as const;

/** First character inside the braces that turns a tag into a keyed lookup. */
export const TAG_PREFIXES = {
  COOKIE: '~',
  REQUEST_HEADER: '>',
  RESPONSE_HEADER: '<',
} as const;

export const SCHEMES = {
  HTTP: 'HTTP',
  HTTPS: 'HTTPS',
} as const;

export const KILOBYTE = 1024;
export const MEGABYTE = 1024 * 1024;

/** Default access log layout. */
export const COMMON_FORMAT = '{real-ip} {when-iso} {method} {uri} {status}';
