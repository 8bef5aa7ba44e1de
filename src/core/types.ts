/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency needs a unique identifier so the container
 * knows "when someone asks for X, give them Y." Symbols keep those
 * identifiers collision-free and out of JSON.stringify output.
 *
 * Grouped by architectural layer; register a new token here first.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  AccessLogSink: Symbol.for('AccessLogSink'),

  // Configuration values resolved at startup
  AccessLogOptions: Symbol.for('AccessLogOptions'),

  // Services — application-level orchestrators
  AccessLogService: Symbol.for('AccessLogService'),
} as const;
