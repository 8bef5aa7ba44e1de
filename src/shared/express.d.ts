/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * I extend Express Request with requestStartTime so the requestTimer
 * middleware can record when the request entered the pipeline and the
 * access logger can compute latency from it once the response finishes.
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer middleware; the access logger's startedAt. */
      requestStartTime?: number;
    }
  }
}

export {};
