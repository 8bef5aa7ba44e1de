/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Timestamp is the shape of a request start time as the requestTimer records
 * it (Date.now(), milliseconds since the Unix epoch). CompileTemplateBody is
 * the validated payload of the template compile endpoint.
 */
export type Timestamp = number;

export interface CompileTemplateBody {
  format: string;
}
