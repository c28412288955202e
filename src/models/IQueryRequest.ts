/**
 * Input accepted by the batch and stream operations:
 * a single text blob or several blobs split independently
 */
export type QueryInput = string | ReadonlyArray<string | null | undefined>;

/**
 * Body of a batch or stream HTTP request
 */
export interface IQueryRequest {
  /** Free-form multi-line text */
  text?: string;
  /** Pre-split lines; nulls are ignored */
  lines?: Array<string | null>;
}
