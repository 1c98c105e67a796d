import { PipelineError } from "../errors.js";
import type { MediaReference } from "../types.js";

export function describeReference(reference: MediaReference): string {
  return `s3://${reference.bucket}/${reference.key}`;
}

/** The store is authoritative on naming rules; only emptiness is rejected here. */
export function assertReference(reference: MediaReference): void {
  if (!reference.bucket.trim() || !reference.key.trim()) {
    throw new PipelineError("InvalidInput", "fetch", "Bucket and key must be non-empty", {
      bucket: reference.bucket,
      key: reference.key,
    });
  }
}

export function tooLarge(reference: MediaReference, size: number, limit: number): PipelineError {
  return new PipelineError(
    "PayloadTooLarge",
    "fetch",
    `Object ${describeReference(reference)} is ${size} bytes, above the ${limit} byte limit`,
    { bucket: reference.bucket, key: reference.key, size, limit },
  );
}
