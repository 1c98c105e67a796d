import type { CallOptions, DecodedImage, RawDetection } from "../types.js";

/**
 * A detection backend. Implementations report what the model produced;
 * thresholding and clamping happen in `DetectionEngine`.
 */
export interface Detector {
  readonly name: string;
  readonly model: string;
  infer(image: DecodedImage, options?: CallOptions): Promise<RawDetection[]>;
}
