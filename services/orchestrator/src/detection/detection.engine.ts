import { Inject, Injectable } from "@nestjs/common";

import { PipelineError, isAbortError, toPipelineError } from "../errors.js";
import { DETECTOR } from "../tokens.js";
import type { CallOptions, DecodedImage, Detection, RawDetection } from "../types.js";
import type { Detector } from "./detector.js";
import { normalizeDetections } from "./normalize.js";

@Injectable()
export class DetectionEngine {
  constructor(@Inject(DETECTOR) private readonly detector: Detector) {}

  get backend(): string {
    return this.detector.name;
  }

  get model(): string {
    return this.detector.model;
  }

  async detect(image: DecodedImage, threshold: number, options: CallOptions = {}): Promise<Detection[]> {
    const raw = await this.infer(image, options);
    return this.normalize(raw, image, threshold);
  }

  async infer(image: DecodedImage, options: CallOptions = {}): Promise<RawDetection[]> {
    assertImage(image);
    try {
      return await this.detector.infer(image, options);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw toPipelineError(error, "inference", "InferenceFailure");
    }
  }

  normalize(raw: readonly RawDetection[], image: DecodedImage, threshold: number): Detection[] {
    assertThreshold(threshold);
    return normalizeDetections(raw, image, threshold);
  }
}

function assertImage(image: DecodedImage): void {
  if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width < 1 || image.height < 1) {
    throw new PipelineError("InvalidInput", "inference", `Image dimensions ${image.width}x${image.height} are invalid`);
  }
  if (image.pixels.length === 0) {
    throw new PipelineError("InvalidInput", "inference", "Image pixel buffer is empty");
  }
}

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new PipelineError("InvalidInput", "normalize", `Confidence threshold ${threshold} is outside [0, 1]`);
  }
}
