import { Injectable, Logger } from "@nestjs/common";

import type { CallOptions, DecodedImage, RawDetection } from "../types.js";
import type { Detector } from "./detector.js";

/** Stands in when no model server is configured. */
@Injectable()
export class NoopDetector implements Detector {
  readonly name = "noop";
  readonly model = "none";
  private readonly logger = new Logger(NoopDetector.name);

  async infer(_image: DecodedImage, options: CallOptions = {}): Promise<RawDetection[]> {
    options.signal?.throwIfAborted();
    this.logger.warn("No detection backend configured; returning no detections");
    return [];
  }
}
