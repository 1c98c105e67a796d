import { Injectable, Logger } from "@nestjs/common";
import fetch, { FetchError } from "node-fetch";
import { z } from "zod";

import { PipelineError, isAbortError } from "../errors.js";
import type { CallOptions, DecodedImage, RawDetection } from "../types.js";
import type { Detector } from "./detector.js";

const responseSchema = z.object({
  model: z.string().optional(),
  detections: z.array(
    z.object({
      label: z.string().min(1),
      confidence: z.number(),
      bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    }),
  ),
});

const INVALID_INPUT_STATUSES = new Set([400, 413, 415, 422]);
const UNAVAILABLE_STATUSES = new Set([429, 502, 503, 504]);

export interface HttpDetectorSettings {
  baseUrl: string;
  model: string;
}

/** Talks to an object-detection model server over JSON. */
@Injectable()
export class HttpDetector implements Detector {
  readonly name = "http";
  private readonly logger = new Logger(HttpDetector.name);

  constructor(private readonly settings: HttpDetectorSettings) {}

  get model(): string {
    return this.settings.model;
  }

  async infer(image: DecodedImage, options: CallOptions = {}): Promise<RawDetection[]> {
    const base = this.settings.baseUrl.endsWith("/") ? this.settings.baseUrl : `${this.settings.baseUrl}/`;
    const url = new URL("detect", base).toString();

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.settings.model,
          contentType: image.contentType,
          width: image.width,
          height: image.height,
          image: image.encoded.toString("base64"),
        }),
        signal: options.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const reason = error instanceof FetchError ? error.code ?? error.message : String(error);
      throw new PipelineError("EngineUnavailable", "inference", `Detector unreachable: ${reason}`, {}, { cause: error });
    }

    if (!response.ok) {
      const status = response.status;
      this.logger.debug(`Detector responded with ${status}`);
      if (INVALID_INPUT_STATUSES.has(status)) {
        throw new PipelineError("InvalidInput", "inference", `Detector rejected the image (${status})`, { status });
      }
      if (UNAVAILABLE_STATUSES.has(status)) {
        throw new PipelineError("EngineUnavailable", "inference", `Detector unavailable (${status})`, { status });
      }
      throw new PipelineError("InferenceFailure", "inference", `Detector failed (${status})`, { status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new PipelineError("InferenceFailure", "inference", "Detector returned a non-JSON body", {}, { cause: error });
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PipelineError("InferenceFailure", "inference", "Detector returned an unexpected payload", {
        issues: parsed.error.issues.length,
      });
    }
    return parsed.data.detections.map((item) => ({
      label: item.label,
      confidence: item.confidence,
      bbox: item.bbox,
    }));
  }
}
