import { Inject, Injectable, Logger } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";

import type { AppConfig } from "../config.js";
import { assertThreshold, DetectionEngine } from "../detection/detection.engine.js";
import { countByLabel, describeDetections } from "../detection/normalize.js";
import {
  type ErrorKind,
  type PipelineStage,
  PipelineError,
  toPipelineError,
} from "../errors.js";
import { MediaAnalyzerRegistry } from "../media/analyzers.js";
import { AdmissionGate } from "../pipeline/admission.js";
import { withDeadline } from "../pipeline/deadline.js";
import { retryOnce } from "../pipeline/retry.js";
import {
  MEDIA_TRANSITIONS,
  type MediaState,
  PipelineRun,
  TEXT_TRANSITIONS,
  type TextState,
} from "../pipeline/run-state.js";
import { modalityOf } from "../storage/content-type.js";
import { describeReference } from "../storage/reference.js";
import type { ObjectStore } from "../storage/storage.service.js";
import type { Summarizer } from "../summarization/summarizer.js";
import { APP_CONFIG, OBJECT_STORE, SUMMARIZER } from "../tokens.js";
import type {
  DetectionResult,
  MediaReference,
  RawMedia,
  SummarizationRequest,
  SummarizationResult,
} from "../types.js";

export interface RequestContext {
  correlationId?: string;
}

export interface AnalyzeOptions extends RequestContext {
  confidenceThreshold?: number;
}

const STAGE_BY_STATE: Record<MediaState | TextState, PipelineStage> = {
  Received: "fetch",
  Fetching: "fetch",
  Decoding: "decode",
  Inferring: "inference",
  Normalizing: "normalize",
  Summarizing: "summarize",
  Completed: "normalize",
  Failed: "normalize",
};

const FALLBACK_KIND: Record<PipelineStage, ErrorKind> = {
  fetch: "Transient",
  decode: "InvalidInput",
  inference: "InferenceFailure",
  normalize: "InferenceFailure",
  summarize: "EngineUnavailable",
};

const CLIENT_KINDS: ReadonlySet<ErrorKind> = new Set([
  "InvalidInput",
  "NotFound",
  "Unauthorized",
  "PayloadTooLarge",
  "CapacityExceeded",
]);

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });

/**
 * Coordinates retrieval, decoding, inference and summarization for a single
 * request at a time per call. Holds no request data between calls; the
 * admission gates only count in-flight backend calls.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private readonly detectionGate: AdmissionGate;
  private readonly summaryGate: AdmissionGate;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(OBJECT_STORE) private readonly store: ObjectStore,
    @Inject(MediaAnalyzerRegistry) private readonly analyzers: MediaAnalyzerRegistry,
    @Inject(DetectionEngine) private readonly engine: DetectionEngine,
    @Inject(SUMMARIZER) private readonly summarizer: Summarizer,
  ) {
    this.detectionGate = new AdmissionGate("detection", "inference", config.pipeline.admission);
    this.summaryGate = new AdmissionGate("summarization", "summarize", config.pipeline.admission);
  }

  async analyzeMedia(reference: MediaReference, options: AnalyzeOptions = {}): Promise<DetectionResult> {
    const run = new PipelineRun<MediaState>(
      options.correlationId ?? uuidv4(),
      MEDIA_TRANSITIONS,
      "Received",
      "Failed",
      this.logger,
    );
    const threshold = options.confidenceThreshold ?? this.config.detector.defaultConfidenceThreshold;
    this.logger.log(`[${run.id}] Analyzing ${describeReference(reference)} (threshold ${threshold})`);

    try {
      assertThreshold(threshold);
      const result = await withDeadline(
        this.config.pipeline.timeoutMs,
        () => this.timeoutError(run),
        async (signal): Promise<DetectionResult> => {
          this.step(run, "Fetching", signal);
          const media = await this.fetchObject(reference, run.id, signal);

          this.step(run, "Decoding", signal);
          const image = await this.analyzers
            .resolve(media.contentType)
            .prepare(media)
            .catch((error: unknown) => {
              throw toPipelineError(error, "decode", "InvalidInput");
            });

          this.step(run, "Inferring", signal);
          const raw = await retryOnce(
            () => this.detectionGate.run(() => this.engine.infer(image, { signal }), signal),
            this.retryOptions(run.id, "inference", signal),
          );

          this.step(run, "Normalizing", signal);
          const detections = this.engine.normalize(raw, image, threshold);
          const counts = countByLabel(detections);
          return {
            source: { bucket: reference.bucket, key: reference.key },
            image: {
              width: image.width,
              height: image.height,
              format: image.format,
              contentType: image.contentType,
              sizeKb: Math.round((image.sizeBytes / 1024) * 100) / 100,
            },
            model: this.engine.model,
            detections,
            counts,
            summaryText: describeDetections(counts),
            durationMs: run.elapsedMs,
          };
        },
      );
      run.enter("Completed");
      this.logger.log(`[${run.id}] ${result.summaryText} (${result.durationMs}ms)`);
      return result;
    } catch (error) {
      throw this.fail(run, error);
    }
  }

  async summarizeText(request: SummarizationRequest, context: RequestContext = {}): Promise<SummarizationResult> {
    const run = this.textRun(context);
    const sentenceCount = request.sentenceCount ?? this.config.summarizer.defaultSentenceCount;
    this.logger.log(`[${run.id}] Summarizing ${request.text.length} characters to ${sentenceCount} sentences`);

    try {
      const result = await withDeadline(
        this.config.pipeline.timeoutMs,
        () => this.timeoutError(run),
        async (signal) => {
          this.step(run, "Summarizing", signal);
          return this.runSummarizer(request.text, sentenceCount, run.id, signal);
        },
      );
      run.enter("Completed");
      this.logger.log(`[${run.id}] Produced ${result.sentenceCount} of ${result.requestedCount} sentences`);
      return result;
    } catch (error) {
      throw this.fail(run, error);
    }
  }

  async summarizeObject(
    reference: MediaReference,
    sentenceCount?: number,
    context: RequestContext = {},
  ): Promise<SummarizationResult> {
    const run = this.textRun(context);
    const count = sentenceCount ?? this.config.summarizer.defaultSentenceCount;
    this.logger.log(`[${run.id}] Summarizing ${describeReference(reference)} to ${count} sentences`);

    try {
      const result = await withDeadline(
        this.config.pipeline.timeoutMs,
        () => this.timeoutError(run),
        async (signal) => {
          this.step(run, "Fetching", signal);
          const media = await this.fetchObject(reference, run.id, signal);

          this.step(run, "Summarizing", signal);
          return this.runSummarizer(readText(media), count, run.id, signal);
        },
      );
      run.enter("Completed");
      this.logger.log(`[${run.id}] Produced ${result.sentenceCount} of ${result.requestedCount} sentences`);
      return result;
    } catch (error) {
      throw this.fail(run, error);
    }
  }

  private textRun(context: RequestContext): PipelineRun<TextState> {
    return new PipelineRun<TextState>(context.correlationId ?? uuidv4(), TEXT_TRANSITIONS, "Received", "Failed", this.logger);
  }

  private step<S extends string>(run: PipelineRun<S>, next: S, signal: AbortSignal): void {
    signal.throwIfAborted();
    run.enter(next);
  }

  private fetchObject(reference: MediaReference, runId: string, signal: AbortSignal): Promise<RawMedia> {
    return retryOnce(
      () => this.store.fetch(reference, { signal }).catch((error: unknown) => {
        throw toPipelineError(error, "fetch", "Transient");
      }),
      this.retryOptions(runId, "fetch", signal),
    );
  }

  private runSummarizer(text: string, sentenceCount: number, runId: string, signal: AbortSignal): Promise<SummarizationResult> {
    return retryOnce(
      () => this.summaryGate.run(() => this.summarizer.summarize(text, sentenceCount, { signal }), signal),
      this.retryOptions(runId, "summarize", signal),
    );
  }

  private retryOptions(runId: string, stage: PipelineStage, signal: AbortSignal) {
    const backoffMs = this.config.pipeline.retryBackoffMs;
    return {
      backoffMs,
      signal,
      onRetry: (error: unknown) => {
        const kind = error instanceof PipelineError ? error.kind : "unknown";
        this.logger.warn(`[${runId}] ${stage} failed with ${kind}; retrying once in ${backoffMs}ms`);
      },
    };
  }

  private timeoutError(run: PipelineRun<MediaState> | PipelineRun<TextState>): PipelineError {
    const timeoutMs = this.config.pipeline.timeoutMs;
    return new PipelineError(
      "Timeout",
      STAGE_BY_STATE[run.state],
      `Request exceeded ${timeoutMs}ms while ${run.state.toLowerCase()}`,
      { timeoutMs },
    );
  }

  private fail(run: PipelineRun<MediaState> | PipelineRun<TextState>, error: unknown): PipelineError {
    const stage = STAGE_BY_STATE[run.state];
    const classified = toPipelineError(error, stage, FALLBACK_KIND[stage]);
    run.fail();

    const line = `[${run.id}] Failed at ${classified.stage} after ${run.elapsedMs}ms: ${classified.kind}: ${classified.message}`;
    if (CLIENT_KINDS.has(classified.kind)) {
      this.logger.warn(line);
    } else {
      this.logger.error(line);
    }
    return classified;
  }
}

function readText(media: RawMedia): string {
  if (modalityOf(media.contentType) !== "text") {
    throw new PipelineError("InvalidInput", "summarize", `Object ${describeReference(media.reference)} is not text`, {
      bucket: media.reference.bucket,
      key: media.reference.key,
      contentType: media.contentType,
    });
  }
  try {
    return utf8.decode(media.body);
  } catch (error) {
    throw new PipelineError(
      "InvalidInput",
      "summarize",
      `Object ${describeReference(media.reference)} is not valid UTF-8`,
      { bucket: media.reference.bucket, key: media.reference.key },
      { cause: error },
    );
  }
}
