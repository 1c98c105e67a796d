import { z } from 'zod';

export type ErrorCode =
  | 'InvalidInput'
  | 'NotFound'
  | 'Unauthorized'
  | 'PayloadTooLarge'
  | 'Transient'
  | 'EngineUnavailable'
  | 'InferenceFailure'
  | 'Timeout'
  | 'CapacityExceeded';

export interface AnalyzeMediaRequest {
  bucket: string;
  key: string;
  confidenceThreshold?: number;
}

export interface SummarizeTextRequest {
  text: string;
  sentenceCount?: number;
}

export interface SummarizeObjectRequest {
  bucket: string;
  key: string;
  sentenceCount?: number;
}

const detectionSchema = z.object({
  label: z.string(),
  confidence: z.number(),
  box: z.object({ x1: z.number(), y1: z.number(), x2: z.number(), y2: z.number() }),
});

export const analyzeMediaResponseSchema = z.object({
  source: z.object({ bucket: z.string(), key: z.string() }),
  image: z.object({
    width: z.number(),
    height: z.number(),
    format: z.string(),
    contentType: z.string(),
    sizeKb: z.number(),
  }),
  model: z.string(),
  detections: z.array(detectionSchema),
  counts: z.record(z.number()),
  summaryText: z.string(),
  durationMs: z.number(),
});

export const summarizeResponseSchema = z.object({
  summary: z.string(),
  sentences: z.array(z.string()),
  sentenceCount: z.number(),
  requestedCount: z.number(),
});

export const healthResponseSchema = z.object({
  status: z.string(),
  objectStore: z.string(),
  detector: z.string(),
  model: z.string(),
});

export const errorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    stage: z.string(),
    category: z.string(),
    retryable: z.boolean(),
  }),
  correlationId: z.string().optional(),
});

export type Detection = z.infer<typeof detectionSchema>;
export type AnalyzeMediaResponse = z.infer<typeof analyzeMediaResponseSchema>;
export type SummarizeResponse = z.infer<typeof summarizeResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
