export type Modality = "image" | "video" | "audio" | "text";

export interface MediaReference {
  readonly bucket: string;
  readonly key: string;
}

export interface ImageDimensions {
  readonly width: number;
  readonly height: number;
}

export interface RawMedia {
  readonly reference: MediaReference;
  readonly body: Buffer;
  readonly contentType: string;
  readonly size: number;
  readonly declaredDimensions?: ImageDimensions;
}

export interface DecodedImage extends ImageDimensions {
  readonly channels: number;
  readonly pixels: Buffer;
  readonly encoded: Buffer;
  readonly format: string;
  readonly contentType: string;
  readonly sizeBytes: number;
}

export interface BoundingBox {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
}

/** A detection as a backend reports it, before filtering and clamping. */
export interface RawDetection {
  label: string;
  confidence: number;
  bbox: [number, number, number, number];
}

export interface Detection {
  readonly label: string;
  readonly confidence: number;
  readonly box: BoundingBox;
}

export interface ImageSummary extends ImageDimensions {
  readonly format: string;
  readonly contentType: string;
  readonly sizeKb: number;
}

export interface DetectionResult {
  readonly source: MediaReference;
  readonly image: ImageSummary;
  readonly model: string;
  readonly detections: readonly Detection[];
  readonly counts: Readonly<Record<string, number>>;
  readonly summaryText: string;
  readonly durationMs: number;
}

export interface SummarizationRequest {
  readonly text: string;
  readonly sentenceCount?: number;
}

export interface SummarizationResult {
  readonly summary: string;
  readonly sentences: readonly string[];
  readonly sentenceCount: number;
  readonly requestedCount: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}
