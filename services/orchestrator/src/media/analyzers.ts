import { Inject, Injectable } from "@nestjs/common";

import { PipelineError } from "../errors.js";
import { modalityOf } from "../storage/content-type.js";
import type { DecodedImage, Modality, RawMedia } from "../types.js";
import { ImageDecoder } from "./image-decoder.js";

/**
 * Turns fetched bytes into something the detection engine can consume. One
 * variant per modality; adding video support means adding a variant here.
 */
export interface MediaAnalyzer {
  readonly modality: Modality;
  prepare(media: RawMedia): Promise<DecodedImage>;
}

export class ImageAnalyzer implements MediaAnalyzer {
  readonly modality = "image";

  constructor(private readonly decoder: ImageDecoder) {}

  prepare(media: RawMedia): Promise<DecodedImage> {
    return this.decoder.decode(media);
  }
}

export class UnsupportedAnalyzer implements MediaAnalyzer {
  constructor(
    readonly modality: Modality,
    private readonly reason: string,
  ) {}

  async prepare(media: RawMedia): Promise<DecodedImage> {
    throw new PipelineError("InvalidInput", "decode", this.reason, {
      bucket: media.reference.bucket,
      key: media.reference.key,
      contentType: media.contentType,
    });
  }
}

@Injectable()
export class MediaAnalyzerRegistry {
  private readonly image: MediaAnalyzer;
  private readonly analyzers: ReadonlyMap<Modality, MediaAnalyzer>;

  constructor(@Inject(ImageDecoder) decoder: ImageDecoder) {
    this.image = new ImageAnalyzer(decoder);
    this.analyzers = new Map<Modality, MediaAnalyzer>([
      ["image", this.image],
      ["video", new UnsupportedAnalyzer("video", "Video analysis is not supported yet")],
      ["audio", new UnsupportedAnalyzer("audio", "Audio analysis is not supported yet")],
      ["text", new UnsupportedAnalyzer("text", "Text objects are summarized, not analyzed; use summarize-object")],
    ]);
  }

  /** Content types we cannot place are attempted as images; decoding decides. */
  resolve(contentType: string): MediaAnalyzer {
    const modality = modalityOf(contentType) ?? "image";
    return this.analyzers.get(modality) ?? this.image;
  }
}
