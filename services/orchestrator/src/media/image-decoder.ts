import { Injectable, Logger } from "@nestjs/common";
import sharp from "sharp";

import { PipelineError } from "../errors.js";
import { describeReference } from "../storage/reference.js";
import type { DecodedImage, RawMedia } from "../types.js";

@Injectable()
export class ImageDecoder {
  private readonly logger = new Logger(ImageDecoder.name);

  /**
   * Decodes to raw pixels and reads container metadata concurrently. When the
   * store declared dimensions for the object, they must match what decoded.
   */
  async decode(media: RawMedia): Promise<DecodedImage> {
    const location = describeReference(media.reference);
    if (media.body.length === 0) {
      throw new PipelineError("InvalidInput", "decode", `Object ${location} is empty`, {
        bucket: media.reference.bucket,
        key: media.reference.key,
      });
    }

    let decoded: { data: Buffer; info: sharp.OutputInfo };
    let metadata: sharp.Metadata;
    try {
      [decoded, metadata] = await Promise.all([
        sharp(media.body, { failOn: "error" }).raw().toBuffer({ resolveWithObject: true }),
        sharp(media.body).metadata(),
      ]);
    } catch (error) {
      throw new PipelineError(
        "InvalidInput",
        "decode",
        `Object ${location} could not be decoded as an image`,
        { bucket: media.reference.bucket, key: media.reference.key, contentType: media.contentType },
        { cause: error },
      );
    }

    const { width, height, channels } = decoded.info;
    if (width < 1 || height < 1 || decoded.data.length === 0) {
      throw new PipelineError("InvalidInput", "decode", `Object ${location} decoded to an empty image`, {
        bucket: media.reference.bucket,
        key: media.reference.key,
      });
    }

    const declared = media.declaredDimensions;
    if (declared && (declared.width !== width || declared.height !== height)) {
      throw new PipelineError(
        "InvalidInput",
        "decode",
        `Object ${location} decoded to ${width}x${height}, store declared ${declared.width}x${declared.height}`,
        { bucket: media.reference.bucket, key: media.reference.key },
      );
    }

    this.logger.debug(`Decoded ${location}: ${metadata.format ?? "unknown"} ${width}x${height}`);
    return {
      width,
      height,
      channels,
      pixels: decoded.data,
      encoded: media.body,
      format: metadata.format ?? "unknown",
      contentType: media.contentType,
      sizeBytes: media.size,
    };
  }
}
