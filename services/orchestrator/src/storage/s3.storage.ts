import { Readable } from "node:stream";

import { GetObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";

import type { ObjectStorageConfig } from "../config.js";
import { PipelineError, isAbortError } from "../errors.js";
import type { CallOptions, ImageDimensions, MediaReference, RawMedia } from "../types.js";
import { resolveContentType } from "./content-type.js";
import { assertReference, describeReference, tooLarge } from "./reference.js";
import type { ObjectStore } from "./storage.service.js";

const NOT_FOUND_CODES = new Set(["NoSuchKey", "NotFound", "NoSuchBucket"]);
const DENIED_CODES = new Set([
  "AccessDenied",
  "Forbidden",
  "AllAccessDisabled",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
]);
const INVALID_CODES = new Set(["InvalidBucketName", "KeyTooLongError"]);

@Injectable()
export class S3ObjectStore implements ObjectStore {
  readonly name = "s3";
  private readonly client: S3Client;
  private readonly logger = new Logger(S3ObjectStore.name);

  constructor(private readonly config: ObjectStorageConfig, client?: S3Client) {
    this.client = client ?? new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle || Boolean(config.endpoint),
      // Retries are the orchestrator's decision, not the SDK's.
      maxAttempts: 1,
      credentials: config.accessKeyId && config.secretAccessKey
        ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        }
        : undefined,
    });
  }

  async fetch(reference: MediaReference, options: CallOptions = {}): Promise<RawMedia> {
    assertReference(reference);

    const controller = new AbortController();
    const { signal } = options;
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    }
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: reference.bucket, Key: reference.key }),
        { abortSignal: controller.signal },
      );

      const reportedSize = response.ContentLength;
      if (reportedSize !== undefined && reportedSize > this.config.maxObjectBytes) {
        if (response.Body instanceof Readable) {
          response.Body.destroy();
        }
        controller.abort();
        throw tooLarge(reference, reportedSize, this.config.maxObjectBytes);
      }
      if (!response.Body) {
        throw new PipelineError("Transient", "fetch", `Empty body returned for ${describeReference(reference)}`, {
          bucket: reference.bucket,
          key: reference.key,
        });
      }

      const bytes = await response.Body.transformToByteArray();
      if (bytes.byteLength > this.config.maxObjectBytes) {
        throw tooLarge(reference, bytes.byteLength, this.config.maxObjectBytes);
      }

      const body = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      this.logger.debug(`Fetched ${describeReference(reference)} (${body.length} bytes)`);
      return {
        reference,
        body,
        contentType: resolveContentType(response.ContentType, reference.key),
        size: body.length,
        declaredDimensions: readDimensions(response.Metadata),
      };
    } catch (error) {
      throw classifyS3Error(error, reference);
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

export function classifyS3Error(error: unknown, reference: MediaReference): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const location = describeReference(reference);
  const ids = { bucket: reference.bucket, key: reference.key };

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode ?? 0;
    const details = { ...ids, status, code: error.name };
    if (NOT_FOUND_CODES.has(error.name) || status === 404) {
      return new PipelineError("NotFound", "fetch", `Object ${location} not found`, details, { cause: error });
    }
    if (DENIED_CODES.has(error.name) || status === 401 || status === 403) {
      return new PipelineError("Unauthorized", "fetch", `Access denied for ${location}`, details);
    }
    if (INVALID_CODES.has(error.name)) {
      return new PipelineError("InvalidInput", "fetch", `Invalid object reference ${location}`, details, { cause: error });
    }
    return new PipelineError("Transient", "fetch", `Object store failed for ${location} (${status || error.name})`, details, {
      cause: error,
    });
  }

  if (isAbortError(error)) {
    return new PipelineError("Transient", "fetch", `Fetch of ${location} was aborted`, ids, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError("Transient", "fetch", `Object store unreachable for ${location}: ${message}`, ids, {
    cause: error,
  });
}

function readDimensions(metadata: Record<string, string> | undefined): ImageDimensions | undefined {
  const width = Number(metadata?.width);
  const height = Number(metadata?.height);
  if (Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0) {
    return { width, height };
  }
  return undefined;
}
