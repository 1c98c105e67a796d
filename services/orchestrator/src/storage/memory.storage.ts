import { Injectable } from "@nestjs/common";

import { PipelineError } from "../errors.js";
import type { CallOptions, ImageDimensions, MediaReference, RawMedia } from "../types.js";
import { resolveContentType } from "./content-type.js";
import { assertReference, describeReference, tooLarge } from "./reference.js";
import type { ObjectStore } from "./storage.service.js";

interface StoredObject {
  data: Buffer;
  contentType?: string;
  dimensions?: ImageDimensions;
}

/** Process-local store for development and tests. */
@Injectable()
export class InMemoryObjectStore implements ObjectStore {
  readonly name = "memory";
  private readonly objects = new Map<string, StoredObject>();

  constructor(private readonly maxObjectBytes: number = Number.POSITIVE_INFINITY) {}

  put(
    reference: MediaReference,
    data: Buffer,
    options: { contentType?: string; dimensions?: ImageDimensions } = {},
  ): void {
    this.objects.set(describeReference(reference), {
      data: Buffer.from(data),
      contentType: options.contentType,
      dimensions: options.dimensions,
    });
  }

  async fetch(reference: MediaReference, options: CallOptions = {}): Promise<RawMedia> {
    assertReference(reference);
    options.signal?.throwIfAborted();

    const stored = this.objects.get(describeReference(reference));
    if (!stored) {
      throw new PipelineError("NotFound", "fetch", `Object ${describeReference(reference)} not found`, {
        bucket: reference.bucket,
        key: reference.key,
      });
    }
    if (stored.data.length > this.maxObjectBytes) {
      throw tooLarge(reference, stored.data.length, this.maxObjectBytes);
    }
    return {
      reference,
      body: Buffer.from(stored.data),
      contentType: resolveContentType(stored.contentType, reference.key),
      size: stored.data.length,
      declaredDimensions: stored.dimensions,
    };
  }
}
