import { vi } from "vitest";

import type { Detector } from "../src/detection/detector.js";
import { ImageDecoder } from "../src/media/image-decoder.js";
import type { StopWordLoader } from "../src/summarization/stopwords.js";
import type { DecodedImage, RawMedia } from "../src/types.js";

export const STOP_WORDS: ReadonlySet<string> = new Set(["the", "a", "is", "on", "of", "and"]);

export const stopWordLoader: StopWordLoader = async () => STOP_WORDS;

export class FakeDetector implements Detector {
  readonly name = "fake";
  readonly model = "test-model";
  readonly infer = vi.fn<Detector["infer"]>(async () => []);
}

/** Skips pixel decoding; reports a fixed 4x3 RGB image for whatever bytes it is given. */
export class StubDecoder extends ImageDecoder {
  async decode(media: RawMedia): Promise<DecodedImage> {
    return decodedImage({ encoded: media.body, contentType: media.contentType, sizeBytes: media.size });
  }
}

export function decodedImage(overrides: Partial<DecodedImage> = {}): DecodedImage {
  return {
    width: 4,
    height: 3,
    channels: 3,
    pixels: Buffer.alloc(36),
    encoded: Buffer.from("png-bytes"),
    format: "png",
    contentType: "image/png",
    sizeBytes: 9,
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Resolves never; rejects with the signal's reason once it aborts. */
export function untilAborted<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
