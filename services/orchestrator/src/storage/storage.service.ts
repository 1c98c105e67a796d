import type { CallOptions, MediaReference, RawMedia } from "../types.js";

export interface ObjectStore {
  readonly name: string;
  fetch(reference: MediaReference, options?: CallOptions): Promise<RawMedia>;
}
