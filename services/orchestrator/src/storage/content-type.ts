import type { Modality } from "../types.js";

export const UNKNOWN_CONTENT_TYPE = "unknown";

const MEDIA_TYPES: Record<Modality, readonly string[]> = {
  image: ["image/jpeg", "image/png", "image/gif", "image/webp", "image/tiff", "image/bmp"],
  video: ["video/mp4", "video/mpeg", "video/quicktime", "video/x-msvideo", "video/webm"],
  audio: ["audio/mpeg", "audio/wav", "audio/ogg", "audio/webm", "audio/aac", "audio/flac"],
  text: ["text/plain", "text/html", "text/csv", "text/markdown", "application/json", "application/xml"],
};

const MODALITIES: readonly Modality[] = ["image", "video", "audio", "text"];

const EXTENSIONS: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
  tif: "image/tiff",
  tiff: "image/tiff",
  bmp: "image/bmp",
  mp4: "video/mp4",
  mpeg: "video/mpeg",
  mov: "video/quicktime",
  avi: "video/x-msvideo",
  webm: "video/webm",
  mp3: "audio/mpeg",
  wav: "audio/wav",
  ogg: "audio/ogg",
  aac: "audio/aac",
  flac: "audio/flac",
  txt: "text/plain",
  html: "text/html",
  csv: "text/csv",
  md: "text/markdown",
  json: "application/json",
  xml: "application/xml",
};

/** Strips parameters such as `; charset=utf-8` and lower-cases the type. */
export function normalizeContentType(value: string | undefined): string | undefined {
  const base = value?.split(";")[0]?.trim().toLowerCase();
  return base ? base : undefined;
}

export function inferContentType(key: string): string {
  const name = key.slice(key.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  if (dot <= 0) {
    return UNKNOWN_CONTENT_TYPE;
  }
  return EXTENSIONS[name.slice(dot + 1).toLowerCase()] ?? UNKNOWN_CONTENT_TYPE;
}

/**
 * Store metadata wins; `application/octet-stream` carries no information, so
 * it falls through to the key's extension.
 */
export function resolveContentType(declared: string | undefined, key: string): string {
  const normalized = normalizeContentType(declared);
  if (normalized && normalized !== "application/octet-stream") {
    return normalized;
  }
  return inferContentType(key);
}

export function modalityOf(contentType: string): Modality | undefined {
  const normalized = normalizeContentType(contentType);
  if (!normalized) {
    return undefined;
  }
  for (const modality of MODALITIES) {
    if (MEDIA_TYPES[modality].includes(normalized)) {
      return modality;
    }
  }
  const family = normalized.split("/")[0];
  if (family === "image" || family === "video" || family === "audio" || family === "text") {
    return family;
  }
  return undefined;
}
