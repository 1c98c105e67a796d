import type { BoundingBox, Detection, ImageDimensions, RawDetection } from "../types.js";

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function toBox(bbox: RawDetection["bbox"], image: ImageDimensions): BoundingBox | undefined {
  if (!bbox.every(Number.isFinite)) {
    return undefined;
  }
  const [ax, ay, bx, by] = bbox;
  const box = {
    x1: clamp(Math.min(ax, bx), 0, image.width),
    y1: clamp(Math.min(ay, by), 0, image.height),
    x2: clamp(Math.max(ax, bx), 0, image.width),
    y2: clamp(Math.max(ay, by), 0, image.height),
  };
  if (box.x2 - box.x1 <= 0 || box.y2 - box.y1 <= 0) {
    return undefined;
  }
  return box;
}

/**
 * Converts backend output into public detections, in model output order.
 * Drops anything below `threshold`, anything with a non-finite confidence and
 * boxes that fall entirely outside the image.
 */
export function normalizeDetections(
  raw: readonly RawDetection[],
  image: ImageDimensions,
  threshold: number,
): Detection[] {
  const detections: Detection[] = [];
  for (const item of raw) {
    if (!Number.isFinite(item.confidence)) {
      continue;
    }
    const confidence = clamp(item.confidence, 0, 1);
    if (confidence < threshold) {
      continue;
    }
    const box = toBox(item.bbox, image);
    if (!box) {
      continue;
    }
    detections.push({ label: item.label, confidence, box });
  }
  return detections;
}

export function countByLabel(detections: readonly Detection[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const detection of detections) {
    counts[detection.label] = (counts[detection.label] ?? 0) + 1;
  }
  return counts;
}

export function describeDetections(counts: Readonly<Record<string, number>>): string {
  const parts = Object.entries(counts).map(([label, count]) => `${count} ${label}${count > 1 ? "s" : ""}`);
  if (parts.length === 0) {
    return "No objects detected in the image.";
  }
  if (parts.length === 1) {
    return `Detected ${parts[0]} in the image.`;
  }
  const last = parts.pop();
  return `Detected ${parts.join(", ")} and ${last} in the image.`;
}
