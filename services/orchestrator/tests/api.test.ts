import "reflect-metadata";

import type { INestApplication } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AppModule } from "../src/app.module.js";
import { loadConfig } from "../src/config.js";
import { PipelineError } from "../src/errors.js";
import { configureApp } from "../src/main.js";
import { ImageDecoder } from "../src/media/image-decoder.js";
import { InMemoryObjectStore } from "../src/storage/memory.storage.js";
import { TextRankSummarizer } from "../src/summarization/textrank.summarizer.js";
import { APP_CONFIG, DETECTOR, OBJECT_STORE, SUMMARIZER } from "../src/tokens.js";
import { FakeDetector, StubDecoder, stopWordLoader } from "./support.js";

describe("Pipeline API", () => {
  let app: INestApplication;
  let store: InMemoryObjectStore;
  let detector: FakeDetector;

  beforeEach(async () => {
    store = new InMemoryObjectStore();
    detector = new FakeDetector();

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(APP_CONFIG)
      .useValue(loadConfig({ OBJECT_STORE: "memory", RETRY_BACKOFF_MS: "0" }))
      .overrideProvider(OBJECT_STORE)
      .useValue(store)
      .overrideProvider(DETECTOR)
      .useValue(detector)
      .overrideProvider(SUMMARIZER)
      .useValue(new TextRankSummarizer({ locale: "en", maxSentences: 50 }, stopWordLoader))
      .overrideProvider(ImageDecoder)
      .useValue(new StubDecoder())
      .compile();

    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();

    store.put({ bucket: "media", key: "dog.png" }, Buffer.from("png"), { contentType: "image/png" });
  });

  afterEach(async () => {
    await app.close();
  });

  it("reports health", async () => {
    const response = await request(app.getHttpServer()).get("/health").expect(200);

    expect(response.body).toEqual({ status: "ok", objectStore: "memory", detector: "fake", model: "test-model" });
  });

  it("analyzes media and echoes the correlation id", async () => {
    detector.infer.mockResolvedValue([
      { label: "dog", confidence: 0.9, bbox: [0, 0, 2, 2] },
      { label: "person", confidence: 0.3, bbox: [1, 1, 3, 3] },
    ]);

    const response = await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .set("X-Correlation-Id", "req-123")
      .send({ bucket: "media", key: "dog.png", confidenceThreshold: 0.5 })
      .expect(200);

    expect(response.headers["x-correlation-id"]).toBe("req-123");
    expect(response.body).toMatchObject({
      source: { bucket: "media", key: "dog.png" },
      image: { width: 4, height: 3, format: "png", contentType: "image/png" },
      model: "test-model",
      detections: [{ label: "dog", confidence: 0.9, box: { x1: 0, y1: 0, x2: 2, y2: 2 } }],
      counts: { dog: 1 },
      summaryText: "Detected 1 dog in the image.",
    });
  });

  it("maps a missing object to 404 with the error envelope", async () => {
    const response = await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .send({ bucket: "media", key: "missing.png" })
      .expect(404);

    const correlationId = response.headers["x-correlation-id"];
    expect(correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(response.body).toEqual({
      error: {
        code: "NotFound",
        message: "Object s3://media/missing.png not found",
        stage: "fetch",
        category: "retrieval",
        retryable: false,
      },
      correlationId,
    });
    expect(detector.infer).not.toHaveBeenCalled();
  });

  it("replaces malformed correlation ids", async () => {
    const response = await request(app.getHttpServer())
      .get("/health")
      .set("X-Correlation-Id", "not a valid id!")
      .expect(200);

    expect(response.headers["x-correlation-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("rejects malformed analyze requests", async () => {
    await request(app.getHttpServer()).post("/v1/analyze-media").send({ bucket: "media" }).expect(400);
    await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .send({ bucket: "media", key: "dog.png", confidenceThreshold: 1.5 })
      .expect(400);
    expect(detector.infer).not.toHaveBeenCalled();
  });

  it("returns 400 for unsupported media types", async () => {
    store.put({ bucket: "media", key: "clip.mp4" }, Buffer.from("mp4"));

    const response = await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .send({ bucket: "media", key: "clip.mp4" })
      .expect(400);

    expect(response.body.error).toMatchObject({ code: "InvalidInput", stage: "decode", category: "processing" });
  });

  it("returns 503 when the detector stays unavailable", async () => {
    detector.infer.mockRejectedValue(new PipelineError("EngineUnavailable", "inference", "Detector unavailable (503)"));

    const response = await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .send({ bucket: "media", key: "dog.png" })
      .expect(503);

    expect(response.body.error).toMatchObject({ code: "EngineUnavailable", retryable: true });
    expect(detector.infer).toHaveBeenCalledTimes(2);
  });

  it("returns 429 with Retry-After when at capacity", async () => {
    detector.infer.mockRejectedValue(new PipelineError("CapacityExceeded", "inference", "detection backend is at capacity"));

    const response = await request(app.getHttpServer())
      .post("/v1/analyze-media")
      .send({ bucket: "media", key: "dog.png" })
      .expect(429);

    expect(response.headers["retry-after"]).toBe("1");
    expect(response.body.error.code).toBe("CapacityExceeded");
  });

  it("summarizes text", async () => {
    const response = await request(app.getHttpServer())
      .post("/v1/summarize")
      .send({ text: "Sentence one. Sentence two. Sentence three.", sentenceCount: 5 })
      .expect(200);

    expect(response.body).toEqual({
      summary: "Sentence one. Sentence two. Sentence three.",
      sentences: ["Sentence one.", "Sentence two.", "Sentence three."],
      sentenceCount: 3,
      requestedCount: 5,
    });
  });

  it("rejects blank text and bad sentence counts", async () => {
    await request(app.getHttpServer()).post("/v1/summarize").send({ text: "   " }).expect(400);
    await request(app.getHttpServer()).post("/v1/summarize").send({ text: "One.", sentenceCount: 0 }).expect(400);
    await request(app.getHttpServer()).post("/v1/summarize").send({ text: "One.", sentenceCount: 1.5 }).expect(400);
  });

  it("returns 413 for text with too many sentences", async () => {
    const text = Array.from({ length: 51 }, (_, index) => `Point ${index}.`).join(" ");

    const response = await request(app.getHttpServer()).post("/v1/summarize").send({ text }).expect(413);

    expect(response.body.error).toMatchObject({ code: "PayloadTooLarge", stage: "summarize" });
  });

  it("summarizes a stored text object", async () => {
    store.put({ bucket: "docs", key: "notes.txt" }, Buffer.from("First point. Second point."));

    const response = await request(app.getHttpServer())
      .post("/v1/summarize-object")
      .send({ bucket: "docs", key: "notes.txt" })
      .expect(200);

    expect(response.body.sentences).toEqual(["First point.", "Second point."]);
  });

  it("returns 400 when summarizing an image object", async () => {
    const response = await request(app.getHttpServer())
      .post("/v1/summarize-object")
      .send({ bucket: "media", key: "dog.png" })
      .expect(400);

    expect(response.body.error).toMatchObject({ code: "InvalidInput", stage: "summarize" });
  });
});
