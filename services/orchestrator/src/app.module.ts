import { type MiddlewareConsumer, Module, type NestModule } from "@nestjs/common";

import { loadConfig, type AppConfig } from "./config.js";
import { AnalyzeController } from "./controllers/analyze.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { SummarizeController } from "./controllers/summarize.controller.js";
import { DetectionEngine } from "./detection/detection.engine.js";
import type { Detector } from "./detection/detector.js";
import { HttpDetector } from "./detection/http.detector.js";
import { NoopDetector } from "./detection/noop.detector.js";
import { MediaAnalyzerRegistry } from "./media/analyzers.js";
import { ImageDecoder } from "./media/image-decoder.js";
import { CorrelationIdMiddleware } from "./middleware/correlation-id.middleware.js";
import { PipelineService } from "./services/pipeline.service.js";
import { InMemoryObjectStore } from "./storage/memory.storage.js";
import { S3ObjectStore } from "./storage/s3.storage.js";
import type { ObjectStore } from "./storage/storage.service.js";
import type { Summarizer } from "./summarization/summarizer.js";
import { TextRankSummarizer } from "./summarization/textrank.summarizer.js";
import { APP_CONFIG, DETECTOR, OBJECT_STORE, SUMMARIZER } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const objectStoreProvider = {
  provide: OBJECT_STORE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): ObjectStore => {
    if (config.objectStorage.driver === "memory") {
      return new InMemoryObjectStore(config.objectStorage.maxObjectBytes);
    }
    return new S3ObjectStore(config.objectStorage);
  },
};

const detectorProvider = {
  provide: DETECTOR,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): Detector => {
    const { backend, url, model } = config.detector;
    if (backend === "http" && url) {
      return new HttpDetector({ baseUrl: url, model });
    }
    return new NoopDetector();
  },
};

const summarizerProvider = {
  provide: SUMMARIZER,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): Summarizer => new TextRankSummarizer(config.summarizer),
};

@Module({
  imports: [],
  controllers: [AnalyzeController, SummarizeController, HealthController],
  providers: [
    configProvider,
    objectStoreProvider,
    detectorProvider,
    summarizerProvider,
    ImageDecoder,
    MediaAnalyzerRegistry,
    DetectionEngine,
    PipelineService,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes("*");
  }
}
