import { Controller, Get, Inject } from "@nestjs/common";

import { DetectionEngine } from "../detection/detection.engine.js";
import type { ObjectStore } from "../storage/storage.service.js";
import { OBJECT_STORE } from "../tokens.js";

@Controller("health")
export class HealthController {
  constructor(
    @Inject(OBJECT_STORE) private readonly store: ObjectStore,
    @Inject(DetectionEngine) private readonly engine: DetectionEngine,
  ) {}

  @Get()
  health(): { status: "ok"; objectStore: string; detector: string; model: string } {
    return {
      status: "ok",
      objectStore: this.store.name,
      detector: this.engine.backend,
      model: this.engine.model,
    };
  }
}
