import { Body, Controller, Headers, HttpCode, HttpStatus, Inject, Post } from "@nestjs/common";

import { AnalyzeMediaRequestDto } from "../dto/analyze-request.dto.js";
import { CORRELATION_HEADER } from "../middleware/correlation-id.middleware.js";
import { PipelineService } from "../services/pipeline.service.js";
import type { DetectionResult } from "../types.js";

@Controller("v1")
export class AnalyzeController {
  constructor(
    @Inject(PipelineService)
    private readonly pipeline: PipelineService,
  ) {}

  @Post("analyze-media")
  @HttpCode(HttpStatus.OK)
  async analyzeMedia(
    @Body() body: AnalyzeMediaRequestDto,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ): Promise<DetectionResult> {
    return this.pipeline.analyzeMedia(
      { bucket: body.bucket, key: body.key },
      { confidenceThreshold: body.confidenceThreshold, correlationId },
    );
  }
}
