import { Body, Controller, Headers, HttpCode, HttpStatus, Inject, Post } from "@nestjs/common";

import { SummarizeObjectRequestDto, SummarizeTextRequestDto } from "../dto/summarize-request.dto.js";
import { CORRELATION_HEADER } from "../middleware/correlation-id.middleware.js";
import { PipelineService } from "../services/pipeline.service.js";
import type { SummarizationResult } from "../types.js";

@Controller("v1")
export class SummarizeController {
  constructor(
    @Inject(PipelineService)
    private readonly pipeline: PipelineService,
  ) {}

  @Post("summarize")
  @HttpCode(HttpStatus.OK)
  async summarize(
    @Body() body: SummarizeTextRequestDto,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ): Promise<SummarizationResult> {
    return this.pipeline.summarizeText({ text: body.text, sentenceCount: body.sentenceCount }, { correlationId });
  }

  @Post("summarize-object")
  @HttpCode(HttpStatus.OK)
  async summarizeObject(
    @Body() body: SummarizeObjectRequestDto,
    @Headers(CORRELATION_HEADER) correlationId?: string,
  ): Promise<SummarizationResult> {
    return this.pipeline.summarizeObject({ bucket: body.bucket, key: body.key }, body.sentenceCount, { correlationId });
  }
}
