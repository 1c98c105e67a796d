import type { ErrorCategory, ErrorKind, PipelineStage } from "../errors.js";

export class ErrorResponseDto {
  error!: {
    code: ErrorKind;
    message: string;
    stage: PipelineStage;
    category: ErrorCategory;
    retryable: boolean;
  };
  correlationId?: string;
}
