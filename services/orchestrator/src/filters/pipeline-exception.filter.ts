import { type ArgumentsHost, Catch, type ExceptionFilter, HttpStatus } from "@nestjs/common";
import type { Request, Response } from "express";

import type { ErrorResponseDto } from "../dto/error-response.dto.js";
import { type ErrorKind, PipelineError } from "../errors.js";
import { CORRELATION_HEADER } from "../middleware/correlation-id.middleware.js";

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  Unauthorized: HttpStatus.FORBIDDEN,
  NotFound: HttpStatus.NOT_FOUND,
  PayloadTooLarge: HttpStatus.PAYLOAD_TOO_LARGE,
  CapacityExceeded: HttpStatus.TOO_MANY_REQUESTS,
  InferenceFailure: HttpStatus.INTERNAL_SERVER_ERROR,
  Transient: HttpStatus.BAD_GATEWAY,
  EngineUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  Timeout: HttpStatus.GATEWAY_TIMEOUT,
};

@Catch(PipelineError)
export class PipelineExceptionFilter implements ExceptionFilter<PipelineError> {
  catch(exception: PipelineError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    if (exception.kind === "CapacityExceeded") {
      response.setHeader("Retry-After", "1");
    }

    const body: ErrorResponseDto = {
      error: {
        code: exception.kind,
        message: exception.message,
        stage: exception.stage,
        category: exception.category,
        retryable: exception.retryable,
      },
      correlationId: request.header(CORRELATION_HEADER),
    };
    response.status(STATUS_BY_KIND[exception.kind]).json(body);
  }
}
