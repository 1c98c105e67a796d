import { Injectable, type NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";

export const CORRELATION_HEADER = "x-correlation-id";

const VALID_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/** Echoes a caller-supplied correlation id, or assigns one, on every request. */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const supplied = req.header(CORRELATION_HEADER);
    const correlationId = supplied && VALID_ID.test(supplied) ? supplied : uuidv4();
    req.headers[CORRELATION_HEADER] = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);
    next();
  }
}
