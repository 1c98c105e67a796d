import type { z } from 'zod';

import {
  analyzeMediaResponseSchema,
  errorBodySchema,
  healthResponseSchema,
  summarizeResponseSchema,
} from './types.js';
import type {
  AnalyzeMediaRequest,
  AnalyzeMediaResponse,
  HealthResponse,
  SummarizeObjectRequest,
  SummarizeResponse,
  SummarizeTextRequest,
} from './types.js';

export interface PipelineClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export interface RequestOptions {
  correlationId?: string;
  signal?: AbortSignal;
}

export class PipelineClientError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string | undefined,
    readonly stage: string | undefined,
    readonly retryable: boolean,
    readonly correlationId?: string,
  ) {
    super(message);
    this.name = 'PipelineClientError';
  }
}

export class PipelineClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: PipelineClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  analyzeMedia(payload: AnalyzeMediaRequest, options?: RequestOptions): Promise<AnalyzeMediaResponse> {
    return this.post('/v1/analyze-media', payload, analyzeMediaResponseSchema, options);
  }

  summarizeText(payload: SummarizeTextRequest, options?: RequestOptions): Promise<SummarizeResponse> {
    return this.post('/v1/summarize', payload, summarizeResponseSchema, options);
  }

  summarizeObject(payload: SummarizeObjectRequest, options?: RequestOptions): Promise<SummarizeResponse> {
    return this.post('/v1/summarize-object', payload, summarizeResponseSchema, options);
  }

  async health(options?: RequestOptions): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.headersFor(options),
      signal: options?.signal,
    });
    return this.parse(response, healthResponseSchema);
  }

  private async post<T>(
    path: string,
    payload: unknown,
    schema: z.ZodType<T>,
    options?: RequestOptions,
  ): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.headersFor(options),
      },
      body: JSON.stringify(payload),
      signal: options?.signal,
    });
    return this.parse(response, schema);
  }

  private headersFor(options?: RequestOptions): Record<string, string> {
    if (!options?.correlationId) {
      return this.defaultHeaders;
    }
    return { ...this.defaultHeaders, 'X-Correlation-Id': options.correlationId };
  }

  private async parse<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
    if (!response.ok) {
      throw await this.toError(response);
    }
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected response shape from ${response.url || this.baseUrl}`);
    }
    return parsed.data;
  }

  private async toError(response: Response): Promise<PipelineClientError> {
    const body = await this.readErrorBody(response);
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      json = undefined;
    }
    const parsed = errorBodySchema.safeParse(json);
    if (!parsed.success) {
      return new PipelineClientError(
        `Request failed with ${response.status}: ${body}`,
        response.status,
        undefined,
        undefined,
        response.status >= 500,
      );
    }
    const { error, correlationId } = parsed.data;
    return new PipelineClientError(
      `${error.code}: ${error.message}`,
      response.status,
      error.code,
      error.stage,
      error.retryable,
      correlationId,
    );
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
