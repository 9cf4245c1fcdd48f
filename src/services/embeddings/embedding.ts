import { setTimeout as delay } from "node:timers/promises";

import { EmbeddingProviderId } from "../../config/loadConfig.js";
import type { EmbeddingProvider, TriageConfig } from "../../config/loadConfig.js";
import {
  EmbeddingResponseLengthMismatchError,
  ProviderApiResponseError,
  ProviderRequestFailedError
} from "../../errors/provider.errors.js";
import { isPlainObject } from "../../ingest/dedupeKey.js";

export type EmbeddingsConfig = TriageConfig["embeddings"];

/**
 * Turns code fragments into vectors. Implementations must return one vector
 * of `dimensions` numbers per input text, in input order.
 */
export interface Embedder {
  readonly dimensions: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type HttpEmbedderOptions = {
  fetchImpl?: typeof fetch;
  retry?: Partial<RetryPolicy>;
};

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000
};

function parseRetryAfterMs(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds * 1000;
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) return timestamp - Date.now();
  return null;
}

function computeDelayMs(policy: RetryPolicy, attempt: number, retryAfter: string | null): number {
  const retryAfterMs = parseRetryAfterMs(retryAfter);
  if (retryAfterMs !== null) {
    return Math.min(policy.maxDelayMs, Math.max(0, retryAfterMs));
  }
  const backoff = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = policy.baseDelayMs > 0 ? Math.floor(Math.random() * 100) : 0;
  return backoff + jitter;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function readErrorMessage(payload: unknown): string | null {
  if (!isPlainObject(payload) || !isPlainObject(payload.error)) return null;
  const message = payload.error.message;
  return typeof message === "string" && message ? message : null;
}

function readVector(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const vector: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number" || !Number.isFinite(entry)) return null;
    vector.push(entry);
  }
  return vector;
}

export function parseEmbeddingResponse(payload: unknown, expected: number, status: number): number[][] {
  const data = isPlainObject(payload) && Array.isArray(payload.data) ? payload.data : [];
  const items: Array<{ index: number; embedding: number[] }> = [];
  data.forEach((item, position) => {
    if (!isPlainObject(item)) return;
    const embedding = readVector(item.embedding);
    if (!embedding) {
      throw new ProviderApiResponseError(`Embedding response item ${position} is not a numeric vector.`, status);
    }
    items.push({ index: typeof item.index === "number" ? item.index : position, embedding });
  });
  items.sort((a, b) => a.index - b.index);

  if (items.length !== expected) {
    throw new EmbeddingResponseLengthMismatchError(expected, items.length);
  }
  return items.map((item) => item.embedding);
}

/**
 * Client for OpenAI-compatible `/v1/embeddings` endpoints. Requests are split
 * into `batchSize` chunks and retried on transient statuses and network errors.
 */
export class HttpEmbedder implements Embedder {
  readonly dimensions: number;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly config: EmbeddingsConfig,
    options: HttpEmbedderOptions = {}
  ) {
    this.dimensions = config.dimensions;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!texts.length) return [];
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts
        .slice(start, start + this.config.batchSize)
        .map((text) => text.slice(0, this.config.maxInputChars));
      vectors.push(...(await this.embedBatch(batch, signal)));
    }
    return vectors;
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const includeDimensions = this.config.model.startsWith("text-embedding-3");
    const response = await this.safeFetch(
      {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify({
          model: this.config.model,
          input: texts,
          ...(includeDimensions ? { dimensions: this.config.dimensions } : {})
        }),
        signal
      },
      signal
    );

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderApiResponseError(`Embedding response was not JSON: ${message}`, response.status);
    }

    if (!response.ok) {
      const message = readErrorMessage(payload) || `Embedding request failed with status ${response.status}`;
      throw new ProviderApiResponseError(message, response.status);
    }

    return parseEmbeddingResponse(payload, texts.length, response.status);
  }

  private buildHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      ...this.config.headers,
      Authorization: `Bearer ${this.config.apiKey}`
    };
  }

  private async safeFetch(init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const url = this.config.endpoint;
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      try {
        const response = await this.fetchImpl(url, init);
        if (!RETRYABLE_STATUSES.has(response.status) || attempt === this.retry.maxAttempts) {
          return response;
        }
        await response.body?.cancel();
        await delay(computeDelayMs(this.retry, attempt, response.headers.get("retry-after")), undefined, { signal });
      } catch (err) {
        if (isAbortError(err)) throw err;
        lastError = err;
        if (attempt === this.retry.maxAttempts) break;
        await delay(computeDelayMs(this.retry, attempt, null), undefined, { signal });
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ProviderRequestFailedError("Embedding", this.provider, url, message);
  }

  private get provider(): EmbeddingProvider {
    return this.config.provider;
  }
}

export function createEmbedder(config: EmbeddingsConfig, options: HttpEmbedderOptions = {}): Embedder | null {
  if (config.provider === EmbeddingProviderId.Disabled) return null;
  return new HttpEmbedder(config, options);
}
