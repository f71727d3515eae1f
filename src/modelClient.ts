import { setTimeout as sleep } from 'node:timers/promises';
import { APICallError, gateway, generateObject } from 'ai';
import type { z } from 'zod';
import { ModelCallError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ResponseKind } from './schemas.js';
import type { ChatMessage } from './types.js';

export interface ModelRequest<T> {
  kind: ResponseKind;
  messages: ChatMessage[];
  modelId: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * The only thing the engine needs from a model provider: one structured
 * answer per request, already validated against `schema`.
 */
export interface ModelCaller {
  call<T>(req: ModelRequest<T>): Promise<T>;
}

export interface GenerateArgs {
  modelId: string;
  messages: ChatMessage[];
  schema: z.ZodTypeAny;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/** Raw provider call. Returns the unvalidated object. */
export type GenerateFn = (args: GenerateArgs) => Promise<unknown>;

export const generateWithGateway: GenerateFn = async args => {
  const { object } = await generateObject({
    model: gateway(args.modelId),
    output: 'object',
    schema: args.schema,
    messages: args.messages,
    temperature: args.temperature,
    maxOutputTokens: args.maxTokens,
    // Retries are handled by GatewayModelClient.
    maxRetries: 0,
    abortSignal: args.signal,
  });
  return object;
};

export interface GatewayClientConfig {
  maxAttempts: number;
  backoffBaseMs: number;
  timeoutMs: number;
  // Gateway ids tried, in order, after the requested model gives up.
  fallbackModels: string[];
}

/**
 * 'retry' tries the same model again, 'next_model' moves to the next
 * fallback, 'stop' ends the call.
 */
export type FailureAction = 'retry' | 'next_model' | 'stop';

const AUTH_PATTERNS = ['unauthorized', 'invalid api key', 'authentication'];
const MODEL_PATTERNS = ['not a valid model', 'model not found', 'no such model'];

export function classifyFailure(error: unknown): FailureAction {
  if (error instanceof Error && error.name === 'AbortError') return 'stop';
  if (APICallError.isInstance(error)) {
    if (error.statusCode === 401 || error.statusCode === 403) return 'stop';
    if (error.statusCode === 404) return 'next_model';
  }
  const message = errorMessage(error).toLowerCase();
  if (AUTH_PATTERNS.some(p => message.includes(p))) return 'stop';
  if (MODEL_PATTERNS.some(p => message.includes(p))) return 'next_model';
  return 'retry';
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

export class GatewayModelClient implements ModelCaller {
  private readonly cfg: GatewayClientConfig;
  private readonly generate: GenerateFn;

  constructor(cfg?: Partial<GatewayClientConfig>, generate: GenerateFn = generateWithGateway) {
    this.cfg = {
      maxAttempts: cfg?.maxAttempts ?? 3,
      backoffBaseMs: cfg?.backoffBaseMs ?? 1000,
      timeoutMs: cfg?.timeoutMs ?? 90_000,
      fallbackModels: cfg?.fallbackModels ?? [],
    };
    this.generate = generate;
  }

  async call<T>(req: ModelRequest<T>): Promise<T> {
    const modelIds = [...new Set([req.modelId, ...this.cfg.fallbackModels])];
    const tried: string[] = [];
    let attempts = 0;
    let lastError: unknown = null;

    for (const modelId of modelIds) {
      tried.push(modelId);
      for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
        if (req.signal?.aborted) {
          throw new ModelCallError(`${req.kind} request aborted`, {
            modelIds: tried,
            attempts,
            retryable: false,
            cause: req.signal.reason,
          });
        }

        attempts++;
        let action: FailureAction;
        try {
          const raw = await withTimeout(
            this.generate({
              modelId,
              messages: req.messages,
              schema: req.schema,
              temperature: req.temperature,
              maxTokens: req.maxTokens,
              signal: req.signal,
            }),
            this.cfg.timeoutMs
          );
          return req.schema.parse(raw);
        } catch (err) {
          lastError = err;
          action = req.signal?.aborted ? 'stop' : classifyFailure(err);
        }

        logger.log({
          type: 'SYSTEM',
          content: `ModelClient: ${modelId} ${req.kind} failed (attempt ${attempt}/${this.cfg.maxAttempts}): ${errorMessage(lastError)}`,
          metadata: { visibility: 'private', modelId, kind: req.kind, attempt, action },
        });

        if (action === 'stop') {
          throw new ModelCallError(`${req.kind} request failed: ${errorMessage(lastError)}`, {
            modelIds: tried,
            attempts,
            retryable: false,
            cause: lastError,
          });
        }
        if (action === 'next_model') break;

        if (attempt < this.cfg.maxAttempts && this.cfg.backoffBaseMs > 0) {
          await sleep(this.cfg.backoffBaseMs * 2 ** (attempt - 1), undefined, { signal: req.signal });
        }
      }
    }

    throw new ModelCallError(
      `${req.kind} request failed after ${attempts} attempt(s) on ${tried.join(', ')}: ${errorMessage(lastError)}`,
      { modelIds: tried, attempts, retryable: true, cause: lastError }
    );
  }
}
