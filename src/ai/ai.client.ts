import { setTimeout as delay } from "timers/promises";
import { GenerationFailure, RunCancelled, ServiceResponseError, errorMessage } from "../errors";
import { logger } from "../utils/logger";
import type {
  CallKind,
  Completion,
  GenerationLogEntry,
  GenerationRequest,
  GenerationResult,
  GenerationTransport,
} from "./ai.types";

export type GenerationClientOptions = {
  model: string;
  maxTokens: number;
  temperature: number;
  topP?: number;
  timeoutMs: number;
  /** Extra attempts after the first one fails at the transport level. */
  retries: number;
  retryDelayMs: number;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    const fail = () => reject(signal.reason ?? new Error("aborted"));
    if (signal.aborted) fail();
    else signal.addEventListener("abort", fail, { once: true });
  });
}

/**
 * Sends prompts to the text-generation service and records every attempt.
 *
 * Transport failures and timeouts are retried with exponential backoff; a
 * ServiceResponseError from the transport is final. The attempt log is returned with
 * the result (or carried by the GenerationFailure) so callers own it.
 */
export class GenerationClient {
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly transport: GenerationTransport,
    private readonly options: GenerationClientOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async generate(
    modelName: string,
    prompt: string,
    kind: CallKind,
    signal?: AbortSignal
  ): Promise<GenerationResult> {
    const log: GenerationLogEntry[] = [];
    const maxAttempts = this.options.retries + 1;

    const record = (
      attempt: number,
      outcome: GenerationLogEntry["outcome"],
      response: string,
      error?: string,
      tokens?: number
    ) => {
      log.push(
        Object.freeze({
          model: modelName,
          kind,
          attempt,
          timestamp: this.now().toISOString(),
          prompt,
          response,
          outcome,
          ...(tokens !== undefined ? { tokens } : {}),
          ...(error !== undefined ? { error } : {}),
        })
      );
    };

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new RunCancelled();

      try {
        const { text, tokens } = await this.attemptOnce(prompt, signal);
        record(attempt, "success", text, undefined, tokens);
        return { text, log };
      } catch (err) {
        if (signal?.aborted) throw new RunCancelled();

        if (err instanceof ServiceResponseError) {
          record(attempt, "service-error", "", err.message);
          logger.warn(`[${modelName}] ${kind} rejected by service (${err.status})`);
          throw new GenerationFailure("ServiceError", err.detail, log);
        }

        const message = errorMessage(err);
        record(attempt, "transport-error", "", message);

        if (attempt >= maxAttempts) {
          logger.warn(`[${modelName}] ${kind} failed after ${attempt} attempt(s): ${message}`);
          throw new GenerationFailure("TransportError", message, log);
        }

        const wait = this.options.retryDelayMs * 2 ** (attempt - 1);
        logger.info(`[${modelName}] ${kind} attempt ${attempt} failed, retrying in ${wait}ms`);
        try {
          await this.sleep(wait, signal);
        } catch (sleepErr) {
          if (signal?.aborted) throw new RunCancelled();
          throw sleepErr;
        }
      }
    }
  }

  private async attemptOnce(prompt: string, signal?: AbortSignal): Promise<Completion> {
    const request: GenerationRequest = {
      prompt,
      model: this.options.model,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
      topP: this.options.topP ?? 1,
    };

    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;
    const timer = setTimeout(
      () => controller.abort(new Error(`timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
    const forward = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forward, { once: true });

    try {
      // Race so a transport that ignores the signal still cannot outlive the timeout.
      return await Promise.race([
        this.transport.complete(request, controller.signal),
        rejectOnAbort(controller.signal),
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }
}
