export type CallKind = "model-generation" | "tester-checklist" | "code-review";

export type AttemptOutcome = "success" | "transport-error" | "service-error";

export type GenerationLogEntry = Readonly<{
  model: string;
  kind: CallKind;
  attempt: number;
  timestamp: string;
  prompt: string;
  /** Raw response text; empty when the attempt failed. */
  response: string;
  outcome: AttemptOutcome;
  /** Total tokens the service billed for the call, when it reports usage. */
  tokens?: number;
  error?: string;
}>;

export type GenerationRequest = {
  prompt: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
};

export type Completion = {
  text: string;
  tokens?: number;
};

/**
 * Whatever actually talks to the text-generation service.
 *
 * Implementations throw ServiceResponseError for application-level rejections;
 * any other rejection is treated as a transport failure and may be retried.
 */
export interface GenerationTransport {
  complete(request: GenerationRequest, signal: AbortSignal): Promise<Completion>;
}

export type GenerationResult = {
  text: string;
  log: readonly GenerationLogEntry[];
};
