import { z } from "zod";
import { ServiceResponseError } from "../errors";
import type { LlmConfig } from "../config/tool.config";
import type { Completion, GenerationRequest, GenerationTransport } from "./ai.types";

const ChatCompletionZ = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).partial().nullish(),
});

const OllamaGenerateZ = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ServiceResponseError(res.status, `response is not JSON: ${text.slice(0, 200)}`);
  }
}

/**
 * 5xx means the service (or a proxy in front of it) is unavailable, which is worth
 * retrying. Anything else non-2xx is the service rejecting the request.
 */
async function ensureOk(res: Response): Promise<void> {
  if (res.ok) return;
  const detail = (await res.text()).slice(0, 500);
  if (res.status >= 500) {
    throw new Error(`HTTP ${res.status}: ${detail}`);
  }
  throw new ServiceResponseError(res.status, detail);
}

/**
 * OpenAI-compatible chat completions endpoint.
 */
export class ChatCompletionsTransport implements GenerationTransport {
  constructor(
    private readonly apiUrl: string,
    private readonly apiKey?: string
  ) {}

  async complete(request: GenerationRequest, signal: AbortSignal): Promise<Completion> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;

    const res = await fetch(this.apiUrl, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: request.temperature,
        top_p: request.topP,
        max_tokens: request.maxTokens,
      }),
      signal,
    });

    await ensureOk(res);

    const parsed = ChatCompletionZ.safeParse(await readBody(res));
    if (!parsed.success) {
      throw new ServiceResponseError(res.status, "response has no choices[0].message.content");
    }
    return { text: parsed.data.choices[0].message.content, tokens: parsed.data.usage?.total_tokens };
  }
}

/**
 * Ollama /api/generate, non-streaming.
 */
export class OllamaTransport implements GenerationTransport {
  constructor(private readonly apiUrl: string) {}

  async complete(request: GenerationRequest, signal: AbortSignal): Promise<Completion> {
    const res = await fetch(this.apiUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: request.model,
        prompt: request.prompt,
        stream: false,
        options: {
          temperature: request.temperature,
          top_p: request.topP,
          num_predict: request.maxTokens,
        },
      }),
      signal,
    });

    await ensureOk(res);

    const parsed = OllamaGenerateZ.safeParse(await readBody(res));
    if (!parsed.success) {
      throw new ServiceResponseError(res.status, "response has no string `response` field");
    }
    const { response, prompt_eval_count, eval_count } = parsed.data;
    const tokens =
      prompt_eval_count === undefined && eval_count === undefined
        ? undefined
        : (prompt_eval_count ?? 0) + (eval_count ?? 0);
    return { text: response, tokens };
  }
}

export function createTransport(llm: LlmConfig): GenerationTransport {
  if (llm.provider === "ollama") return new OllamaTransport(llm.apiUrl);
  return new ChatCompletionsTransport(llm.apiUrl, llm.apiKey);
}
