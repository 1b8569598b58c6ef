import { afterEach, describe, it, expect, vi } from "vitest";
import { ServiceResponseError } from "../errors";
import { ChatCompletionsTransport, OllamaTransport } from "./ai.llm";
import type { GenerationRequest } from "./ai.types";

const request: GenerationRequest = {
  prompt: "write sql",
  model: "test-model",
  maxTokens: 256,
  temperature: 0.2,
  topP: 1,
};

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn<typeof fetch>(async () => new Response(body, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ChatCompletionsTransport", () => {
  const transport = new ChatCompletionsTransport("http://llm.test/v1/chat/completions", "test-secret");

  it("sends a chat payload and returns the first choice", async () => {
    const fetchMock = stubFetch(200, JSON.stringify({ choices: [{ message: { content: "select 1" } }] }));

    await expect(transport.complete(request, new AbortController().signal)).resolves.toEqual({ text: "select 1" });

    expect(fetchMock.mock.calls[0][0]).toBe("http://llm.test/v1/chat/completions");
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "content-type": "application/json",
      authorization: "Bearer test-secret",
    });
    expect(sentBody(fetchMock)).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "write sql" }],
      temperature: 0.2,
      top_p: 1,
      max_tokens: 256,
    });
  });

  it("reads total token usage when the service reports it", async () => {
    stubFetch(
      200,
      JSON.stringify({
        choices: [{ message: { content: "select 1" } }],
        usage: { prompt_tokens: 30, completion_tokens: 12, total_tokens: 42 },
      })
    );

    await expect(transport.complete(request, new AbortController().signal)).resolves.toEqual({
      text: "select 1",
      tokens: 42,
    });
  });

  it("reports a 4xx as a service error", async () => {
    stubFetch(400, "bad request");

    const err = await transport.complete(request, new AbortController().signal).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServiceResponseError);
    expect(err).toMatchObject({ status: 400, detail: "bad request" });
  });

  it("reports a 5xx as a plain, retryable error", async () => {
    stubFetch(503, "busy");

    const err = await transport.complete(request, new AbortController().signal).catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(ServiceResponseError);
    expect(err).toMatchObject({ message: "HTTP 503: busy" });
  });

  it("rejects a body without choices", async () => {
    stubFetch(200, JSON.stringify({ choices: [] }));

    await expect(transport.complete(request, new AbortController().signal)).rejects.toBeInstanceOf(
      ServiceResponseError
    );
  });
});

describe("OllamaTransport", () => {
  it("sends a non-streaming generate request", async () => {
    const fetchMock = stubFetch(
      200,
      JSON.stringify({ response: "select 2", done: true, prompt_eval_count: 20, eval_count: 5 })
    );
    const transport = new OllamaTransport("http://localhost:11434/api/generate");

    await expect(transport.complete(request, new AbortController().signal)).resolves.toEqual({
      text: "select 2",
      tokens: 25,
    });
    expect(sentBody(fetchMock)).toEqual({
      model: "test-model",
      prompt: "write sql",
      stream: false,
      options: { temperature: 0.2, top_p: 1, num_predict: 256 },
    });
  });
});
