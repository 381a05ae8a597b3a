import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OllamaClient } from "./ollama.js";
import { OpenAIClient } from "./openai.js";
import { createGenerationClient } from "./index.js";
import { AnthropicClient } from "./anthropic.js";
import { ConfigSchema } from "../config.js";
import { GenerationError } from "../workflow/errors.js";

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Headers arrived but the body never finished before the timeout fired */
function timedOutBody(status = 200) {
  const timeout = new Error("The operation was aborted due to timeout");
  timeout.name = "TimeoutError";
  return { ok: status < 300, status, text: () => Promise.reject(timeout) };
}

function requestBody(callIndex = 0): unknown {
  const init: unknown = mockFetch.mock.calls[callIndex]?.[1];
  if (
    typeof init === "object" &&
    init !== null &&
    "body" in init &&
    typeof init.body === "string"
  ) {
    return JSON.parse(init.body);
  }
  return undefined;
}

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaClient", () => {
  const options = { model: "llama3.2", maxTokens: 1024 };

  it("posts a non-streaming chat request", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ model: "llama3.2", message: { role: "assistant", content: " fix: x \n" } }),
    );
    const client = new OllamaClient({ baseUrl: "http://localhost:11434/" });

    await expect(client.generateText("prompt", options)).resolves.toBe("fix: x");
    expect(mockFetch.mock.calls[0]?.[0]).toBe("http://localhost:11434/api/chat");
    expect(requestBody()).toEqual({
      model: "llama3.2",
      messages: [{ role: "user", content: "prompt" }],
      stream: false,
    });
  });

  it("names the endpoint when the request fails", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    const client = new OllamaClient({ baseUrl: "http://localhost:11434" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      "Error making request to Ollama (http://localhost:11434/api/chat): fetch failed",
    );
  });

  it("reports non-2xx responses with their body", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('{"error":"model not found"}', { status: 404 }),
    );
    const client = new OllamaClient({ baseUrl: "http://localhost:11434" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      'Ollama API error (404): {"error":"model not found"}',
    );
  });

  it("rejects an empty message", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: { content: "  " } }));
    const client = new OllamaClient({ baseUrl: "http://localhost:11434" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      "No content in Ollama API response",
    );
  });

  it("wraps a timeout while reading the body", async () => {
    mockFetch.mockResolvedValueOnce(timedOutBody());
    const client = new OllamaClient({ baseUrl: "http://localhost:11434" });

    const failure = client.generateText("prompt", options);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow(
      "Error making request to Ollama (http://localhost:11434/api/chat): The operation was aborted due to timeout",
    );
  });

  it("rejects a malformed body", async () => {
    mockFetch.mockResolvedValueOnce(new Response("not json", { status: 200 }));
    const client = new OllamaClient({ baseUrl: "http://localhost:11434" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      /^Error parsing response: /,
    );
  });
});

describe("OpenAIClient", () => {
  const options = { model: "gpt-4o-mini", maxTokens: 2048 };

  it("posts a chat completion with a bearer token", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: "Title\n---BODY---\nBody" } }] }),
    );
    const client = new OpenAIClient({
      baseUrl: "https://api.openai.com/v1",
      apiKey: "test-secret",
    });

    await expect(client.generateText("prompt", options)).resolves.toBe(
      "Title\n---BODY---\nBody",
    );
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://api.openai.com/v1/chat/completions",
    );
    expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: "Bearer test-secret",
      },
    });
    expect(requestBody()).toEqual({
      model: "gpt-4o-mini",
      max_tokens: 2048,
      messages: [{ role: "user", content: "prompt" }],
    });
  });

  it("omits the Authorization header without a key", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: "ok" } }] }),
    );
    const client = new OpenAIClient({ baseUrl: "http://localhost:1234/v1" });

    await client.generateText("prompt", options);

    expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
      headers: { "Content-Type": "application/json" },
    });
    expect(mockFetch.mock.calls[0]?.[1]).not.toHaveProperty(
      "headers.Authorization",
    );
  });

  it("treats a null or missing choice as no content", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: null } }] }),
    );
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const client = new OpenAIClient({ baseUrl: "http://localhost:1234/v1" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      "No content in API response",
    );
    await expect(client.generateText("prompt", options)).rejects.toThrow(
      "No content in API response",
    );
  });

  it("reports non-2xx responses", async () => {
    mockFetch.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));
    const client = new OpenAIClient({ baseUrl: "https://api.openai.com/v1" });

    await expect(client.generateText("prompt", options)).rejects.toThrow(
      "API error (401): unauthorized",
    );
  });

  it("wraps a timeout while reading an error body", async () => {
    mockFetch.mockResolvedValueOnce(timedOutBody(502));
    const client = new OpenAIClient({ baseUrl: "http://localhost:1234/v1" });

    const failure = client.generateText("prompt", options);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow(
      "Error making request (http://localhost:1234/v1/chat/completions): The operation was aborted due to timeout",
    );
  });
});

describe("createGenerationClient", () => {
  it("builds the client for the configured provider", () => {
    expect(
      createGenerationClient(ConfigSchema.parse({ provider: "ollama" }), {}),
    ).toBeInstanceOf(OllamaClient);
    expect(
      createGenerationClient(ConfigSchema.parse({ provider: "openai" }), {}),
    ).toBeInstanceOf(OpenAIClient);
    expect(createGenerationClient(ConfigSchema.parse({}), {})).toBeInstanceOf(
      AnthropicClient,
    );
  });

  it("prefers the configured OpenAI key over the environment", async () => {
    mockFetch.mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: "ok" } }] }),
    );
    const client = createGenerationClient(
      ConfigSchema.parse({ provider: "openai", openai_api_key: "config-key" }),
      { OPENAI_API_KEY: "env-key" },
    );

    await client.generateText("p", { model: "m", maxTokens: 1 });

    expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
      headers: { Authorization: "Bearer config-key" },
    });
  });
});
