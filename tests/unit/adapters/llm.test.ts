/**
 * Unit tests for the stub backend and the backend factory.
 */

import { StubBackend, OpenAIBackend, AnthropicBackend, createBackend, createBackendFor, splitFragments } from "../../../src/adapters/llm";
import type { CompletionRequest, StreamChunk } from "../../../src/adapters/llm";
import { loadConfig } from "../../../src/config";

function request(text: string): CompletionRequest {
  return { system: "Be brief.", messages: [{ role: "user", content: text }], maxTokens: 64 };
}

async function collect(iterable: AsyncIterable<StreamChunk>): Promise<StreamChunk[]> {
  const chunks: StreamChunk[] = [];
  for await (const chunk of iterable) chunks.push(chunk);
  return chunks;
}

describe("splitFragments", () => {
  it("splits into word fragments that concatenate back to the input", () => {
    expect(splitFragments("Hello there, friend")).toEqual(["Hello ", "there, ", "friend"]);
    expect(splitFragments("  padded  ").join("")).toBe("  padded  ");
  });

  it("returns no fragments for empty text", () => {
    expect(splitFragments("")).toEqual([]);
  });
});

describe("StubBackend", () => {
  it("echoes the last user message when nothing is scripted", async () => {
    const backend = new StubBackend();
    const result = await backend.complete(request("Hello"));
    expect(result.text).toBe("echo: Hello");
    expect(result.usage).toEqual({ inputTokens: 3, outputTokens: 2 });
  });

  it("replays scripted replies in order and records calls", async () => {
    const backend = new StubBackend({ replies: ["first", "second"] });
    expect((await backend.complete(request("a"))).text).toBe("first");
    expect((await backend.complete(request("b"))).text).toBe("second");
    expect(backend.calls.map((c) => c.messages[0].content)).toEqual(["a", "b"]);
  });

  it("throws scripted errors", async () => {
    const err = new Error("scripted");
    const backend = new StubBackend({ replies: [err] });
    await expect(backend.complete(request("a"))).rejects.toBe(err);
  });

  it("streams fragments followed by usage", async () => {
    const backend = new StubBackend({ replies: ["one two"] });
    const chunks = await collect(backend.stream(request("go")));
    expect(chunks).toEqual([
      { type: "delta", text: "one " },
      { type: "delta", text: "two" },
      { type: "usage", usage: { inputTokens: 3, outputTokens: 2 } },
    ]);
  });
});

describe("createBackend", () => {
  it("returns StubBackend when provider is stub", () => {
    const config = loadConfig({ CHAT_PROVIDER: "stub" });
    expect(createBackend(config)).toBeInstanceOf(StubBackend);
  });

  it("falls back to StubBackend when the provider has no API key", () => {
    const config = loadConfig({ CHAT_PROVIDER: "anthropic" });
    expect(createBackend(config)).toBeInstanceOf(StubBackend);
  });

  it("builds each vendor backend with its configured model", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      ANTHROPIC_API_KEY: "test-key",
      ANTHROPIC_MODEL_NAME: "claude-test",
    });
    const openai = createBackend(config);
    const anthropic = createBackendFor("anthropic", config);
    expect(openai).toBeInstanceOf(OpenAIBackend);
    expect(openai.model).toBe("gpt-4o-mini");
    expect(anthropic).toBeInstanceOf(AnthropicBackend);
    expect(anthropic.model).toBe("claude-test");
  });
});
