/**
 * Unit tests for config loading.
 */

import * as path from "path";
import { loadConfig, DEFAULT_SYSTEM_PROMPT } from "../../../src/config";
import { ConfigError } from "../../../src/errors";

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.backend.provider).toBe("openai");
    expect(config.backend.openaiModel).toBe("gpt-4o-mini");
    expect(config.backend.anthropicModel).toBe("claude-3-5-sonnet-20241022");
    expect(config.backend.openaiApiKey).toBeUndefined();
    expect(config.session).toEqual({ systemPrompt: DEFAULT_SYSTEM_PROMPT, maxTokens: 1024, maxTurns: 0, stream: false });
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000 });
    expect(config.storage.transcriptDir).toBe(path.join(process.cwd(), "data", "transcripts"));
  });

  it("reads provider, keys and tuning from env", () => {
    const config = loadConfig({
      CHAT_PROVIDER: " Anthropic ",
      ANTHROPIC_API_KEY: "test-secret",
      CHAT_MAX_TOKENS: "256",
      CHAT_MAX_TURNS: "20",
      CHAT_STREAM: "1",
      CHAT_MAX_RETRIES: "0",
      TRANSCRIPT_DIR: "/tmp/transcripts",
    });
    expect(config.backend.provider).toBe("anthropic");
    expect(config.backend.anthropicApiKey).toBe("test-secret");
    expect(config.session.maxTokens).toBe(256);
    expect(config.session.maxTurns).toBe(20);
    expect(config.session.stream).toBe(true);
    expect(config.retry.maxRetries).toBe(0);
    expect(config.storage.transcriptDir).toBe("/tmp/transcripts");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "   ", CHAT_SYSTEM_PROMPT: "" });
    expect(config.backend.openaiApiKey).toBeUndefined();
    expect(config.session.systemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ CHAT_PROVIDER: "gemini" })).toThrow(ConfigError);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ CHAT_MAX_TOKENS: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ CHAT_MAX_TOKENS: "0" })).toThrow('Invalid CHAT_MAX_TOKENS: expected an integer >= 1, got "0"');
  });
});
