/**
 * Unit tests for side-by-side backend comparison.
 */

import { ChatSession, compareBackends } from "../../../src/session";
import { StubBackend } from "../../../src/adapters/llm";

describe("compareBackends", () => {
  it("sends the same text to every session and reports each result", async () => {
    const a = new ChatSession({ backend: new StubBackend({ model: "a", replies: ["from a"] }), systemInstruction: "" });
    const b = a.fork(new StubBackend({ model: "b", replies: [new Error("quota exceeded")] }));

    const rows = await compareBackends([a, b], "hello there");

    expect(rows.map((r) => [r.model, r.text, r.error])).toEqual([
      ["a", "from a", undefined],
      ["b", undefined, "quota exceeded"],
    ]);
    expect(rows[0].usage).toEqual({ inputTokens: 2, outputTokens: 2 });
    expect(rows[1].usage).toEqual({ inputTokens: 0, outputTokens: 0 });
    expect(a.getTranscript().length).toBe(2);
    expect(b.getTranscript().length).toBe(0);
  });
});
