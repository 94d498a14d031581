/**
 * Unit tests for REPL command parsing.
 */

import { parseCommand } from "../../../src/cli/commands";

describe("parseCommand", () => {
  it("treats plain lines as messages", () => {
    expect(parseCommand("  What is 2+2?  ")).toEqual({ type: "message", text: "What is 2+2?" });
  });

  it("ignores blank lines", () => {
    expect(parseCommand("   ")).toEqual({ type: "empty" });
  });

  it("parses argument-less commands case-insensitively", () => {
    expect(parseCommand("/reset")).toEqual({ type: "reset" });
    expect(parseCommand("/USAGE")).toEqual({ type: "usage" });
    expect(parseCommand("/exit")).toEqual({ type: "quit" });
  });

  it("parses /trim with a non-negative integer", () => {
    expect(parseCommand("/trim 4")).toEqual({ type: "trim", maxTurns: 4 });
    expect(parseCommand("/trim -1")).toEqual({ type: "invalid", reason: "usage: /trim N (N >= 0)" });
    expect(parseCommand("/trim")).toEqual({ type: "invalid", reason: "usage: /trim N (N >= 0)" });
  });

  it("parses /save, /load and /compare arguments", () => {
    expect(parseCommand("/save my-chat")).toEqual({ type: "save", id: "my-chat" });
    expect(parseCommand("/load my-chat")).toEqual({ type: "load", id: "my-chat" });
    expect(parseCommand("/compare  Which is faster? ")).toEqual({ type: "compare", text: "Which is faster?" });
    expect(parseCommand("/load")).toEqual({ type: "invalid", reason: "usage: /load ID" });
  });

  it("reports unknown commands", () => {
    expect(parseCommand("/dance")).toEqual({ type: "invalid", reason: "unknown command /dance (try /help)" });
  });
});
