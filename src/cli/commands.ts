/**
 * REPL command parsing. Lines starting with "/" are commands; anything else is a message.
 */

export type Command =
  | { type: "message"; text: string }
  | { type: "reset" }
  | { type: "trim"; maxTurns: number }
  | { type: "usage" }
  | { type: "save"; id: string }
  | { type: "load"; id: string }
  | { type: "compare"; text: string }
  | { type: "help" }
  | { type: "quit" }
  | { type: "empty" }
  | { type: "invalid"; reason: string };

export const HELP_TEXT = [
  "/reset           start a new conversation",
  "/trim N          keep only the last N turns",
  "/usage           token totals and last exchange metrics",
  "/save ID         save the transcript",
  "/load ID         replace the transcript with a saved one",
  "/compare TEXT    send TEXT to this backend and the other one",
  "/quit            exit",
].join("\n");

export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (!trimmed) return { type: "empty" };
  if (!trimmed.startsWith("/")) return { type: "message", text: trimmed };

  const space = trimmed.indexOf(" ");
  const name = (space === -1 ? trimmed.slice(1) : trimmed.slice(1, space)).toLowerCase();
  const arg = space === -1 ? "" : trimmed.slice(space + 1).trim();

  switch (name) {
    case "reset":
      return { type: "reset" };
    case "usage":
      return { type: "usage" };
    case "help":
      return { type: "help" };
    case "quit":
    case "exit":
      return { type: "quit" };
    case "trim": {
      const n = Number(arg);
      if (!arg || !Number.isInteger(n) || n < 0) return { type: "invalid", reason: "usage: /trim N (N >= 0)" };
      return { type: "trim", maxTurns: n };
    }
    case "save":
    case "load":
      if (!arg) return { type: "invalid", reason: `usage: /${name} ID` };
      return name === "save" ? { type: "save", id: arg } : { type: "load", id: arg };
    case "compare":
      if (!arg) return { type: "invalid", reason: "usage: /compare TEXT" };
      return { type: "compare", text: arg };
    default:
      return { type: "invalid", reason: `unknown command /${name} (try /help)` };
  }
}
