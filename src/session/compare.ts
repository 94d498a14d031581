/**
 * Side-by-side comparison: the same message sent to several sessions, one after another.
 * A failing backend is reported in its row and does not stop the others.
 */

import type { BackendKind, Usage } from "../adapters/llm/types";
import type { ChatSession } from "./chat-session";

export interface ComparisonRow {
  backend: BackendKind;
  model: string;
  text?: string;
  error?: string;
  durationMs: number;
  /** Tokens used by this exchange alone. */
  usage: Usage;
}

export async function compareBackends(sessions: readonly ChatSession[], userText: string): Promise<ComparisonRow[]> {
  const rows: ComparisonRow[] = [];
  for (const session of sessions) {
    const before = session.usage();
    const started = Date.now();
    let text: string | undefined;
    let error: string | undefined;
    try {
      text = await session.send(userText);
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }
    const after = session.usage();
    rows.push({
      backend: session.backend.kind,
      model: session.backend.model,
      text,
      error,
      durationMs: Date.now() - started,
      usage: {
        inputTokens: after.inputTokens - before.inputTokens,
        outputTokens: after.outputTokens - before.outputTokens,
      },
    });
  }
  return rows;
}
