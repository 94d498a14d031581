/**
 * Ordered, append-only transcript of turns.
 * Only trim(), clear() and the session's rollback of a failed exchange remove entries.
 */

import { InvalidStateError } from "../errors";
import type { Turn, TurnRole, TranscriptRecord } from "./types";

export function createTurn(role: TurnRole, text: string): Turn {
  return Object.freeze({ role, text });
}

function isRecord(value: unknown): value is TranscriptRecord {
  if (typeof value !== "object" || value === null) return false;
  const role: unknown = Reflect.get(value, "role");
  const text: unknown = Reflect.get(value, "text");
  return (role === "user" || role === "assistant") && typeof text === "string";
}

/** Validate untrusted records (e.g. from disk) and turn them into frozen Turns. */
export function recordsToTurns(records: unknown): Turn[] {
  if (!Array.isArray(records)) throw new InvalidStateError("Transcript must be an array of records");
  return records.map((r, i) => {
    if (!isRecord(r)) throw new InvalidStateError(`Invalid transcript record at index ${i}`);
    return createTurn(r.role, r.text);
  });
}

export class Transcript {
  private turns: Turn[] = [];

  constructor(initial: readonly Turn[] = []) {
    this.turns = initial.map((t) => createTurn(t.role, t.text));
  }

  get length(): number {
    return this.turns.length;
  }

  append(role: TurnRole, text: string): Turn {
    const turn = createTurn(role, text);
    this.turns.push(turn);
    return turn;
  }

  first(): Turn | undefined {
    return this.turns[0];
  }

  /** Most recent turn, if any. */
  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  /** Remove `turn` if it is the newest entry. Used to undo a failed exchange. */
  removeLast(turn: Turn): boolean {
    if (this.last() !== turn) return false;
    this.turns.pop();
    return true;
  }

  /** Drop oldest turns until at most `maxTurns` remain. Returns how many were removed. */
  trim(maxTurns: number): number {
    if (!Number.isInteger(maxTurns) || maxTurns < 0) {
      throw new InvalidStateError(`trim bound must be a non-negative integer, got ${maxTurns}`);
    }
    const excess = this.turns.length - maxTurns;
    if (excess <= 0) return 0;
    this.turns.splice(0, excess);
    return excess;
  }

  clear(): void {
    this.turns = [];
  }

  getTurns(): readonly Turn[] {
    return [...this.turns];
  }

  toRecords(): TranscriptRecord[] {
    return this.turns.map((t) => ({ role: t.role, text: t.text }));
  }

  static fromRecords(records: unknown): Transcript {
    return new Transcript(recordsToTurns(records));
  }
}
