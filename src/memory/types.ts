/**
 * Transcript types.
 * A Turn is one message with its author; the Transcript is their ordered history.
 */

export type TurnRole = "user" | "assistant";

export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
}

/** Serialized form of a Turn, as handed to a TranscriptStore. */
export interface TranscriptRecord {
  role: TurnRole;
  text: string;
}

/**
 * External persistence for transcripts. The session only hands over and takes back
 * ordered records; where they live is up to the implementation.
 */
export interface TranscriptStore {
  save(id: string, records: TranscriptRecord[]): Promise<void>;
  /** Resolves null when nothing is stored under `id`. */
  load(id: string): Promise<TranscriptRecord[] | null>;
}
