/**
 * Transcript stores: in-memory for tests and short-lived use, JSON files for anything longer.
 */

import * as fs from "fs";
import * as path from "path";
import { InvalidStateError } from "../errors";
import { logger } from "../logging";
import { recordsToTurns } from "./transcript";
import type { TranscriptRecord, TranscriptStore } from "./types";

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function assertValidId(id: string): void {
  if (!ID_PATTERN.test(id)) {
    throw new InvalidStateError(`Invalid transcript id "${id}" (allowed: letters, digits, _ and -)`);
  }
}

export class MemoryTranscriptStore implements TranscriptStore {
  private readonly entries = new Map<string, TranscriptRecord[]>();

  async save(id: string, records: TranscriptRecord[]): Promise<void> {
    assertValidId(id);
    this.entries.set(id, records.map((r) => ({ ...r })));
  }

  async load(id: string): Promise<TranscriptRecord[] | null> {
    assertValidId(id);
    const records = this.entries.get(id);
    return records ? records.map((r) => ({ ...r })) : null;
  }
}

export interface FileTranscriptStoreOptions {
  /** Directory for `<id>.json` files (default ./data/transcripts). */
  dir?: string;
}

/** Writes `<dir>/<id>.json` as `{ id, turns, updated_at }`. */
export class FileTranscriptStore implements TranscriptStore {
  readonly dir: string;

  constructor(options: FileTranscriptStoreOptions = {}) {
    this.dir = options.dir ?? path.join(process.cwd(), "data", "transcripts");
  }

  private filePath(id: string): string {
    assertValidId(id);
    return path.join(this.dir, `${id}.json`);
  }

  async save(id: string, records: TranscriptRecord[]): Promise<void> {
    const filePath = this.filePath(id);
    await fs.promises.mkdir(this.dir, { recursive: true });
    const payload = JSON.stringify({ id, turns: records, updated_at: new Date().toISOString() }, null, 2);
    await fs.promises.writeFile(filePath, payload, "utf8");
    logger.debug({ event: "TRANSCRIPT_SAVED", id, turns: records.length, path: filePath }, "Transcript saved");
  }

  async load(id: string): Promise<TranscriptRecord[] | null> {
    const filePath = this.filePath(id);
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new InvalidStateError(`Transcript file ${filePath} is not valid JSON`, { cause: err });
    }
    const turns: unknown = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "turns") : undefined;
    return recordsToTurns(turns).map((t) => ({ role: t.role, text: t.text }));
  }
}
