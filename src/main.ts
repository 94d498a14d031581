#!/usr/bin/env node
/**
 * Entry point: interactive chat over one session built from config.
 * Uses the stub backend when the selected provider has no API key.
 */

import * as readline from "readline";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createBackend, createBackendFor } from "./adapters/llm";
import type { BackendKind } from "./adapters/llm";
import { ChatSession, compareBackends } from "./session";
import { FileTranscriptStore } from "./memory/store";
import { getLastExchangeMetrics } from "./metrics";
import { parseCommand, HELP_TEXT } from "./cli/commands";
import { logger, logError } from "./logging";

function otherBackend(kind: BackendKind): BackendKind {
  return kind === "openai" ? "anthropic" : "openai";
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function reply(session: ChatSession, text: string, stream: boolean): Promise<void> {
  if (!stream) {
    print(await session.send(text));
    return;
  }
  for await (const fragment of session.stream(text)) process.stdout.write(fragment);
  process.stdout.write("\n");
}

async function handleLine(session: ChatSession, config: AppConfig, store: FileTranscriptStore, line: string): Promise<boolean> {
  const command = parseCommand(line);
  switch (command.type) {
    case "empty":
      return true;
    case "quit":
      return false;
    case "help":
      print(HELP_TEXT);
      return true;
    case "invalid":
      print(command.reason);
      return true;
    case "message":
      await reply(session, command.text, config.session.stream);
      return true;
    case "reset":
      session.clear();
      print("(conversation cleared)");
      return true;
    case "trim":
      print(`(removed ${session.trim(command.maxTurns)} turn(s))`);
      return true;
    case "usage": {
      const totals = session.usage();
      print(`tokens: ${totals.inputTokens} in / ${totals.outputTokens} out`);
      const last = getLastExchangeMetrics();
      if (last) print(`last exchange: ${last.outcome}, ${last.latencyMs} ms, ${last.attempts} attempt(s)`);
      return true;
    }
    case "save":
      await session.save(store, command.id);
      print(`(saved ${session.getTranscript().length} turn(s) as ${command.id})`);
      return true;
    case "load":
      print((await session.load(store, command.id)) ? `(loaded ${command.id})` : `(no transcript named ${command.id})`);
      return true;
    case "compare": {
      const other = session.fork(createBackendFor(otherBackend(session.backend.kind), config));
      for (const row of await compareBackends([session, other], command.text)) {
        print(`--- ${row.backend} (${row.model}, ${row.durationMs} ms)`);
        print(row.error ? `error: ${row.error}` : (row.text ?? ""));
      }
      return true;
    }
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const backend = createBackend(config);
  const session = new ChatSession({
    backend,
    systemInstruction: config.session.systemPrompt,
    maxTokens: config.session.maxTokens,
    maxTurns: config.session.maxTurns,
    retry: config.retry,
  });
  const store = new FileTranscriptStore({ dir: config.storage.transcriptDir });
  logger.info({ event: "CHAT_START", backend: backend.kind, model: backend.model }, "Chat session ready");
  print(`Chatting with ${backend.kind} (${backend.model}). /help for commands.`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });
  rl.prompt();
  for await (const line of rl) {
    try {
      if (!(await handleLine(session, config, store, line))) break;
    } catch (err) {
      print(`error: ${err instanceof Error ? err.message : String(err)}`);
    }
    rl.prompt();
  }
  rl.close();
}

main().catch((err) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)), { event: "FATAL" });
  process.exit(1);
});
