/**
 * Per-exchange metrics: latency, attempts and token usage.
 * Logged as EXCHANGE_METRICS; the last one is kept for the CLI's /usage view.
 */

import { logger } from "../logging";
import type { BackendKind, Usage } from "../adapters/llm/types";

export interface ExchangeMetrics {
  backend: BackendKind;
  model: string;
  /** Time from send() to the assistant turn being committed (ms). */
  latencyMs: number;
  /** Time to first streamed fragment (ms); only for streamed exchanges. */
  firstFragmentMs?: number;
  /** Backend invocations including retries. */
  attempts: number;
  usage?: Usage;
  outcome: "ok" | "failed" | "cancelled";
}

let lastExchangeMetrics: ExchangeMetrics | null = null;

export function recordExchangeMetrics(metrics: ExchangeMetrics): void {
  lastExchangeMetrics = { ...metrics };
  logger.info(
    {
      event: "EXCHANGE_METRICS",
      backend: metrics.backend,
      model: metrics.model,
      latency_ms: metrics.latencyMs,
      first_fragment_ms: metrics.firstFragmentMs,
      attempts: metrics.attempts,
      input_tokens: metrics.usage?.inputTokens,
      output_tokens: metrics.usage?.outputTokens,
      outcome: metrics.outcome,
    },
    "Exchange metrics"
  );
}

export function getLastExchangeMetrics(): ExchangeMetrics | null {
  return lastExchangeMetrics ? { ...lastExchangeMetrics } : null;
}

export function resetExchangeMetrics(): void {
  lastExchangeMetrics = null;
}
