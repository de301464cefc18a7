/**
 * Per-command metrics, written to stderr when FLATPAGES_CLI_DEBUG=1
 *
 * One line per command:
 *   metric cli.get key="my/url" backend=single-folder outcome=absent duration_ms=2
 */

import type { BackendKind } from "@flatpages/sdk";
import { isVerbose } from "./env.js";
import { EXIT_CODE, exitCodeFor } from "./errors.js";

/**
 * How a command ended: found/stored, absent, or failed
 */
export type Outcome = "ok" | "absent" | "error";

export interface CommandMetric {
  command: string;
  key: string;
  backend: BackendKind;
  outcome: Outcome;
  durationMs: number;
}

/**
 * Render a metric line (without the trailing newline)
 */
export function formatMetric(metric: CommandMetric): string {
  // JSON quoting keeps keys with spaces or newlines on one line
  return [
    `metric cli.${metric.command}`,
    `key=${JSON.stringify(metric.key)}`,
    `backend=${metric.backend}`,
    `outcome=${metric.outcome}`,
    `duration_ms=${metric.durationMs}`,
  ].join(" ");
}

export function emitMetric(metric: CommandMetric): void {
  if (!isVerbose()) {
    return;
  }
  process.stderr.write(formatMetric(metric) + "\n");
}

/**
 * Run a command body and emit its metric
 * @param fn - Resolves to the outcome; a thrown not-found CliError counts
 *   as absent
 */
export async function timeCommand(
  command: string,
  target: { key: string; backend: BackendKind },
  fn: () => Promise<Outcome>
): Promise<void> {
  const start = Date.now();
  let outcome: Outcome = "error";

  try {
    outcome = await fn();
  } catch (err) {
    if (exitCodeFor(err) === EXIT_CODE.NOT_FOUND) {
      outcome = "absent";
    }
    throw err;
  } finally {
    emitMetric({ command, ...target, outcome, durationMs: Date.now() - start });
  }
}
