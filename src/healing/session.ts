/**
 * Healing session: the per-run state of one heal-and-validate call.
 *
 * Created fresh for every top-level run and threaded through the healer
 * and orchestrator; never shared between documents.
 *
 * @module healing/session
 */

import { randomUUID } from "node:crypto";

export interface HealingSession {
  readonly id: string;
  /** from→to pairs the healer has already generated this run */
  readonly generatedBindings: Set<string>;
  /** from→to pairs the matrix refused this run */
  readonly rejectedBindings: Set<string>;
  /** Operations applied per attempt, oldest first */
  readonly history: string[][];
  stagnationCount: number;
}

export interface StagnationThresholds {
  warnAt: number;
  stopAt: number;
}

export type AttemptVerdict = "progress" | "stagnant" | "warn" | "stop";

export function createHealingSession(id: string = randomUUID()): HealingSession {
  return {
    id,
    generatedBindings: new Set(),
    rejectedBindings: new Set(),
    history: [],
    stagnationCount: 0,
  };
}

export function bindingPairKey(from: string, to: string): string {
  return `${from}->${to}`;
}

function sameOperations(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((op, i) => op === b[i]);
}

/**
 * Record one attempt's operations and judge progress. An empty list, or one
 * identical to the previous attempt's, counts as stagnant; anything else
 * resets the counter.
 */
export function recordAttempt(
  session: HealingSession,
  operations: readonly string[],
  thresholds: StagnationThresholds
): AttemptVerdict {
  const previous = session.history[session.history.length - 1];
  const stagnant =
    operations.length === 0 || (previous !== undefined && sameOperations(previous, operations));

  session.stagnationCount = stagnant ? session.stagnationCount + 1 : 0;
  session.history.push([...operations]);

  if (session.stagnationCount >= thresholds.stopAt) return "stop";
  if (session.stagnationCount >= thresholds.warnAt) return "warn";
  return stagnant ? "stagnant" : "progress";
}
