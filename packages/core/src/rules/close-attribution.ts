import type { CloseEventFact } from "../types.js";

export const MERGE_GRACE_MS = 3000;

export type CloseAttribution =
  | { kind: "pr_triggered"; closedAt: string; prNumber: number }
  | { kind: "manual"; closedAt: string | null; closedBy: string | null };

/**
 * Decides how a closed item was closed. Items can be closed and reopened
 * several times, so only the most recent close event counts.
 */
export function attributeClose(closeEvents: CloseEventFact[]): CloseAttribution {
  const last = closeEvents[closeEvents.length - 1];
  if (!last) {
    return { kind: "manual", closedAt: null, closedBy: null };
  }

  if (last.closer.kind === "pull_request") {
    return { kind: "pr_triggered", closedAt: last.createdAt, prNumber: last.closer.number };
  }

  return { kind: "manual", closedAt: last.createdAt, closedBy: last.actor };
}

// Fallback for close events that carry no closer reference: a close landing
// within the grace interval after one of the actor's merges is treated as
// caused by that merge.
export function isMergeTriggeredClose(
  closedAt: string,
  mergeTimes: string[],
  graceMs = MERGE_GRACE_MS
): boolean {
  const closed = new Date(closedAt).getTime();
  if (!Number.isFinite(closed)) {
    return false;
  }

  return mergeTimes.some((mergedAt) => {
    const merged = new Date(mergedAt).getTime();
    if (!Number.isFinite(merged)) {
      return false;
    }
    const delta = closed - merged;
    return delta >= 0 && delta <= graceMs;
  });
}
