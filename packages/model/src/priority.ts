import type { Priority } from "./types.js";

const PRIORITY_RANK: Record<Priority, number> = {
  Critical: 0,
  High: 1,
  Medium: 2,
  Low: 3,
};

/** 0 for Critical, 3 for Low. */
export function priorityRank(priority: Priority): number {
  return PRIORITY_RANK[priority];
}

/** Sort comparator, highest priority first. */
export function comparePriority(a: Priority, b: Priority): number {
  return PRIORITY_RANK[a] - PRIORITY_RANK[b];
}

/** Highest priority in the list, or `fallback` when it is empty. */
export function highestPriority(
  priorities: Iterable<Priority>,
  fallback: Priority = "Low",
): Priority {
  let best: Priority | undefined;
  for (const p of priorities) {
    if (best === undefined || PRIORITY_RANK[p] < PRIORITY_RANK[best]) {
      best = p;
    }
  }
  return best ?? fallback;
}
