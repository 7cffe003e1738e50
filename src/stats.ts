import type { StatKey, TrialStats } from "./types.js";

const CATEGORY_MEMBERS = {
  invalid: ["invalid.nottrial", "invalid.ioerror"],
  finished: ["finished.old", "finished.new", "finished.wrong"],
  submitted: ["submitted.new", "submitted.resumed"],
} as const satisfies Record<string, readonly StatKey[]>;

export type StatCategory = keyof typeof CATEGORY_MEMBERS;

export function createEmptyStats(): TrialStats {
  return {
    all: 0,
    invalid: 0,
    "invalid.nottrial": 0,
    "invalid.ioerror": 0,
    valid: 0,
    finished: 0,
    "finished.old": 0,
    "finished.new": 0,
    "finished.wrong": 0,
    skipped: 0,
    unfinished: 0,
    submitted: 0,
    "submitted.new": 0,
    "submitted.resumed": 0,
    unprocessed: 0,
  };
}

/** Recomputes a category total from its members; totals are never incremented directly. */
export function rollupStats(stats: TrialStats, category: StatCategory): number {
  const members: readonly StatKey[] = CATEGORY_MEMBERS[category];
  stats[category] = members.reduce((sum, key) => sum + stats[key], 0);
  return stats[category];
}
