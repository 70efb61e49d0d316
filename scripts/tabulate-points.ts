/**
 * 3-2-1 points tabulator.
 *
 * A 1st place is worth 3 points, 2nd 2 and 3rd 1. Candidates are ordered by
 * points, then 1st/2nd/3rd place counts (all descending), then label and id
 * (ascending), which gives a total order. Ranks are positions in that order
 * and are never shared.
 */

import type {
  Candidate,
  CandidateId,
  RankedEntry,
  Vote,
} from "../src/poll_types";
import { RANK_FIELDS, RANK_POINTS } from "../src/poll_types";
import { CandidateMap } from "./pipeline/candidate-map";

// ---------- Internal types ----------

interface Tally {
  id: CandidateId;
  points: number;
  counts: [first: number, second: number, third: number];
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------- Tabulator ----------

export function aggregate(
  candidates: readonly Candidate[],
  votes: readonly Vote[],
  includeInactive: boolean,
): RankedEntry[] {
  const map = new CandidateMap(candidates);

  const tallies = new Map<CandidateId, Tally>();
  for (const candidate of candidates) {
    if (!includeInactive && !candidate.active) continue;
    if (tallies.has(candidate.id)) continue;
    tallies.set(candidate.id, { id: candidate.id, points: 0, counts: [0, 0, 0] });
  }

  // Empty contest: no ranking at all rather than a table of zeros
  if (tallies.size === 0 || votes.length === 0) return [];

  for (const vote of votes) {
    RANK_FIELDS.forEach((field, slot) => {
      const id = vote[field];
      if (id === null) return;
      const tally = tallies.get(id);
      // Ineligible or unknown candidates contribute nothing
      if (!tally) return;
      tally.points += RANK_POINTS[field];
      tally.counts[slot]++;
    });
  }

  const sorted = Array.from(tallies.values()).sort(
    (a, b) =>
      b.points - a.points ||
      b.counts[0] - a.counts[0] ||
      b.counts[1] - a.counts[1] ||
      b.counts[2] - a.counts[2] ||
      compareText(map.displayLabel(a.id), map.displayLabel(b.id)) ||
      compareText(a.id, b.id),
  );

  return sorted.map((tally, index) => ({
    rank: index + 1,
    id: tally.id,
    label: map.displayLabel(tally.id),
    points: tally.points,
    firstCount: tally.counts[0],
    secondCount: tally.counts[1],
    thirdCount: tally.counts[2],
  }));
}
