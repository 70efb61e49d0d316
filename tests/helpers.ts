/**
 * Shared fixtures for the poll tests.
 */

import type { Candidate, RawTable, Vote } from "../src/poll_types";
import type { IdGenerator } from "../scripts/pipeline/candidate-store";
import { PollService } from "../scripts/pipeline/poll";
import { MemoryBackend } from "../scripts/pipeline/storage/memory";
import { VOTE_COLUMNS } from "../scripts/pipeline/vote-store";

export const NOW = new Date("2026-10-19T03:04:05.678Z");
export const NOW_TOKYO = "2026-10-19T12:04:05+09:00";

/** c1, c2, c3, ... */
export function sequentialIds(prefix = "c"): IdGenerator {
  let n = 0;
  return () => `${prefix}${++n}`;
}

export function candidateTable(candidates: Candidate[]): RawTable {
  return {
    columns: ["id", "label", "active"],
    rows: candidates.map((c) => ({
      id: c.id,
      label: c.label,
      active: c.active ? "true" : "false",
    })),
  };
}

export function voteTable(votes: Vote[]): RawTable {
  return {
    columns: [...VOTE_COLUMNS],
    rows: votes.map((v) => ({
      voterName: v.voterName,
      voterIdentity: v.voterIdentity,
      firstId: v.firstId ?? "",
      secondId: v.secondId ?? "",
      thirdId: v.thirdId ?? "",
      timestamp: v.timestamp,
    })),
  };
}

export function cand(id: string, label: string, active = true): Candidate {
  return { id, label, active };
}

export function vote(
  voterIdentity: string,
  firstId: string | null,
  secondId: string | null,
  thirdId: string | null,
): Vote {
  return {
    voterName: `Voter ${voterIdentity}`,
    voterIdentity,
    firstId,
    secondId,
    thirdId,
    timestamp: "2026-10-01T10:00:00+09:00",
  };
}

export function makePoll(
  candidates?: Candidate[],
  votes?: Vote[],
  options: { uniqueVoter?: boolean } = {},
) {
  const backend = new MemoryBackend({
    candidates: candidates ? candidateTable(candidates) : undefined,
    votes: votes ? voteTable(votes) : undefined,
  });
  const poll = new PollService(backend, {
    timeZone: "Asia/Tokyo",
    uniqueVoter: options.uniqueVoter,
    now: () => NOW,
    generateId: sequentialIds(),
  });
  return { backend, poll };
}

/** Every rank field is null or names a candidate that exists. */
export function danglingReferences(poll: PollService): string[] {
  const ids = new Set(poll.listCandidates().map((c) => c.id));
  const dangling: string[] = [];
  for (const v of poll.votes.load()) {
    for (const id of [v.firstId, v.secondId, v.thirdId]) {
      if (id !== null && !ids.has(id)) dangling.push(id);
    }
  }
  return dangling;
}
