/**
 * Merge engine: candidate add/rename/delete/toggle with synonym merging.
 *
 * Labels whose merge keys collide denote one candidate. The canonical
 * candidate of a colliding group is the one with the lowest insertion index,
 * i.e. the first in table order; the others are absorbed: their votes are
 * re-pointed at the canonical id and their rows are dropped.
 *
 * Within an operation votes are always written before candidates, so a vote
 * never references a candidate row that has already been removed.
 */

import type { Candidate, CandidateId, TableBackend } from "../../src/poll_types";
import type { CandidateStore } from "./candidate-store";
import { NotFoundError, ValidationError } from "./errors";
import { normalizeForMerge } from "./normalize-name";
import type { VoteStore } from "./vote-store";

export interface MergeResult {
  /** Surviving candidate id. */
  id: CandidateId;
  candidate: Candidate;
  created: boolean;
  /** Ids merged into `id` and removed. */
  absorbed: CandidateId[];
  /** Vote rows whose rank fields were rewritten. */
  votesMoved: number;
}

function requireLabel(label: unknown): string {
  const text = typeof label === "string" ? label.trim() : "";
  if (!text) throw new ValidationError("Candidate label must not be empty");
  return text;
}

export class MergeEngine {
  constructor(
    private readonly backend: TableBackend,
    private readonly candidates: CandidateStore,
    private readonly votes: VoteStore,
  ) {}

  /**
   * Add a candidate, or fold the label into the existing candidates it
   * collides with.
   */
  upsertCandidate(label: string, makeActive = true): MergeResult {
    const text = requireLabel(label);

    return this.backend.transaction(() => {
      const candidates = this.candidates.load();
      const key = normalizeForMerge(text);
      const group = candidates.filter((c) => normalizeForMerge(c.label) === key);

      if (group.length === 0) {
        const candidate: Candidate = {
          id: this.candidates.generateId(candidates.map((c) => c.id)),
          label: text,
          active: makeActive,
        };
        this.candidates.save([...candidates, candidate]);
        return {
          id: candidate.id,
          candidate,
          created: true,
          absorbed: [],
          votesMoved: 0,
        };
      }

      return this.absorb(candidates, group, text, makeActive);
    });
  }

  /**
   * Relabel a candidate. Any other candidate whose key equals the new key
   * joins the group; the oldest member survives and takes the new label.
   */
  renameCandidate(id: CandidateId, newLabel: string, newActive: boolean): MergeResult {
    const text = requireLabel(newLabel);

    return this.backend.transaction(() => {
      const candidates = this.candidates.load();
      if (!candidates.some((c) => c.id === id)) throw new NotFoundError(id);

      const key = normalizeForMerge(text);
      const group = candidates.filter(
        (c) => c.id === id || normalizeForMerge(c.label) === key,
      );
      return this.absorb(candidates, group, text, newActive);
    });
  }

  /** Remove a candidate; its vote slots become null. */
  deleteCandidate(id: CandidateId): Candidate {
    return this.backend.transaction(() => {
      const candidates = this.candidates.load();
      const target = candidates.find((c) => c.id === id);
      if (!target) throw new NotFoundError(id);

      this.votes.nullifyId(id);
      this.candidates.save(candidates.filter((c) => c.id !== id));
      return target;
    });
  }

  toggleActive(id: CandidateId): Candidate {
    return this.backend.transaction(() => {
      const candidates = this.candidates.load();
      const target = candidates.find((c) => c.id === id);
      if (!target) throw new NotFoundError(id);

      const toggled: Candidate = { ...target, active: !target.active };
      this.candidates.save(candidates.map((c) => (c.id === id ? toggled : c)));
      return toggled;
    });
  }

  // `group` is non-empty and in table order.
  private absorb(
    candidates: Candidate[],
    group: Candidate[],
    label: string,
    active: boolean,
  ): MergeResult {
    const [canonical, ...duplicates] = group;

    let votesMoved = 0;
    for (const duplicate of duplicates) {
      votesMoved += this.votes.replaceId(duplicate.id, canonical.id);
    }

    const absorbed = duplicates.map((d) => d.id);
    const merged: Candidate = { ...canonical, label, active };
    const next = candidates
      .filter((c) => !absorbed.includes(c.id))
      .map((c) => (c.id === canonical.id ? merged : c));
    this.candidates.save(next);

    if (absorbed.length > 0) {
      console.warn(
        `Merged ${absorbed.join(", ")} into ${canonical.id} ("${label}")`,
      );
    }

    return { id: canonical.id, candidate: merged, created: false, absorbed, votesMoved };
  }
}
