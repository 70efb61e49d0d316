/**
 * CandidateMap: lookups between candidate ids and display labels.
 *
 * Used by legacy vote migration (label -> id), the aggregator and the
 * detailed vote listing (id -> label).
 */

import type { Candidate, CandidateId } from "../../src/poll_types";

export class CandidateMap {
  private byId = new Map<CandidateId, Candidate>();
  private labelToId = new Map<string, CandidateId>();

  constructor(candidates: readonly Candidate[]) {
    for (const candidate of candidates) {
      if (!this.byId.has(candidate.id)) this.byId.set(candidate.id, candidate);
      // First candidate carrying a label wins, matching table order
      if (!this.labelToId.has(candidate.label)) {
        this.labelToId.set(candidate.label, candidate.id);
      }
    }
  }

  has(id: CandidateId): boolean {
    return this.byId.has(id);
  }

  get(id: CandidateId): Candidate | undefined {
    return this.byId.get(id);
  }

  /** Exact label match; unresolvable labels map to null. */
  idForLabel(label: string): CandidateId | null {
    return this.labelToId.get(label) ?? null;
  }

  labelFor(id: CandidateId | null): string | null {
    if (id === null) return null;
    return this.byId.get(id)?.label ?? null;
  }

  /** Label for display; ids without a candidate render as "[id]". */
  displayLabel(id: CandidateId): string {
    return this.byId.get(id)?.label ?? `[${id}]`;
  }
}
