/**
 * Vote store: owns the votes table.
 *
 * Columns: voterName, voterIdentity, firstId, secondId, thirdId, timestamp.
 * All cells are text, so identities like "00123" keep their leading zeros.
 * An empty rank cell is a null rank.
 */

import type {
  Ballot,
  Candidate,
  CandidateId,
  RawRow,
  RawTable,
  TableBackend,
  Vote,
} from "../../src/poll_types";
import { RANK_FIELDS } from "../../src/poll_types";
import { CandidateMap } from "./candidate-map";
import type { CandidateStore } from "./candidate-store";
import { ValidationError } from "./errors";
import { normalizeVoterIdentity } from "./normalize-name";
import { formatLocalTimestamp } from "./timestamp";

export const VOTE_COLUMNS = [
  "voterName",
  "voterIdentity",
  "firstId",
  "secondId",
  "thirdId",
  "timestamp",
] as const;

type VoteColumn = (typeof VOTE_COLUMNS)[number];

/** Header spellings written by earlier versions of the app. */
const COLUMN_ALIASES: ReadonlyMap<string, VoteColumn> = new Map([
  ["voter_name", "voterName"],
  ["employee_id", "voterIdentity"],
  ["first_id", "firstId"],
  ["second_id", "secondId"],
  ["third_id", "thirdId"],
  ["time", "timestamp"],
]);

function canonicalColumn(column: string): string {
  return COLUMN_ALIASES.get(column) ?? column;
}

const LEGACY_LABEL_COLUMNS = ["first", "second", "third"] as const;

// ---------- Persisted layouts ----------

type VoteTable =
  | { kind: "missing" }
  | { kind: "current"; rows: RawRow[]; renamed: boolean }
  | { kind: "legacy-label"; rows: RawRow[] };

function canonicalizeHeaders(table: RawTable): { rows: RawRow[]; renamed: boolean } {
  const renamed = table.columns.some((c) => COLUMN_ALIASES.has(c));
  if (!renamed) return { rows: table.rows, renamed };

  const rows = table.rows.map((row) => {
    const out: RawRow = {};
    for (const [column, value] of Object.entries(row)) {
      const target = canonicalColumn(column);
      // An explicit current-layout column wins over its alias
      if (!Object.hasOwn(out, target) || column === target) out[target] = value;
    }
    return out;
  });
  return { rows, renamed };
}

export function decodeVoteTable(table: RawTable | null): VoteTable {
  if (!table) return { kind: "missing" };
  const { rows, renamed } = canonicalizeHeaders(table);
  const columns = new Set(table.columns.map(canonicalColumn));

  if (RANK_FIELDS.every((f) => columns.has(f))) {
    return { kind: "current", rows, renamed };
  }
  if (LEGACY_LABEL_COLUMNS.every((c) => columns.has(c))) {
    return { kind: "legacy-label", rows };
  }
  // No recognizable rank columns: nothing can be recovered from the rows
  return { kind: "missing" };
}

function nullable(value: string | undefined): CandidateId | null {
  return value ? value : null;
}

function fromCurrentRow(row: RawRow): Vote {
  return {
    voterName: row.voterName ?? "",
    voterIdentity: row.voterIdentity ?? "",
    firstId: nullable(row.firstId),
    secondId: nullable(row.secondId),
    thirdId: nullable(row.thirdId),
    timestamp: row.timestamp ?? "",
  };
}

function fromLegacyLabelRow(row: RawRow, map: CandidateMap): Vote {
  const resolve = (label: string | undefined) =>
    label ? map.idForLabel(label) : null;
  return {
    voterName: row.voterName ?? "",
    voterIdentity: row.voterIdentity ?? "",
    firstId: resolve(row.first),
    secondId: resolve(row.second),
    thirdId: resolve(row.third),
    timestamp: row.timestamp ?? "",
  };
}

function toRow(vote: Vote): RawRow {
  return {
    voterName: vote.voterName,
    voterIdentity: vote.voterIdentity,
    firstId: vote.firstId ?? "",
    secondId: vote.secondId ?? "",
    thirdId: vote.thirdId ?? "",
    timestamp: vote.timestamp,
  };
}

/** Non-null ranks must name three different candidates. */
export function hasDistinctRanks(ballot: Pick<Ballot, "firstId" | "secondId" | "thirdId">): boolean {
  const ids = RANK_FIELDS.map((f) => ballot[f]).filter(
    (id): id is CandidateId => id !== null,
  );
  return new Set(ids).size === ids.length;
}

// ---------- Store ----------

export interface VoteStoreOptions {
  timeZone?: string;
  uniqueVoter?: boolean;
  now?: () => Date;
}

export class VoteStore {
  readonly timeZone: string;
  readonly uniqueVoter: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly backend: TableBackend,
    private readonly candidateStore: CandidateStore,
    options: VoteStoreOptions = {},
  ) {
    this.timeZone = options.timeZone ?? "Asia/Tokyo";
    this.uniqueVoter = options.uniqueVoter ?? true;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read all votes. Legacy label-valued rank columns are resolved against
   * `candidates` (unmatched labels become null) and the table is rewritten
   * in the current layout.
   */
  load(candidates?: readonly Candidate[]): Vote[] {
    const decoded = decodeVoteTable(this.backend.read("votes"));

    switch (decoded.kind) {
      case "missing":
        return [];
      case "current": {
        const votes = decoded.rows.map(fromCurrentRow);
        if (decoded.renamed) this.save(votes);
        return votes;
      }
      case "legacy-label": {
        const map = new CandidateMap(candidates ?? this.candidateStore.load());
        const votes = decoded.rows.map((row) => fromLegacyLabelRow(row, map));
        console.warn(
          `Migrated ${votes.length} votes from the legacy label layout`,
        );
        this.save(votes);
        return votes;
      }
    }
  }

  save(votes: readonly Vote[]): void {
    this.backend.write("votes", VOTE_COLUMNS, votes.map(toRow));
  }

  /**
   * Append one ballot with a server-assigned timestamp. The duplicate voter
   * check reads the persisted table inside the same transaction as the write.
   */
  append(ballot: Ballot): Vote {
    if (!hasDistinctRanks(ballot)) {
      throw new ValidationError("The same candidate cannot be ranked twice");
    }

    return this.backend.transaction(() => {
      const votes = this.load();
      if (this.uniqueVoter) {
        const identity = normalizeVoterIdentity(ballot.voterIdentity);
        const taken = votes.some(
          (v) => normalizeVoterIdentity(v.voterIdentity) === identity,
        );
        if (taken) {
          throw new ValidationError(
            `A ballot for voter identity "${ballot.voterIdentity}" already exists`,
          );
        }
      }

      const vote: Vote = {
        voterName: ballot.voterName,
        voterIdentity: ballot.voterIdentity,
        firstId: ballot.firstId,
        secondId: ballot.secondId,
        thirdId: ballot.thirdId,
        timestamp: formatLocalTimestamp(this.now(), this.timeZone),
      };
      this.save([...votes, vote]);
      return vote;
    });
  }

  /**
   * Rewrite oldId to newId in every rank field. A ballot that already ranked
   * newId keeps its higher placement and the lower slot becomes null, so a
   * merge never counts one ballot twice for a candidate. Ballots without
   * oldId are not touched. Returns the rows changed.
   */
  replaceId(oldId: CandidateId, newId: CandidateId): number {
    if (oldId === newId) return 0;
    return this.rewrite((id) => (id === oldId ? newId : id));
  }

  /** Null every rank field equal to id. Returns the rows changed. */
  nullifyId(id: CandidateId): number {
    return this.rewrite((current) => (current === id ? null : current));
  }

  clearAll(): void {
    this.backend.remove("votes");
  }

  private rewrite(
    mapId: (id: CandidateId | null) => CandidateId | null,
  ): number {
    return this.backend.transaction(() => {
      const votes = this.load();
      let changed = 0;
      const next = votes.map((vote) => {
        const updated = { ...vote };
        // mapped id -> stored value of the highest slot holding it
        const kept = new Map<CandidateId, CandidateId | null>();
        for (const field of RANK_FIELDS) {
          const id = mapId(vote[field]);
          // Only a collision created by the mapping drops the lower slot
          if (id !== null && kept.has(id) && kept.get(id) !== vote[field]) {
            updated[field] = null;
            continue;
          }
          updated[field] = id;
          if (id !== null && !kept.has(id)) kept.set(id, vote[field]);
        }
        if (RANK_FIELDS.some((f) => updated[f] !== vote[f])) changed++;
        return updated;
      });
      if (changed > 0) this.save(next);
      return changed;
    });
  }
}
