/**
 * Shared types for the 3-2-1 points poll.
 *
 * Used by the pipeline modules under scripts/ and by the server-side
 * storage layer under src/lib/server.
 */

// ---------- Candidates ----------

export type CandidateId = string;

export interface Candidate {
  id: CandidateId;
  label: string;
  active: boolean;
}

// ---------- Votes ----------

export interface Vote {
  voterName: string;
  voterIdentity: string;
  firstId: CandidateId | null;
  secondId: CandidateId | null;
  thirdId: CandidateId | null;
  timestamp: string;
}

export type Ballot = Omit<Vote, "timestamp">;

export const RANK_FIELDS = ["firstId", "secondId", "thirdId"] as const;
export type RankField = (typeof RANK_FIELDS)[number];

/** Points awarded for a 1st, 2nd and 3rd place, in rank field order. */
export const RANK_POINTS: Record<RankField, number> = {
  firstId: 3,
  secondId: 2,
  thirdId: 1,
};

export interface DetailedVote extends Vote {
  first: string | null;
  second: string | null;
  third: string | null;
}

// ---------- Ranking ----------

export interface RankedEntry {
  rank: number;
  id: CandidateId;
  label: string;
  points: number;
  firstCount: number;
  secondCount: number;
  thirdCount: number;
}

// ---------- Flat tables ----------

export type TableName = "candidates" | "votes";

/** One row of a flat table. Every cell is text; empty means absent. */
export type RawRow = Record<string, string>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

/**
 * Storage for the two flat tables. `read` returns null when the table has
 * never been written (or was removed).
 */
export interface TableBackend {
  readonly kind: string;
  read(table: TableName): RawTable | null;
  write(table: TableName, columns: readonly string[], rows: RawRow[]): void;
  remove(table: TableName): void;
  /** Run fn as one unit of work. Nested calls join the outer unit. */
  transaction<T>(fn: () => T): T;
  close(): void;
}
