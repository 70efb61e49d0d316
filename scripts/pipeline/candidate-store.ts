/**
 * Candidate store: owns the candidates table (id, label, active).
 *
 * The persisted table is decoded into one of several layouts and migrated
 * to the current one at load time; nothing outside this file sees a legacy
 * row.
 */

import { randomUUID } from "crypto";
import type {
  Candidate,
  CandidateId,
  RawRow,
  RawTable,
  TableBackend,
} from "../../src/poll_types";

export const CANDIDATE_COLUMNS = ["id", "label", "active"] as const;

export const DEFAULT_CANDIDATE_LABELS = ["候補A", "候補B", "候補C", "候補D"];

export type IdGenerator = () => string;

// ---------- Persisted layouts ----------

type CandidateTable =
  | { kind: "missing" }
  | { kind: "unrecognized"; columns: string[] }
  | { kind: "current"; rows: RawRow[] }
  | { kind: "legacy-name"; rows: RawRow[] };

export function decodeCandidateTable(table: RawTable | null): CandidateTable {
  if (!table) return { kind: "missing" };
  const columns = new Set(table.columns);
  if (columns.has("label")) return { kind: "current", rows: table.rows };
  if (columns.has("name")) return { kind: "legacy-name", rows: table.rows };
  return { kind: "unrecognized", columns: table.columns };
}

/** "true"/"false" in any case, 1/0 and yes/no; anything else is fallback. */
export function parseActive(value: string | undefined, fallback = true): boolean {
  const v = (value ?? "").trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return fallback;
}

function toRow(candidate: Candidate): RawRow {
  return {
    id: candidate.id,
    label: candidate.label,
    active: candidate.active ? "true" : "false",
  };
}

/** 8 hex characters of a random UUID. */
export function randomCandidateId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 8);
}

// ---------- Store ----------

export class CandidateStore {
  private readonly nextId: IdGenerator;

  constructor(
    private readonly backend: TableBackend,
    options: { generateId?: IdGenerator } = {},
  ) {
    this.nextId = options.generateId ?? randomCandidateId;
  }

  /**
   * Produce an id that is not used by any persisted candidate nor by any id
   * in `taken`.
   */
  generateId(taken: Iterable<CandidateId> = []): CandidateId {
    const used = new Set(taken);
    for (const row of this.backend.read("candidates")?.rows ?? []) {
      if (row.id) used.add(row.id);
    }
    let id = this.nextId();
    while (used.has(id)) id = this.nextId();
    return id;
  }

  load(): Candidate[] {
    const decoded = decodeCandidateTable(this.backend.read("candidates"));

    switch (decoded.kind) {
      case "missing":
      case "unrecognized":
        return this.seed();
      case "current": {
        const needsIds = decoded.rows.some((row) => !row.id);
        const candidates = this.fromRows(decoded.rows, "label");
        if (needsIds) {
          console.warn("Assigned ids to candidates that had none");
          this.save(candidates);
        }
        return dedupe(candidates);
      }
      case "legacy-name": {
        const candidates = this.fromRows(decoded.rows, "name");
        console.warn(
          `Migrated ${candidates.length} candidates from the legacy name layout`,
        );
        this.save(candidates);
        return dedupe(candidates);
      }
    }
  }

  save(candidates: readonly Candidate[]): void {
    this.backend.write(
      "candidates",
      CANDIDATE_COLUMNS,
      dedupe(candidates).map(toRow),
    );
  }

  private seed(): Candidate[] {
    const candidates: Candidate[] = [];
    for (const label of DEFAULT_CANDIDATE_LABELS) {
      const id = this.generateId(candidates.map((c) => c.id));
      candidates.push({ id, label, active: true });
    }
    this.save(candidates);
    return candidates;
  }

  private fromRows(rows: RawRow[], labelColumn: "label" | "name"): Candidate[] {
    const candidates: Candidate[] = [];
    const taken = new Set(rows.map((row) => row.id).filter(Boolean));
    for (const row of rows) {
      let id = row.id ?? "";
      if (!id) {
        id = this.generateId(taken);
        taken.add(id);
      }
      candidates.push({
        id,
        label: row[labelColumn] ?? "",
        active: parseActive(row.active),
      });
    }
    return candidates;
  }
}

/** Keep the first occurrence of each id. */
export function dedupe(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<CandidateId>();
  const result: Candidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.id)) continue;
    seen.add(candidate.id);
    result.push({ ...candidate });
  }
  return result;
}
