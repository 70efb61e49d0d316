/**
 * SQLite table backend for the poll.
 *
 * Each table is stored with TEXT columns in the same column order as the CSV
 * files, so legacy layouts (a `name` column, label-valued rank columns) load
 * exactly like their CSV counterparts. Operations run inside BEGIN IMMEDIATE
 * transactions: the write lock is taken before the first read, which makes
 * the voter-uniqueness check atomic with the insert that follows it.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import type {
  RawRow,
  RawTable,
  TableBackend,
  TableName,
} from "../../poll_types";
import {
  PersistenceError,
  describeError,
} from "../../../scripts/pipeline/errors";

// ---------- Helpers ----------

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function cellToText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return String(value);
}

function wrap<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof PersistenceError) throw e;
    throw new PersistenceError(`SQLite ${what} failed: ${describeError(e)}`, e);
  }
}

// ---------- Backend ----------

export class SqliteBackend implements TableBackend {
  readonly kind = "sqlite";
  private db: Database.Database;

  constructor(path: string) {
    this.db = wrap("open", () => {
      if (path !== ":memory:" && !existsSync(dirname(path))) {
        mkdirSync(dirname(path), { recursive: true });
      }
      return new Database(path);
    });
    if (path !== ":memory:") {
      // Enable WAL mode for concurrent readers
      this.db.pragma("journal_mode = WAL");
    }
  }

  private columnsOf(table: TableName): string[] {
    const info = this.db
      .prepare(`PRAGMA table_info(${quoteIdent(table)})`)
      .all() as Array<{ name: string }>;
    return info.map((c) => c.name);
  }

  private exists(table: TableName): boolean {
    const row = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(table) as { name: string } | undefined;
    return row !== undefined;
  }

  read(table: TableName): RawTable | null {
    return wrap(`read of ${table}`, () => {
      if (!this.exists(table)) return null;
      const columns = this.columnsOf(table);
      const records = this.db
        .prepare(`SELECT * FROM ${quoteIdent(table)} ORDER BY rowid`)
        .all() as Array<Record<string, unknown>>;

      const rows = records.map((record) => {
        const row: RawRow = {};
        for (const column of columns) row[column] = cellToText(record[column]);
        return row;
      });
      return { columns, rows };
    });
  }

  write(table: TableName, columns: readonly string[], rows: RawRow[]): void {
    wrap(`write of ${table}`, () =>
      this.transaction(() => {
        const existing = this.exists(table) ? this.columnsOf(table) : null;
        const sameLayout =
          existing !== null &&
          existing.length === columns.length &&
          existing.every((c, i) => c === columns[i]);

        if (sameLayout) {
          this.db.exec(`DELETE FROM ${quoteIdent(table)}`);
        } else {
          this.db.exec(`DROP TABLE IF EXISTS ${quoteIdent(table)}`);
          const defs = columns.map((c) => `${quoteIdent(c)} TEXT`).join(", ");
          this.db.exec(`CREATE TABLE ${quoteIdent(table)} (${defs})`);
        }

        const insert = this.db.prepare(
          `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(", ")})
           VALUES (${columns.map(() => "?").join(", ")})`,
        );
        for (const row of rows) {
          insert.run(...columns.map((c) => row[c] ?? ""));
        }
      }),
    );
  }

  remove(table: TableName): void {
    wrap(`drop of ${table}`, () => {
      this.db.exec(`DROP TABLE IF EXISTS ${quoteIdent(table)}`);
    });
  }

  transaction<T>(fn: () => T): T {
    if (this.db.inTransaction) return fn();
    return this.db.transaction(fn).immediate();
  }

  close(): void {
    this.db.close();
  }
}
