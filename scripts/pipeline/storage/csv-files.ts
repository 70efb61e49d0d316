/**
 * CSV file backend: one file per table in a data directory
 * (candidates.csv, votes.csv).
 *
 * Writes go to a temporary file that is renamed over the target, so a
 * reader never sees a half-written table. There is no cross-process
 * locking; concurrent writers are last-write-wins.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import type {
  RawRow,
  RawTable,
  TableBackend,
  TableName,
} from "../../../src/poll_types";
import { formatCsv, parseCsvTable } from "../csv";
import { PersistenceError, describeError } from "../errors";

export class CsvFileBackend implements TableBackend {
  readonly kind = "csv";

  constructor(readonly dataDir: string) {}

  pathFor(table: TableName): string {
    return join(this.dataDir, `${table}.csv`);
  }

  read(table: TableName): RawTable | null {
    const path = this.pathFor(table);
    if (!existsSync(path)) return null;
    try {
      return parseCsvTable(readFileSync(path, "utf-8"));
    } catch (e) {
      throw new PersistenceError(
        `Failed to read ${path}: ${describeError(e)}`,
        e,
      );
    }
  }

  write(table: TableName, columns: readonly string[], rows: RawRow[]): void {
    const path = this.pathFor(table);
    const tmpPath = `${path}.tmp`;
    try {
      if (!existsSync(this.dataDir)) {
        mkdirSync(this.dataDir, { recursive: true });
      }
      writeFileSync(tmpPath, formatCsv(columns, rows), "utf-8");
      renameSync(tmpPath, path);
    } catch (e) {
      throw new PersistenceError(
        `Failed to write ${path}: ${describeError(e)}`,
        e,
      );
    }
  }

  remove(table: TableName): void {
    const path = this.pathFor(table);
    try {
      rmSync(path, { force: true });
    } catch (e) {
      throw new PersistenceError(
        `Failed to remove ${path}: ${describeError(e)}`,
        e,
      );
    }
  }

  transaction<T>(fn: () => T): T {
    return fn();
  }

  close(): void {}
}
