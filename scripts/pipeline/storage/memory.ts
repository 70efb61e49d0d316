/**
 * In-memory table backend.
 *
 * Used by tests and by `POLL_STORAGE=memory`. Tables are deep-copied on the
 * way in and out so callers never share row objects with the store.
 */

import type {
  RawRow,
  RawTable,
  TableBackend,
  TableName,
} from "../../../src/poll_types";

function copyTable(table: RawTable): RawTable {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  };
}

export class MemoryBackend implements TableBackend {
  readonly kind = "memory";
  private tables = new Map<TableName, RawTable>();

  constructor(initial: Partial<Record<TableName, RawTable>> = {}) {
    for (const [name, table] of Object.entries(initial)) {
      if (table && (name === "candidates" || name === "votes")) {
        this.tables.set(name, copyTable(table));
      }
    }
  }

  read(table: TableName): RawTable | null {
    const stored = this.tables.get(table);
    return stored ? copyTable(stored) : null;
  }

  write(table: TableName, columns: readonly string[], rows: RawRow[]): void {
    this.tables.set(table, copyTable({ columns: [...columns], rows }));
  }

  remove(table: TableName): void {
    this.tables.delete(table);
  }

  transaction<T>(fn: () => T): T {
    return fn();
  }

  close(): void {}
}
