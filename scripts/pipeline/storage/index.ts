/**
 * Storage backend dispatch.
 */

import type { TableBackend } from "../../../src/poll_types";
import { SqliteBackend } from "../../../src/lib/server/db";
import type { PollConfig } from "../config";
import { CsvFileBackend } from "./csv-files";
import { MemoryBackend } from "./memory";

export { CsvFileBackend } from "./csv-files";
export { MemoryBackend } from "./memory";
export { SqliteBackend } from "../../../src/lib/server/db";

export function openBackend(
  config: Pick<PollConfig, "storage" | "dataDir" | "dbPath">,
): TableBackend {
  switch (config.storage) {
    case "csv":
      return new CsvFileBackend(config.dataDir);
    case "sqlite":
      return new SqliteBackend(config.dbPath);
    case "memory":
      return new MemoryBackend();
  }
}
