/**
 * Copy a CSV data directory (candidates.csv, votes.csv) into SQLite.
 *
 * Legacy layouts are migrated on the way in: candidates keyed by `name`
 * get ids, and label-valued vote columns are resolved to ids. The source
 * files are rewritten in the current layout by that migration; the target
 * tables are replaced.
 *
 * Usage:
 *   tsx scripts/import-csv.ts [csv-dir] [db-path]
 */

import { existsSync } from "fs";
import { resolve } from "path";
import { CandidateStore } from "./pipeline/candidate-store";
import { loadConfig } from "./pipeline/config";
import { describeError } from "./pipeline/errors";
import { CsvFileBackend, SqliteBackend } from "./pipeline/storage/index";
import { VoteStore } from "./pipeline/vote-store";

function main() {
  const config = loadConfig();
  const CSV_DIR = resolve(process.argv[2] || config.dataDir);
  const DB_PATH = resolve(process.argv[3] || config.dbPath);

  if (!existsSync(CSV_DIR)) {
    console.error(`CSV directory not found: ${CSV_DIR}`);
    process.exit(1);
  }

  const source = new CsvFileBackend(CSV_DIR);
  const sourceCandidates = new CandidateStore(source);
  const sourceVotes = new VoteStore(source, sourceCandidates);

  const candidates = sourceCandidates.load();
  const votes = sourceVotes.load(candidates);
  console.log(`Read ${candidates.length} candidates and ${votes.length} votes`);

  const target = new SqliteBackend(DB_PATH);
  try {
    const targetCandidates = new CandidateStore(target);
    const targetVotes = new VoteStore(target, targetCandidates);
    target.transaction(() => {
      targetCandidates.save(candidates);
      targetVotes.save(votes);
    });
  } finally {
    target.close();
  }

  console.log(`Imported into ${DB_PATH}`);
}

try {
  main();
} catch (e) {
  console.error(`Import failed: ${describeError(e)}`);
  process.exit(1);
}
