/**
 * Initialize a poll database.
 *
 * A fresh database gets the placeholder candidates and an empty votes
 * table; an existing one is migrated to the current layout and otherwise
 * left as it is.
 *
 * Usage:
 *   tsx scripts/init-database.ts [db-path]
 */

import { CandidateStore } from "./pipeline/candidate-store";
import { loadConfig } from "./pipeline/config";
import { describeError } from "./pipeline/errors";
import { SqliteBackend } from "./pipeline/storage/index";
import { VoteStore } from "./pipeline/vote-store";

let dbPath = process.argv[2] ?? "";

try {
  dbPath ||= loadConfig().dbPath;
  const backend = new SqliteBackend(dbPath);
  try {
    backend.transaction(() => {
      const candidates = new CandidateStore(backend);
      const votes = new VoteStore(backend, candidates);
      const loaded = candidates.load();
      const existing = votes.load(loaded);
      if (!backend.read("votes")) votes.save([]);
      console.log(
        `Candidates: ${loaded.length}, votes: ${existing.length}`,
      );
    });
  } finally {
    backend.close();
  }
} catch (e) {
  console.error(`Failed to initialize database: ${describeError(e)}`);
  process.exit(1);
}

console.log(`Database initialized at ${dbPath}`);
console.log("Tables: candidates, votes");
