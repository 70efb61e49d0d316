/**
 * Write the ranking and the detailed vote list to an output directory.
 *
 * Produces result.csv, votes_detail.csv and results.xlsx. Storage is chosen
 * by the POLL_* environment variables (see scripts/pipeline/config.ts).
 *
 * Usage:
 *   tsx scripts/export-results.ts [out-dir] [--active-only]
 */

import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join, resolve } from "path";
import { loadConfig } from "./pipeline/config";
import { describeError } from "./pipeline/errors";
import { PollService } from "./pipeline/poll";

const args = process.argv.slice(2);
const OUT_DIR = resolve(args.find((a) => !a.startsWith("--")) || "./export");
const INCLUDE_INACTIVE = !args.includes("--active-only");

async function main() {
  const config = loadConfig();
  const poll = PollService.fromConfig(config);

  try {
    if (!existsSync(OUT_DIR)) mkdirSync(OUT_DIR, { recursive: true });

    const ranking = poll.getRanking(INCLUDE_INACTIVE);
    if (ranking.length === 0) {
      console.log("No votes yet; writing header-only files");
    }

    writeFileSync(
      join(OUT_DIR, "result.csv"),
      poll.exportRankingCsv(INCLUDE_INACTIVE),
      "utf-8",
    );
    writeFileSync(join(OUT_DIR, "votes_detail.csv"), poll.exportVotesCsv(), "utf-8");
    await poll.writeWorkbook(join(OUT_DIR, "results.xlsx"), INCLUDE_INACTIVE);

    console.log(`Exported ${ranking.length} ranked candidates to ${OUT_DIR}`);
  } finally {
    poll.close();
  }
}

main().catch((e: unknown) => {
  console.error(`Export failed: ${describeError(e)}`);
  process.exit(1);
});
