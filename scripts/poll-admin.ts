/**
 * Command-line front end for voting and candidate maintenance.
 *
 * Usage:
 *   tsx scripts/poll-admin.ts candidates [--active]
 *   tsx scripts/poll-admin.ts add <label> [--inactive]
 *   tsx scripts/poll-admin.ts rename <id> <label> [--inactive]
 *   tsx scripts/poll-admin.ts toggle <id>
 *   tsx scripts/poll-admin.ts delete <id>
 *   tsx scripts/poll-admin.ts vote <name> <identity> <first-id> <second-id> <third-id>
 *   tsx scripts/poll-admin.ts ranking [--active-only]
 *   tsx scripts/poll-admin.ts votes
 *   tsx scripts/poll-admin.ts reset --yes
 *
 * Storage is chosen by the POLL_* environment variables.
 */

import { loadConfig } from "./pipeline/config";
import { describeError } from "./pipeline/errors";
import { PollService, type Outcome } from "./pipeline/poll";
import { toDisplayTime } from "./pipeline/timestamp";

const [command = "help", ...rest] = process.argv.slice(2);
const flags = new Set(rest.filter((a) => a.startsWith("--")));
const args = rest.filter((a) => !a.startsWith("--"));

function usage(): never {
  console.error(
    "Commands: candidates, add, rename, toggle, delete, vote, ranking, votes, reset",
  );
  process.exit(1);
}

function arg(index: number, name: string): string {
  const value = args[index];
  if (value === undefined) {
    console.error(`Missing argument: ${name}`);
    usage();
  }
  return value;
}

function report<T>(outcome: Outcome<T, Error>, onOk: (value: T) => string) {
  if (!outcome.ok) {
    console.error(`${outcome.error.name}: ${outcome.error.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(onOk(outcome.value));
}

function run(poll: PollService) {
  switch (command) {
    case "candidates": {
      for (const c of poll.listCandidates(flags.has("--active"))) {
        console.log(`${c.id}  ${c.active ? "active  " : "inactive"}  ${c.label}`);
      }
      break;
    }
    case "add":
      report(
        poll.addOrMergeCandidate(arg(0, "label"), !flags.has("--inactive")),
        (r) =>
          r.created
            ? `Added ${r.id} "${r.candidate.label}"`
            : `Merged into ${r.id} "${r.candidate.label}"` +
              (r.absorbed.length ? ` (absorbed ${r.absorbed.join(", ")})` : ""),
      );
      break;
    case "rename":
      report(
        poll.renameOrMergeCandidate(
          arg(0, "id"),
          arg(1, "label"),
          !flags.has("--inactive"),
        ),
        (r) =>
          `Saved ${r.id} "${r.candidate.label}"` +
          (r.absorbed.length ? ` (absorbed ${r.absorbed.join(", ")})` : ""),
      );
      break;
    case "toggle":
      report(poll.toggleActive(arg(0, "id")), (c) =>
        `${c.id} is now ${c.active ? "active" : "inactive"}`,
      );
      break;
    case "delete":
      report(poll.deleteCandidate(arg(0, "id")), (c) =>
        `Deleted ${c.id} "${c.label}"; its votes were blanked`,
      );
      break;
    case "vote":
      report(
        poll.submitVote({
          voterName: arg(0, "name"),
          voterIdentity: arg(1, "identity"),
          firstId: arg(2, "first-id"),
          secondId: arg(3, "second-id"),
          thirdId: arg(4, "third-id"),
        }),
        (v) => `Vote recorded at ${v.timestamp}`,
      );
      break;
    case "ranking": {
      const ranking = poll.getRanking(!flags.has("--active-only"));
      if (ranking.length === 0) console.log("No votes yet");
      for (const r of ranking) {
        console.log(
          `${String(r.rank).padStart(3)}  ${String(r.points).padStart(4)} pts  ` +
            `(${r.firstCount}/${r.secondCount}/${r.thirdCount})  ${r.label}`,
        );
      }
      break;
    }
    case "votes": {
      for (const v of poll.listVotesDetailed()) {
        console.log(
          [
            v.voterName,
            v.voterIdentity,
            v.first ?? "-",
            v.second ?? "-",
            v.third ?? "-",
            toDisplayTime(v.timestamp, poll.timeZone),
          ].join("\t"),
        );
      }
      break;
    }
    case "reset":
      if (!flags.has("--yes")) {
        console.error("Refusing to delete every vote without --yes");
        process.exitCode = 1;
        break;
      }
      poll.resetAllVotes();
      console.log("All votes deleted");
      break;
    default:
      usage();
  }
}

try {
  const poll = PollService.fromConfig(loadConfig());
  try {
    run(poll);
  } finally {
    poll.close();
  }
} catch (e) {
  console.error(describeError(e));
  process.exit(1);
}
