/**
 * Ranking and vote exports: CSV text and an XLSX workbook.
 *
 * Both formats carry the persisted column semantics with candidate ids
 * replaced by display labels. Timestamps are rendered in the configured
 * time zone.
 */

import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import type { DetailedVote, RankedEntry } from "../../src/poll_types";
import { formatCsv } from "./csv";
import { PersistenceError, describeError } from "./errors";
import { toDisplayTime } from "./timestamp";

export const RANKING_COLUMNS = [
  "rank",
  "label",
  "points",
  "firstCount",
  "secondCount",
  "thirdCount",
] as const;

export const VOTE_EXPORT_COLUMNS = [
  "voterName",
  "voterIdentity",
  "first",
  "second",
  "third",
  "timestamp",
] as const;

type VoteExportRow = Record<(typeof VOTE_EXPORT_COLUMNS)[number], string>;

function voteExportRows(
  votes: readonly DetailedVote[],
  timeZone: string,
): VoteExportRow[] {
  return votes.map((vote) => ({
    voterName: vote.voterName,
    voterIdentity: vote.voterIdentity,
    first: vote.first ?? "",
    second: vote.second ?? "",
    third: vote.third ?? "",
    timestamp: toDisplayTime(vote.timestamp, timeZone),
  }));
}

// ---------- CSV ----------

export function rankingToCsv(ranking: readonly RankedEntry[]): string {
  return formatCsv(
    RANKING_COLUMNS,
    ranking.map((entry) => ({ ...entry })),
  );
}

export function votesToCsv(
  votes: readonly DetailedVote[],
  timeZone: string,
): string {
  return formatCsv(VOTE_EXPORT_COLUMNS, voteExportRows(votes, timeZone));
}

// ---------- XLSX ----------

/** Workbook with a "Ranking" and a "Votes" sheet, header row first. */
export function buildWorkbook(
  ranking: readonly RankedEntry[],
  votes: readonly DetailedVote[],
  timeZone: string,
): Workbook {
  const workbook = new ExcelJS.Workbook();

  const rankingSheet = workbook.addWorksheet("Ranking");
  rankingSheet.columns = RANKING_COLUMNS.map((key) => ({
    header: key,
    key,
    width: key === "label" ? 24 : 12,
  }));
  for (const entry of ranking) {
    rankingSheet.addRow({ ...entry });
  }

  const votesSheet = workbook.addWorksheet("Votes");
  votesSheet.columns = VOTE_EXPORT_COLUMNS.map((key) => ({
    header: key,
    key,
    width: key === "timestamp" ? 20 : 16,
  }));
  for (const row of voteExportRows(votes, timeZone)) {
    votesSheet.addRow(row);
  }

  return workbook;
}

export async function writeWorkbook(
  path: string,
  workbook: Workbook,
): Promise<void> {
  try {
    if (!existsSync(dirname(path))) {
      mkdirSync(dirname(path), { recursive: true });
    }
    await workbook.xlsx.writeFile(path);
  } catch (e) {
    throw new PersistenceError(
      `Failed to write ${path}: ${describeError(e)}`,
      e,
    );
  }
}
