/**
 * Runtime configuration, read from environment variables.
 *
 *   POLL_STORAGE       csv | sqlite | memory       (default csv)
 *   POLL_DATA_DIR      directory for the CSV files (default ./data)
 *   POLL_DB            SQLite database path        (default ./data/poll.sqlite3)
 *   APP_TIMEZONE       IANA zone for timestamps    (default Asia/Tokyo)
 *   POLL_UNIQUE_VOTER  one ballot per identity     (default true)
 */

import { resolve } from "path";

export type StorageKind = "csv" | "sqlite" | "memory";

export interface PollConfig {
  storage: StorageKind;
  dataDir: string;
  dbPath: string;
  timeZone: string;
  uniqueVoter: boolean;
}

const STORAGE_KINDS: readonly StorageKind[] = ["csv", "sqlite", "memory"];

function isStorageKind(value: string): value is StorageKind {
  return STORAGE_KINDS.some((kind) => kind === value);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function parseFlag(name: string, value: string | undefined, fallback: boolean) {
  if (value === undefined || value.trim() === "") return fallback;
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new Error(`${name} must be a boolean flag, got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PollConfig {
  const storage = (env.POLL_STORAGE ?? "csv").trim().toLowerCase();
  if (!isStorageKind(storage)) {
    throw new Error(
      `POLL_STORAGE "${storage}" is not supported. ` +
        `Available: ${STORAGE_KINDS.join(", ")}`,
    );
  }

  const timeZone = env.APP_TIMEZONE || "Asia/Tokyo";
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`APP_TIMEZONE "${timeZone}" is not a known time zone`);
  }

  const dataDir = resolve(env.POLL_DATA_DIR || "./data");

  return {
    storage,
    dataDir,
    dbPath: env.POLL_DB ? resolve(env.POLL_DB) : resolve(dataDir, "poll.sqlite3"),
    timeZone,
    uniqueVoter: parseFlag("POLL_UNIQUE_VOTER", env.POLL_UNIQUE_VOTER, true),
  };
}
