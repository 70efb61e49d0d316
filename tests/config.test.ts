import { resolve } from "path";
import { describe, expect, test } from "vitest";
import { isValidTimeZone, loadConfig } from "../scripts/pipeline/config";
import { openBackend } from "../scripts/pipeline/storage/index";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      storage: "csv",
      dataDir: resolve("./data"),
      dbPath: resolve("./data", "poll.sqlite3"),
      timeZone: "Asia/Tokyo",
      uniqueVoter: true,
    });
  });

  test("reads every variable", () => {
    expect(
      loadConfig({
        POLL_STORAGE: "SQLite",
        POLL_DATA_DIR: "/tmp/poll",
        POLL_DB: "/tmp/other.db",
        APP_TIMEZONE: "UTC",
        POLL_UNIQUE_VOTER: "off",
      }),
    ).toEqual({
      storage: "sqlite",
      dataDir: "/tmp/poll",
      dbPath: "/tmp/other.db",
      timeZone: "UTC",
      uniqueVoter: false,
    });
  });

  test("rejects an unknown storage kind", () => {
    expect(() => loadConfig({ POLL_STORAGE: "excel" })).toThrow(
      'POLL_STORAGE "excel" is not supported. Available: csv, sqlite, memory',
    );
  });

  test("rejects an unknown time zone", () => {
    expect(() => loadConfig({ APP_TIMEZONE: "Mars/Olympus" })).toThrow(
      'APP_TIMEZONE "Mars/Olympus" is not a known time zone',
    );
  });

  test("rejects a malformed flag", () => {
    expect(() => loadConfig({ POLL_UNIQUE_VOTER: "sometimes" })).toThrow(
      'POLL_UNIQUE_VOTER must be a boolean flag, got "sometimes"',
    );
  });
});

test("isValidTimeZone", () => {
  expect(isValidTimeZone("Asia/Tokyo")).toBe(true);
  expect(isValidTimeZone("Nowhere/Special")).toBe(false);
});

test("openBackend picks the backend by kind", () => {
  const backend = openBackend({ storage: "csv", dataDir: "/tmp/unused", dbPath: "" });
  expect(backend.kind).toBe("csv");
  backend.close();
});
