import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SqliteBackend } from "../src/lib/server/db";
import { PollService } from "../scripts/pipeline/poll";
import { NOW, NOW_TOKYO, sequentialIds } from "./helpers";

describe("SqliteBackend", () => {
  let backend: SqliteBackend;

  beforeEach(() => {
    backend = new SqliteBackend(":memory:");
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    backend.close();
    vi.restoreAllMocks();
  });

  test("a table that was never written reads as null", () => {
    expect(backend.read("candidates")).toBeNull();
  });

  test("rows come back as text in insertion order", () => {
    backend.write("votes", ["voterName", "voterIdentity"], [
      { voterName: "Taro", voterIdentity: "007" },
      { voterName: "Hanako", voterIdentity: "" },
    ]);

    expect(backend.read("votes")).toEqual({
      columns: ["voterName", "voterIdentity"],
      rows: [
        { voterName: "Taro", voterIdentity: "007" },
        { voterName: "Hanako", voterIdentity: "" },
      ],
    });
  });

  test("a new column layout replaces the table", () => {
    backend.write("candidates", ["name"], [{ name: "Apple" }]);
    backend.write("candidates", ["id", "label"], [{ id: "a1", label: "Apple" }]);

    expect(backend.read("candidates")).toEqual({
      columns: ["id", "label"],
      rows: [{ id: "a1", label: "Apple" }],
    });
  });

  test("a failed transaction leaves nothing behind", () => {
    expect(() =>
      backend.transaction(() => {
        backend.write("candidates", ["id"], [{ id: "a1" }]);
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(backend.read("candidates")).toBeNull();
  });

  test("remove drops the table", () => {
    backend.write("votes", ["voterName"], [{ voterName: "Taro" }]);
    backend.remove("votes");
    expect(backend.read("votes")).toBeNull();
  });

  test("a legacy name table is migrated in place", () => {
    backend.write("candidates", ["name", "active"], [
      { name: "Apple", active: "false" },
    ]);
    const poll = new PollService(backend, { generateId: sequentialIds() });

    expect(poll.listCandidates()).toEqual([{ id: "c1", label: "Apple", active: false }]);
    expect(backend.read("candidates")?.columns).toEqual(["id", "label", "active"]);
  });

  test("a second ballot for the same identity is refused", () => {
    const poll = new PollService(backend, {
      now: () => NOW,
      generateId: sequentialIds(),
    });
    const ballot = {
      voterName: "Taro",
      voterIdentity: "e1",
      firstId: "c1",
      secondId: "c2",
      thirdId: "c3",
    };

    const first = poll.submitVote(ballot);
    const second = poll.submitVote({ ...ballot, voterIdentity: " E1" });

    expect(first.ok && first.value.timestamp).toBe(NOW_TOKYO);
    expect(!second.ok && second.error.message).toBe(
      'A ballot for voter identity "E1" already exists',
    );
    expect(poll.votes.load()).toHaveLength(1);
  });
});
