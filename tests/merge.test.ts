import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { NotFoundError, ValidationError } from "../scripts/pipeline/errors";
import { cand, danglingReferences, makePoll, vote } from "./helpers";

function ranks(poll: ReturnType<typeof makePoll>["poll"]) {
  return poll.votes.load().map((v) => [v.firstId, v.secondId, v.thirdId]);
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("addOrMergeCandidate", () => {
  test("creates a candidate when no key collides", () => {
    const { poll } = makePoll([cand("a1", "Apple")]);
    const outcome = poll.addOrMergeCandidate("  Banana  ");

    expect(outcome).toEqual({
      ok: true,
      value: {
        id: "c1",
        candidate: { id: "c1", label: "Banana", active: true },
        created: true,
        absorbed: [],
        votesMoved: 0,
      },
    });
    expect(poll.listCandidates().map((c) => c.label)).toEqual(["Apple", "Banana"]);
  });

  test("a new label that collides updates the existing candidate", () => {
    const { poll } = makePoll([cand("p1", "パッケージ", false)]);
    const outcome = poll.addOrMergeCandidate("パケ");

    expect(outcome.ok && outcome.value.id).toBe("p1");
    expect(outcome.ok && outcome.value.created).toBe(false);
    expect(poll.listCandidates()).toEqual([{ id: "p1", label: "パケ", active: true }]);
  });

  test("can add an inactive candidate", () => {
    const { poll } = makePoll([]);
    poll.addOrMergeCandidate("Cherry", false);
    expect(poll.listCandidates()).toEqual([{ id: "c1", label: "Cherry", active: false }]);
  });

  test("folds every colliding candidate into the oldest one", () => {
    const { poll } = makePoll(
      [
        cand("x1", "Alpha"),
        cand("p1", "パッケージ"),
        cand("b1", "Beta"),
        cand("p2", "ぱっけーじ"),
      ],
      [vote("E1", "p2", "x1", "b1"), vote("E2", "b1", "p1", "p2")],
    );

    const outcome = poll.addOrMergeCandidate("包装");

    expect(outcome).toEqual({
      ok: true,
      value: {
        id: "p1",
        candidate: { id: "p1", label: "包装", active: true },
        created: false,
        absorbed: ["p2"],
        votesMoved: 2,
      },
    });
    expect(poll.listCandidates().map((c) => c.id)).toEqual(["x1", "p1", "b1"]);
    expect(ranks(poll)).toEqual([
      ["p1", "x1", "b1"],
      ["b1", "p1", null],
    ]);
    expect(
      poll.getRanking().map((r) => [r.id, r.points, r.firstCount, r.secondCount, r.thirdCount]),
    ).toEqual([
      ["p1", 5, 1, 1, 0],
      ["b1", 4, 1, 0, 1],
      ["x1", 2, 0, 1, 0],
    ]);
  });

  test("an empty label is rejected without touching storage", () => {
    const { backend, poll } = makePoll([cand("a1", "Apple")]);
    const before = backend.read("candidates");

    const outcome = poll.addOrMergeCandidate("   ");

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error).toBeInstanceOf(ValidationError);
    expect(backend.read("candidates")).toEqual(before);
  });
});

describe("renameOrMergeCandidate", () => {
  test("plain rename keeps the id", () => {
    const { poll } = makePoll([cand("x1", "Red")], [vote("E1", "x1", null, null)]);
    const outcome = poll.renameOrMergeCandidate("x1", "Crimson", true);

    expect(outcome.ok && outcome.value.absorbed).toEqual([]);
    expect(poll.listCandidates()).toEqual([{ id: "x1", label: "Crimson", active: true }]);
    expect(ranks(poll)).toEqual([["x1", null, null]]);
  });

  test("can deactivate while renaming", () => {
    const { poll } = makePoll([cand("x1", "Red")]);
    poll.renameOrMergeCandidate("x1", "Red", false);
    expect(poll.listCandidates()).toEqual([{ id: "x1", label: "Red", active: false }]);
  });

  test("renaming onto an older candidate merges into it", () => {
    const { poll } = makePoll(
      [cand("y1", "Yellow"), cand("x1", "Red")],
      [vote("E1", "x1", "y1", null), vote("E2", "x1", null, null)],
    );

    const outcome = poll.renameOrMergeCandidate("x1", "Yel low", true);

    expect(outcome.ok && outcome.value.id).toBe("y1");
    expect(outcome.ok && outcome.value.absorbed).toEqual(["x1"]);
    expect(poll.listCandidates()).toEqual([{ id: "y1", label: "Yel low", active: true }]);
    expect(ranks(poll)).toEqual([
      ["y1", null, null],
      ["y1", null, null],
    ]);
  });

  test("renaming onto a newer candidate absorbs it", () => {
    const { poll } = makePoll(
      [cand("x1", "Red"), cand("y1", "Yellow")],
      [vote("E1", "y1", null, null)],
    );

    const outcome = poll.renameOrMergeCandidate("x1", "Yellow", true);

    expect(outcome.ok && outcome.value.id).toBe("x1");
    expect(poll.listCandidates()).toEqual([{ id: "x1", label: "Yellow", active: true }]);
    expect(ranks(poll)).toEqual([["x1", null, null]]);
  });

  test("unknown id is a not-found outcome", () => {
    const { backend, poll } = makePoll([cand("x1", "Red")]);
    const before = backend.read("candidates");

    const outcome = poll.renameOrMergeCandidate("nope", "Blue", true);

    expect(!outcome.ok && outcome.error).toBeInstanceOf(NotFoundError);
    expect(backend.read("candidates")).toEqual(before);
  });

  test("empty label is a validation outcome", () => {
    const { poll } = makePoll([cand("x1", "Red")]);
    const outcome = poll.renameOrMergeCandidate("x1", "", true);
    expect(!outcome.ok && outcome.error.message).toBe("Candidate label must not be empty");
  });
});

describe("deleteCandidate and toggleActive", () => {
  test("delete blanks the candidate's slots", () => {
    const { poll } = makePoll(
      [cand("a1", "Apple"), cand("b1", "Banana")],
      [vote("E1", "a1", "b1", null)],
    );

    const outcome = poll.deleteCandidate("a1");

    expect(outcome).toEqual({ ok: true, value: { id: "a1", label: "Apple", active: true } });
    expect(poll.listCandidates().map((c) => c.id)).toEqual(["b1"]);
    expect(ranks(poll)).toEqual([[null, "b1", null]]);
  });

  test("delete of an unknown id is not found", () => {
    const { poll } = makePoll([cand("a1", "Apple")]);
    const outcome = poll.deleteCandidate("zz");
    expect(!outcome.ok && outcome.error.message).toBe("Candidate not found: zz");
  });

  test("toggle flips the flag and leaves votes alone", () => {
    const { poll } = makePoll([cand("a1", "Apple")], [vote("E1", "a1", null, null)]);

    expect(poll.toggleActive("a1")).toEqual({
      ok: true,
      value: { id: "a1", label: "Apple", active: false },
    });
    expect(poll.listCandidates(true)).toEqual([]);
    expect(ranks(poll)).toEqual([["a1", null, null]]);
  });
});

test("no vote references a missing candidate after a series of edits", () => {
  const { poll } = makePoll(
    [cand("a1", "Apple"), cand("b1", "Banana"), cand("p1", "パケ"), cand("p2", "包装")],
    [
      vote("E1", "a1", "b1", "p1"),
      vote("E2", "p2", "a1", "b1"),
      vote("E3", "b1", "p2", "p1"),
    ],
  );

  poll.addOrMergeCandidate("パッケージング");
  poll.renameOrMergeCandidate("b1", "Apple", true);
  poll.deleteCandidate("p1");
  poll.addOrMergeCandidate("Cherry");

  expect(danglingReferences(poll)).toEqual([]);
  expect(poll.listCandidates().map((c) => c.label)).toEqual(["Apple", "Cherry"]);
  for (const v of poll.votes.load()) {
    const ids = [v.firstId, v.secondId, v.thirdId].filter((id) => id !== null);
    expect(new Set(ids).size).toBe(ids.length);
  }
});
