/**
 * PollService: the interface a voting/admin front end calls into.
 *
 * Validation and not-found failures come back as `{ ok: false }` outcomes
 * and leave storage untouched; PersistenceError is thrown.
 */

import type { Workbook } from "exceljs";
import type {
  Ballot,
  Candidate,
  CandidateId,
  DetailedVote,
  RankedEntry,
  TableBackend,
  Vote,
} from "../../src/poll_types";
import { RANK_FIELDS } from "../../src/poll_types";
import { aggregate } from "../tabulate-points";
import { CandidateMap } from "./candidate-map";
import { CandidateStore, type IdGenerator } from "./candidate-store";
import type { PollConfig } from "./config";
import { NotFoundError, ValidationError } from "./errors";
import {
  buildWorkbook as buildExportWorkbook,
  rankingToCsv,
  votesToCsv,
  writeWorkbook,
} from "./export";
import { MergeEngine, type MergeResult } from "./merge";
import { openBackend } from "./storage/index";
import { VoteStore, hasDistinctRanks } from "./vote-store";

export type Outcome<T, E extends Error = ValidationError | NotFoundError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface PollOptions {
  timeZone?: string;
  uniqueVoter?: boolean;
  now?: () => Date;
  generateId?: IdGenerator;
}

function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof ValidationError || e instanceof NotFoundError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

function invalid(message: string): Outcome<never, ValidationError> {
  return { ok: false, error: new ValidationError(message) };
}

export class PollService {
  readonly candidates: CandidateStore;
  readonly votes: VoteStore;
  readonly merge: MergeEngine;
  readonly timeZone: string;

  constructor(
    readonly backend: TableBackend,
    options: PollOptions = {},
  ) {
    this.timeZone = options.timeZone ?? "Asia/Tokyo";
    this.candidates = new CandidateStore(backend, {
      generateId: options.generateId,
    });
    this.votes = new VoteStore(backend, this.candidates, {
      timeZone: this.timeZone,
      uniqueVoter: options.uniqueVoter,
      now: options.now,
    });
    this.merge = new MergeEngine(backend, this.candidates, this.votes);
  }

  static fromConfig(config: PollConfig): PollService {
    return new PollService(openBackend(config), {
      timeZone: config.timeZone,
      uniqueVoter: config.uniqueVoter,
    });
  }

  // ---------- Voting ----------

  listCandidates(activeOnly = false): Candidate[] {
    const candidates = this.candidates.load();
    return activeOnly ? candidates.filter((c) => c.active) : candidates;
  }

  submitVote(ballot: Ballot): Outcome<Vote, ValidationError> {
    const voterName = ballot.voterName.trim();
    const voterIdentity = ballot.voterIdentity.trim();
    if (!voterName || !voterIdentity) {
      return invalid("Voter name and identity are required");
    }

    const ranks = RANK_FIELDS.map((f) => ballot[f]);
    if (ranks.some((id) => !id)) {
      return invalid("All three ranks must be chosen");
    }
    if (!hasDistinctRanks(ballot)) {
      return invalid("The same candidate cannot be ranked twice");
    }

    const active = new Set(this.listCandidates(true).map((c) => c.id));
    const unknown = ranks.find((id) => id !== null && !active.has(id));
    if (unknown) {
      return invalid(`Unknown or inactive candidate: ${unknown}`);
    }

    try {
      const vote = this.votes.append({ ...ballot, voterName, voterIdentity });
      return { ok: true, value: vote };
    } catch (e) {
      if (e instanceof ValidationError) return { ok: false, error: e };
      throw e;
    }
  }

  // ---------- Results ----------

  getRanking(includeInactive = true): RankedEntry[] {
    const candidates = this.candidates.load();
    return aggregate(candidates, this.votes.load(candidates), includeInactive);
  }

  listVotesDetailed(): DetailedVote[] {
    const candidates = this.candidates.load();
    const map = new CandidateMap(candidates);
    return this.votes.load(candidates).map((vote) => ({
      ...vote,
      first: map.labelFor(vote.firstId),
      second: map.labelFor(vote.secondId),
      third: map.labelFor(vote.thirdId),
    }));
  }

  exportRankingCsv(includeInactive = true): string {
    return rankingToCsv(this.getRanking(includeInactive));
  }

  exportVotesCsv(): string {
    return votesToCsv(this.listVotesDetailed(), this.timeZone);
  }

  buildWorkbook(includeInactive = true): Workbook {
    return buildExportWorkbook(
      this.getRanking(includeInactive),
      this.listVotesDetailed(),
      this.timeZone,
    );
  }

  async writeWorkbook(path: string, includeInactive = true): Promise<void> {
    await writeWorkbook(path, this.buildWorkbook(includeInactive));
  }

  // ---------- Candidate maintenance ----------

  addOrMergeCandidate(label: string, makeActive = true): Outcome<MergeResult> {
    return attempt(() => this.merge.upsertCandidate(label, makeActive));
  }

  renameOrMergeCandidate(
    id: CandidateId,
    label: string,
    active: boolean,
  ): Outcome<MergeResult> {
    return attempt(() => this.merge.renameCandidate(id, label, active));
  }

  deleteCandidate(id: CandidateId): Outcome<Candidate> {
    return attempt(() => this.merge.deleteCandidate(id));
  }

  toggleActive(id: CandidateId): Outcome<Candidate> {
    return attempt(() => this.merge.toggleActive(id));
  }

  /** Destroys every ballot. */
  resetAllVotes(): void {
    this.votes.clearAll();
  }

  close(): void {
    this.backend.close();
  }
}
