import type {
  AssignmentAggregate,
  LiveSubmission,
  RunLog,
  SubmissionHistory,
  SubmissionStatus,
} from "./types.js";
import { maxRunIndex, parseRunIndex } from "./utils.js";

export const UNKNOWN_STATUS: Readonly<SubmissionStatus> = { status: "unknown", grader: "unknown" };

const COUNT_KEYS = ["total", "finalized", "drafts", "unclaimed"] as const;

export interface TrackOptions {
  // drafts by graders with this prefix are recorded but not counted
  ignoreGraderPrefix?: string | null;
}

export interface TrackResult {
  dataChanged: boolean;
  shouldNotify: boolean;
  aggregate: AssignmentAggregate;
  gradersFinalized: string[];
}

interface RunTally {
  total: number;
  finalized: number;
  drafts: number;
  unclaimed: number;
  updatedStatus: boolean;
  gradersFinalized: Set<string>;
}

export function emptyAggregate(): AssignmentAggregate {
  return {
    total: 0,
    finalized: 0,
    drafts: 0,
    unclaimed: 0,
    runs: {},
    submissions: {},
    sent_deadline_message: null,
  };
}

/**
 * Status stored at the highest run index of one submission's history, or
 * the `unknown` sentinel when nothing has been recorded for it yet.
 */
export function lastRecordedStatus(history: Record<string, SubmissionStatus> | undefined): SubmissionStatus {
  let latest: number | null = null;
  let status: SubmissionStatus | null = null;
  for (const [key, value] of Object.entries(history ?? {})) {
    const index = parseRunIndex(key);
    if (index === null) continue;
    if (latest === null || index > latest) {
      latest = index;
      status = value;
    }
  }
  return status ? { ...status } : { ...UNKNOWN_STATUS };
}

/**
 * Index for the next history write: one past the highest index present in
 * either the run log or any submission's history.
 */
export function nextRunIndex(aggregate: Pick<AssignmentAggregate, "runs" | "submissions"> | null): number {
  if (!aggregate) return 1;
  let max = maxRunIndex(Object.keys(aggregate.runs)) ?? 0;
  for (const history of Object.values(aggregate.submissions)) {
    max = Math.max(max, maxRunIndex(Object.keys(history)) ?? 0);
  }
  return max + 1;
}

function sameStatus(a: SubmissionStatus, b: SubmissionStatus): boolean {
  return a.status === b.status && a.grader === b.grader;
}

function copyHistory(history: SubmissionHistory): SubmissionHistory {
  const copy: SubmissionHistory = {};
  for (const [id, entries] of Object.entries(history)) {
    copy[id] = {};
    for (const [run, status] of Object.entries(entries)) {
      copy[id][run] = { ...status };
    }
  }
  return copy;
}

function classify(submission: LiveSubmission, ignorePrefix: string | null): { record: SubmissionStatus; counted: boolean } {
  if (submission.isFinalized) {
    return { record: { status: "finalized", grader: submission.grader }, counted: true };
  }
  if (submission.grader !== null) {
    const ignored = ignorePrefix !== null && ignorePrefix !== "" && submission.grader.startsWith(ignorePrefix);
    return { record: { status: "draft", grader: submission.grader }, counted: !ignored };
  }
  return { record: { status: "unclaimed", grader: null }, counted: true };
}

function tally(tallied: RunTally, record: SubmissionStatus): void {
  tallied.total += 1;
  if (record.status === "finalized") tallied.finalized += 1;
  else if (record.status === "draft") tallied.drafts += 1;
  else tallied.unclaimed += 1;
}

/**
 * Merges one poll of an assignment's submissions into its history.
 *
 * A status is appended at the next run index only when it differs from the
 * submission's last recorded status; submissions missing from the poll are
 * marked deleted once. The run log gets an entry only if something was
 * written. The prior aggregate is left untouched.
 */
export function trackAssignment(
  live: readonly LiveSubmission[],
  timestampLabel: string,
  prior: AssignmentAggregate | null,
  options: TrackOptions = {},
): TrackResult {
  const ignorePrefix = options.ignoreGraderPrefix ?? null;
  const submissions = prior ? copyHistory(prior.submissions) : {};
  const runs: RunLog = prior ? { ...prior.runs } : {};
  const runKey = String(nextRunIndex(prior));

  const pendingDeletions = new Set(Object.keys(submissions));
  const run: RunTally = {
    total: 0,
    finalized: 0,
    drafts: 0,
    unclaimed: 0,
    updatedStatus: false,
    gradersFinalized: new Set(),
  };

  for (const submission of live) {
    const id = String(submission.id);
    pendingDeletions.delete(id);

    const last = lastRecordedStatus(submissions[id]);
    const { record, counted } = classify(submission, ignorePrefix);
    if (counted) tally(run, record);

    if (record.status === "finalized" && last.status !== "finalized" && record.grader !== null) {
      run.gradersFinalized.add(record.grader);
    }

    if (sameStatus(record, last)) continue;

    submissions[id] = { ...submissions[id], [runKey]: record };
    run.updatedStatus = true;
  }

  for (const id of pendingDeletions) {
    const last = lastRecordedStatus(submissions[id]);
    if (last.status === "deleted" && last.grader === null) continue;
    submissions[id] = { ...submissions[id], [runKey]: { status: "deleted", grader: null } };
    run.updatedStatus = true;
  }

  if (run.updatedStatus) {
    runs[runKey] = timestampLabel;
  }

  const aggregate: AssignmentAggregate = {
    total: run.total,
    finalized: run.finalized,
    drafts: run.drafts,
    unclaimed: run.unclaimed,
    runs,
    submissions,
    sent_deadline_message: prior?.sent_deadline_message ?? null,
  };

  const countsChanged = prior !== null && COUNT_KEYS.some((key) => prior[key] !== aggregate[key]);
  const dataChanged = prior === null || run.updatedStatus || countsChanged;
  const shouldNotify = dataChanged && aggregate.total > 0 && aggregate.finalized > 0;

  return {
    dataChanged,
    shouldNotify,
    aggregate,
    gradersFinalized: [...run.gradersFinalized].sort(),
  };
}
