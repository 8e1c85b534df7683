import { DateTime } from "luxon";
import { readMonitorConfig, validateChannels, type ChannelChecker } from "./courses.js";
import { buildDeadlineMessage, buildProgressMessage } from "./messages.js";
import {
  appendErrors,
  readSnapshots,
  SnapshotDecryptError,
  SnapshotFormatError,
  writeSnapshots,
  type SnapshotStore,
} from "./store.js";
import { trackAssignment } from "./tracker.js";
import type {
  CourseAggregate,
  CourseCache,
  CourseConfig,
  GradingApi,
  LiveCourse,
  Messenger,
  MonitorConfig,
} from "./types.js";
import { errorMessage, formatError, nowLabel } from "./utils.js";

export type Clock = () => DateTime;

const utcClock: Clock = () => DateTime.utc();

export interface ReconcileInput {
  grading: GradingApi;
  messenger: Messenger;
  config: MonitorConfig;
  cache: CourseCache;
  now?: Clock;
}

export interface ReconcileResult {
  // only the courses that changed
  data: CourseCache;
  anyChanged: boolean;
  errors: string[];
}

interface CourseRun {
  key: string;
  course: CourseConfig;
  live: LiveCourse;
  channelId: string;
  prior: CourseAggregate;
}

/**
 * Builds a message and posts it. Build and delivery failures are recorded
 * in `errors`; transport failures propagate.
 */
async function deliver(
  messenger: Messenger,
  channelId: string,
  build: () => string,
  describe: string,
  errors: string[],
  clock: Clock,
): Promise<boolean> {
  let text: string;
  try {
    text = build();
  } catch (err) {
    errors.push(formatError(`Could not build ${describe}: ${errorMessage(err)}`, clock()));
    return false;
  }
  const { error } = await messenger.postMessage(channelId, text, { asBlock: true });
  if (error) {
    errors.push(formatError(`Slack API error: ${error.error}`, clock()));
    return false;
  }
  return true;
}

async function reconcileCourse(
  input: ReconcileInput,
  run: CourseRun,
  clock: Clock,
): Promise<{ changed: boolean; data: CourseAggregate; errors: string[] }> {
  const { grading, messenger, config } = input;
  const errors: string[] = [];
  // skipped assignments keep their history in the rewritten document
  const data: CourseAggregate = { ...run.prior };
  let changed = false;

  const liveAssignments = new Map<string, number>();
  for (const a of run.live.assignments) {
    if (!liveAssignments.has(a.name)) liveAssignments.set(a.name, a.id);
  }

  for (const assignment of run.course.assignments) {
    if (!assignment.validDateRange) continue;

    const assignmentId = liveAssignments.get(assignment.name);
    if (assignmentId === undefined) {
      errors.push(formatError(`Course "${run.key}" does not have an assignment called "${assignment.name}"`, clock()));
      continue;
    }

    console.log(`[RUN] Processing assignment ${assignment.name}`);
    const submissions = await grading.listSubmissions(assignmentId);
    const result = trackAssignment(submissions, nowLabel(clock()), run.prior[assignment.name] ?? null, {
      ignoreGraderPrefix: config.graderIgnorePrefix,
    });
    const aggregate = result.aggregate;
    data[assignment.name] = aggregate;
    if (result.dataChanged) changed = true;

    const { deadline } = assignment;
    if (deadline !== null && assignment.passedDeadline && aggregate.sent_deadline_message === null) {
      console.log(`[RUN] Deadline passed for ${assignment.name}: sending deadline message`);
      const sent = await deliver(
        messenger,
        run.channelId,
        () => buildDeadlineMessage(config.messages, assignment.name, deadline),
        `deadline message for "${assignment.name}"`,
        errors,
        clock,
      );
      if (sent) {
        aggregate.sent_deadline_message = nowLabel(clock());
        changed = true;
      }
    }

    if (result.shouldNotify) {
      console.log(`[RUN] ${assignment.name} changed: sending notification`);
      await deliver(
        messenger,
        run.channelId,
        () => buildProgressMessage(config.messages, assignment.name, aggregate, result.gradersFinalized),
        `notification for "${assignment.name}"`,
        errors,
        clock,
      );
    }
  }

  return { changed, data, errors };
}

/**
 * One pass over every configured course. Per-course and per-assignment
 * problems are collected as error strings and never stop the pass.
 */
export async function reconcileCourses(input: ReconcileInput): Promise<ReconcileResult> {
  const clock = input.now ?? utcClock;
  const data: CourseCache = {};
  const errors: string[] = [];

  for (const [key, course] of Object.entries(input.config.courses)) {
    console.log(`[RUN] Processing course ${key}`);
    const matches = await input.grading.listCourses(course.course, course.period);
    if (matches.length === 0) {
      errors.push(formatError(`Course "${course.course}" with period "${course.period}" could not be found`, clock()));
      continue;
    }
    const channelId = input.config.channels[course.channel];
    if (channelId === undefined) {
      errors.push(formatError(`Unknown channel name "${course.channel}" for course "${key}"`, clock()));
      continue;
    }

    // take the first course if there are duplicates
    const result = await reconcileCourse(
      input,
      { key, course, live: matches[0], channelId, prior: input.cache[key] ?? {} },
      clock,
    );
    errors.push(...result.errors);
    if (result.changed) data[key] = result.data;
  }

  return { data, anyChanged: Object.keys(data).length > 0, errors };
}

export interface GradingService extends GradingApi {
  validateApiKey(): Promise<boolean>;
}

export interface SlackService extends Messenger, ChannelChecker {
  checkAuth(): Promise<boolean>;
}

export interface MonitorDeps {
  grading: GradingService;
  slack: SlackService;
  store: SnapshotStore;
  configPath: string;
  errorLogPath: string;
  timezone?: string;
  now?: Clock;
}

export interface RunSummary {
  status: "completed" | "aborted";
  errors: string[];
  saved: string[];
}

/**
 * A full run: credentials, config, snapshots, reconciliation, persistence.
 * Fatal problems end the run early and are written to the error log.
 */
export async function runMonitorOnce(deps: MonitorDeps): Promise<RunSummary> {
  const clock = deps.now ?? utcClock;
  const abort = async (messages: string[]): Promise<RunSummary> => {
    const errors = messages.map((m) => formatError(m, clock()));
    await appendErrors(deps.errorLogPath, errors);
    return { status: "aborted", errors, saved: [] };
  };

  const credentialErrors: string[] = [];
  if (!(await deps.grading.validateApiKey())) credentialErrors.push("codePost API key is invalid");
  if (!(await deps.slack.checkAuth())) credentialErrors.push("Slack API token is invalid");
  if (credentialErrors.length > 0) return abort(credentialErrors);

  const { config, errors: configErrors } = readMonitorConfig(deps.configPath, {
    now: clock(),
    timezone: deps.timezone,
  });
  if (!config) return abort(configErrors);

  const channelErrors = await validateChannels(deps.slack, config.channels);
  if (channelErrors.length > 0) return abort(channelErrors);

  let cache: CourseCache;
  try {
    cache = await readSnapshots(deps.store, Object.keys(config.courses));
  } catch (err) {
    if (err instanceof SnapshotDecryptError || err instanceof SnapshotFormatError) {
      return abort([err.message]);
    }
    throw err;
  }

  const result = await reconcileCourses({
    grading: deps.grading,
    messenger: deps.slack,
    config,
    cache,
    now: clock,
  });
  await appendErrors(deps.errorLogPath, result.errors);

  if (result.anyChanged) {
    await writeSnapshots(deps.store, result.data);
  } else {
    console.log("[RUN] No changes to save");
  }

  return { status: "completed", errors: result.errors, saved: Object.keys(result.data) };
}
