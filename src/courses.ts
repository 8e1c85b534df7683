import fs from "node:fs";
import { DateTime } from "luxon";
import pLimit from "p-limit";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SlackApiError } from "./slack.js";
import type { AssignmentConfig, CourseConfig, MessageTemplates, MonitorConfig, SlackErrorResponse } from "./types.js";
import { courseKey, slugify } from "./utils.js";

export const DEFAULT_MESSAGES: MessageTemplates = {
  notification:
    "*{assignment}*: {done:.2%} done ({finalized} finalized, {drafts} drafts, {unclaimed} left to grade)",
  recentGraders: "Graders who recently finalized: {graders}",
  deadline: "*{assignment}*: All submissions should now be finalized ({deadline} deadline)",
};

const DATE_FMT = "yyyy-MM-dd";
const DEADLINE_FMT = "yyyy-MM-dd HH:mm";

const fileSchema = z.object({
  channels: z.record(z.unknown()),
  messages: z
    .object({
      notification: z.string().optional(),
      recent_graders: z.string().optional(),
      deadline: z.string().optional(),
    })
    .optional(),
  grader_ignore_prefix: z.string().optional(),
  sources: z.array(z.unknown()),
});

const assignmentSchema = z.object({
  name: z.string(),
  start: z.string().optional(),
  end: z.string().optional(),
  deadline: z.string().optional(),
});

const sourceSchema = z.object({
  course: z.string(),
  period: z.string(),
  channel: z.string(),
  assignments: z.array(z.unknown()),
});

export interface ReadOptions {
  now?: DateTime;
  timezone?: string;
}

export interface ReadResult {
  config: MonitorConfig | null;
  errors: string[];
}

export function validDateRange(start: DateTime | null, end: DateTime | null, now: DateTime): boolean {
  if (start && now < start) return false;
  if (end && now >= end) return false;
  return true;
}

function parseAssignment(
  raw: unknown,
  invalidMsg: string,
  now: DateTime,
  zone: string,
): { assignment: AssignmentConfig } | { error: string } {
  const parsed = assignmentSchema.safeParse(raw);
  if (!parsed.success) return { error: invalidMsg };
  const { name, start, end, deadline } = parsed.data;

  const day = (value: string | undefined): DateTime | null | undefined => {
    if (value === undefined) return null;
    const date = DateTime.fromFormat(value.trim(), DATE_FMT, { zone });
    return date.isValid ? date : undefined;
  };

  const startDate = day(start);
  const endDay = day(end);
  if (startDate === undefined || endDay === undefined) {
    return { error: `${invalidMsg}: invalid date format` };
  }
  // the end date is inclusive
  const endDate = endDay ? endDay.plus({ days: 1 }) : null;

  let deadlineDate: DateTime | null = null;
  if (deadline !== undefined) {
    deadlineDate = DateTime.fromFormat(deadline.trim(), DEADLINE_FMT, { zone });
    if (!deadlineDate.isValid) return { error: `${invalidMsg}: invalid deadline format` };
  }

  return {
    assignment: {
      name,
      validDateRange: validDateRange(startDate, endDate, now),
      deadline: deadline === undefined ? null : deadline.trim(),
      passedDeadline: deadlineDate !== null && now >= deadlineDate,
    },
  };
}

function parseSource(
  index: number,
  raw: unknown,
  now: DateTime,
  zone: string,
): { course: CourseConfig } | { error: string } {
  const invalidMsg = `Config file has an invalid course format at index ${index}`;
  const parsed = sourceSchema.safeParse(raw);
  if (!parsed.success) return { error: invalidMsg };

  const assignments: AssignmentConfig[] = [];
  for (const [j, rawAssignment] of parsed.data.assignments.entries()) {
    const result = parseAssignment(rawAssignment, `${invalidMsg}, assignment index ${j}`, now, zone);
    if ("error" in result) return result;
    assignments.push(result.assignment);
  }

  const { course, period, channel } = parsed.data;
  return { course: { course, period, channel, assignments } };
}

/**
 * Parses and validates the YAML config. Date windows and deadlines are
 * evaluated once, against `now`.
 */
export function parseMonitorConfig(text: string, options: ReadOptions = {}): ReadResult {
  const zone = options.timezone ?? "America/New_York";
  const now = options.now ?? DateTime.utc();
  const errors: string[] = [];
  const invalid = (): ReadResult => ({ config: null, errors });

  if (!DateTime.local().setZone(zone).isValid) {
    errors.push(`Unknown timezone "${zone}"`);
    return invalid();
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch {
    errors.push("Config file is not valid YAML");
    return invalid();
  }

  const file = fileSchema.safeParse(raw);
  if (!file.success) {
    errors.push("Config file has an invalid format");
    return invalid();
  }

  const channels: Record<string, string> = {};
  for (const [channel, id] of Object.entries(file.data.channels)) {
    if (typeof id !== "string") {
      errors.push(`Config file has an invalid channel id for channel "${channel}" (expected str)`);
      continue;
    }
    channels[channel] = id;
  }

  const courses: Record<string, CourseConfig> = {};
  // snapshots are stored under the slug, so it must be unique too
  const slugs = new Map<string, string>();
  for (const [i, rawSource] of file.data.sources.entries()) {
    const result = parseSource(i, rawSource, now, zone);
    if ("error" in result) {
      errors.push(result.error);
      continue;
    }
    const { course } = result;
    const key = courseKey(course.course, course.period);
    if (key in courses) {
      errors.push(`Config file has a repeating course name and period "${key}"`);
      continue;
    }
    const slug = slugify(key);
    const clash = slugs.get(slug);
    if (clash !== undefined) {
      errors.push(`Config file has courses "${clash}" and "${key}" that would share the snapshot "${slug}"`);
      continue;
    }
    if (!(course.channel in channels)) {
      errors.push(`Config file has unknown channel name "${course.channel}" for course "${key}"`);
      continue;
    }
    courses[key] = course;
    slugs.set(slug, key);
  }

  if (errors.length > 0) return invalid();

  const messages = file.data.messages ?? {};
  return {
    config: {
      channels,
      courses,
      messages: {
        notification: messages.notification ?? DEFAULT_MESSAGES.notification,
        recentGraders: messages.recent_graders ?? DEFAULT_MESSAGES.recentGraders,
        deadline: messages.deadline ?? DEFAULT_MESSAGES.deadline,
      },
      graderIgnorePrefix: file.data.grader_ignore_prefix ?? null,
    },
    errors,
  };
}

export function readMonitorConfig(configPath: string, options: ReadOptions = {}): ReadResult {
  if (!fs.existsSync(configPath)) {
    return { config: null, errors: [`Config file "${configPath}" does not exist`] };
  }
  return parseMonitorConfig(fs.readFileSync(configPath, "utf8"), options);
}

export interface ChannelChecker {
  checkChannel(channelId: string): Promise<SlackErrorResponse | null>;
}

/**
 * Checks every channel id against Slack. Unknown and inaccessible channels
 * become errors; any other Slack error is thrown.
 */
export async function validateChannels(
  slack: ChannelChecker,
  channels: Record<string, string>,
  concurrency = 4,
): Promise<string[]> {
  const limit = pLimit(concurrency);
  const results = await Promise.all(
    Object.entries(channels).map(([channel, id]) =>
      limit(async () => {
        const error = await slack.checkChannel(id);
        if (!error) return null;
        if (error.error === "invalid_channel") return `Invalid id for Slack channel "${channel}"`;
        if (error.error === "not_in_channel") return `Slack key does not have access to channel "${channel}"`;
        throw new SlackApiError(error);
      }),
    ),
  );
  return results.filter((r): r is string => r !== null);
}
