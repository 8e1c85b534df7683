#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { ConfigError, parseCredentials, type CredentialsConfig } from "./config.js";
import { readMonitorConfig, validateChannels } from "./courses.js";
import { GradingClient } from "./grading.js";
import type { SlackService } from "./monitor.js";
import { SlackClient } from "./slack.js";
import type { LiveAssignment } from "./types.js";
import { courseKey } from "./utils.js";

export interface CourseDirectory {
  validateApiKey(): Promise<boolean>;
  listAllCourses(): Promise<Array<{ id: number; name: string; period: string; assignmentIds: number[] }>>;
  getAssignment(assignmentId: number): Promise<LiveAssignment>;
}

export interface ValidateDeps {
  grading: CourseDirectory;
  slack: SlackService;
  configPath: string;
  timezone?: string;
  log?: (line: string) => void;
}

/**
 * Checks credentials, the config file, the Slack channels, and that every
 * configured course and assignment exists in codePost.
 */
export async function validateConfig(deps: ValidateDeps): Promise<boolean> {
  const log = deps.log ?? ((line: string) => console.log(line));

  let failed = false;
  if (!(await deps.grading.validateApiKey())) {
    log("codePost API key is invalid");
    failed = true;
  }
  if (!(await deps.slack.checkAuth())) {
    log("Slack API token is invalid");
    failed = true;
  }
  if (failed) return false;

  const { config, errors } = readMonitorConfig(deps.configPath, { timezone: deps.timezone });
  errors.forEach(log);
  if (!config) return false;

  const channelErrors = await validateChannels(deps.slack, config.channels);
  channelErrors.forEach(log);
  if (channelErrors.length > 0) return false;

  const live = new Map<string, number[]>();
  const repeated = new Set<string>();
  for (const course of await deps.grading.listAllCourses()) {
    const key = courseKey(course.name, course.period);
    if (!live.has(key)) {
      // the first one wins, as in a run
      live.set(key, course.assignmentIds);
    } else if (!repeated.has(key)) {
      log(`Warning: there are multiple courses with the name "${course.name}" and period "${course.period}"`);
      repeated.add(key);
    }
  }

  for (const [key, course] of Object.entries(config.courses)) {
    const assignmentIds = live.get(key);
    if (!assignmentIds) {
      log(`Course "${key}" could not be found`);
      failed = true;
      continue;
    }
    const names = new Set<string>();
    for (const id of assignmentIds) {
      names.add((await deps.grading.getAssignment(id)).name);
    }
    for (const assignment of course.assignments) {
      if (!names.has(assignment.name)) {
        log(`Course "${key}" does not have an assignment "${assignment.name}"`);
        failed = true;
      }
    }
  }

  if (!failed) log("Passed");
  return !failed;
}

async function main(): Promise<number> {
  loadDotenv();
  let credentials: CredentialsConfig;
  try {
    credentials = parseCredentials(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      err.problems.forEach((p) => console.log(p));
      return 1;
    }
    throw err;
  }

  const ok = await validateConfig({
    grading: new GradingClient(credentials.CODEPOST_API_KEY, { baseURL: credentials.CODEPOST_BASE_URL }),
    slack: new SlackClient(credentials.SLACK_TOKEN, { baseURL: credentials.SLACK_BASE_URL }),
    configPath: credentials.CONFIG_PATH,
    timezone: credentials.CONFIG_TIMEZONE,
  });
  return ok ? 0 : 1;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error("[VALIDATE] Fatal:", err);
      process.exit(1);
    });
}
