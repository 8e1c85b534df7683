import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DateTime } from "luxon";
import { DEFAULT_MESSAGES, parseMonitorConfig, readMonitorConfig, validateChannels, validDateRange } from "./courses.js";
import { SlackApiError } from "./slack.js";
import type { SlackErrorResponse } from "./types.js";

const now = DateTime.fromISO("2023-02-12T12:00:00Z", { zone: "utc" });

const CONFIG = `
channels:
  '#126-grading': 'C0000000001'
  '#226-grading': 'C0000000002'

sources:
  - course: 'COS126'
    period: 'S2023'
    channel: '#126-grading'
    assignments:
      - name: 'Hello'
        start: '2023-02-07'
        end: '2023-02-15'
        deadline: '2023-02-10 23:59'
      - name: 'Loops'
        start: '2023-02-14'
        end: '2023-02-22'
        deadline: '2023-02-17 23:59'
      - name: 'NBody'
  - course: 'COS226'
    period: 'S2023'
    channel: '#226-grading'
    assignments:
      - name: 'Percolation'
        end: '2023-02-11'
      - name: 'Queues'
        end: '2023-02-12'
`;

describe("validDateRange", () => {
  const start = DateTime.fromISO("2023-02-07T05:00:00Z");
  const end = DateTime.fromISO("2023-02-16T05:00:00Z");

  it("treats missing bounds as open", () => {
    expect(validDateRange(null, null, now)).toBe(true);
    expect(validDateRange(start, null, now)).toBe(true);
    expect(validDateRange(null, end, now)).toBe(true);
  });

  it("includes the start and excludes the end", () => {
    expect(validDateRange(start, end, start)).toBe(true);
    expect(validDateRange(start, end, end)).toBe(false);
    expect(validDateRange(end, null, now)).toBe(false);
  });
});

describe("parseMonitorConfig", () => {
  it("reads courses, windows and deadlines", () => {
    const { config, errors } = parseMonitorConfig(CONFIG, { now });

    expect(errors).toEqual([]);
    expect(config?.channels).toEqual({ "#126-grading": "C0000000001", "#226-grading": "C0000000002" });
    expect(Object.keys(config?.courses ?? {})).toEqual(["COS126 S2023", "COS226 S2023"]);
    expect(config?.courses["COS126 S2023"].assignments).toEqual([
      { name: "Hello", validDateRange: true, deadline: "2023-02-10 23:59", passedDeadline: true },
      { name: "Loops", validDateRange: false, deadline: "2023-02-17 23:59", passedDeadline: false },
      { name: "NBody", validDateRange: true, deadline: null, passedDeadline: false },
    ]);
  });

  it("keeps the end date inclusive in the configured timezone", () => {
    const { config } = parseMonitorConfig(CONFIG, { now });
    const [percolation, queues] = config?.courses["COS226 S2023"].assignments ?? [];

    expect(percolation.validDateRange).toBe(false);
    expect(queues.validDateRange).toBe(true);
  });

  it("uses default messages unless overridden", () => {
    expect(parseMonitorConfig(CONFIG, { now }).config?.messages).toEqual(DEFAULT_MESSAGES);

    const custom = `${CONFIG}\nmessages:\n  deadline: '{assignment} is due'\ngrader_ignore_prefix: 'test-'\n`;
    const { config } = parseMonitorConfig(custom, { now });
    expect(config?.messages).toEqual({ ...DEFAULT_MESSAGES, deadline: "{assignment} is due" });
    expect(config?.graderIgnorePrefix).toBe("test-");
  });

  it("rejects a file without channels or sources", () => {
    expect(parseMonitorConfig("sources: []", { now })).toEqual({
      config: null,
      errors: ["Config file has an invalid format"],
    });
    expect(parseMonitorConfig("- just\n- a list", { now }).errors).toEqual(["Config file has an invalid format"]);
  });

  it("reports non-string channel ids", () => {
    const { errors } = parseMonitorConfig("channels:\n  '#a': 12\nsources: []\n", { now });
    expect(errors).toEqual(['Config file has an invalid channel id for channel "#a" (expected str)']);
  });

  it("reports malformed courses and assignments by index", () => {
    const text = `
channels: { '#a': 'C1' }
sources:
  - course: 'COS126'
    period: 'S2023'
    assignments: []
  - course: 'COS226'
    period: 'S2023'
    channel: '#a'
    assignments:
      - name: 'Ok'
      - start: '2023-02-07'
  - course: 'COS217'
    period: 'S2023'
    channel: '#a'
    assignments:
      - name: 'Bad date'
        start: '02/07/2023'
`;
    expect(parseMonitorConfig(text, { now }).errors).toEqual([
      "Config file has an invalid course format at index 0",
      "Config file has an invalid course format at index 1, assignment index 1",
      "Config file has an invalid course format at index 2, assignment index 0: invalid date format",
    ]);
  });

  it("rejects repeated courses and unknown channels", () => {
    const text = `
channels: { '#a': 'C1' }
sources:
  - { course: 'COS126', period: 'S2023', channel: '#a', assignments: [] }
  - { course: 'COS126', period: 'S2023', channel: '#a', assignments: [] }
  - { course: 'COS226', period: 'S2023', channel: '#b', assignments: [] }
`;
    expect(parseMonitorConfig(text, { now }).errors).toEqual([
      'Config file has a repeating course name and period "COS126 S2023"',
      'Config file has unknown channel name "#b" for course "COS226 S2023"',
    ]);
  });

  it("rejects courses whose snapshots would collide", () => {
    const text = `
channels: { '#a': 'C1' }
sources:
  - { course: 'COS 126', period: 'S2023', channel: '#a', assignments: [] }
  - { course: 'COS-126', period: 'S2023', channel: '#a', assignments: [] }
  - { course: 'cos 126', period: 's2023', channel: '#a', assignments: [] }
`;
    expect(parseMonitorConfig(text, { now }).errors).toEqual([
      'Config file has courses "COS 126 S2023" and "COS-126 S2023" that would share the snapshot "cos-126-s2023"',
      'Config file has courses "COS 126 S2023" and "cos 126 s2023" that would share the snapshot "cos-126-s2023"',
    ]);
  });

  it("rejects an unknown timezone", () => {
    expect(parseMonitorConfig(CONFIG, { now, timezone: "Mars/Olympus" }).errors).toEqual([
      'Unknown timezone "Mars/Olympus"',
    ]);
  });
});

describe("readMonitorConfig", () => {
  it("reports a missing file", () => {
    const missing = path.join(os.tmpdir(), "does-not-exist", "config.yaml");
    expect(readMonitorConfig(missing)).toEqual({
      config: null,
      errors: [`Config file "${missing}" does not exist`],
    });
  });

  it("reads from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
    try {
      const file = path.join(dir, "config.yaml");
      fs.writeFileSync(file, CONFIG, "utf8");
      expect(readMonitorConfig(file, { now }).config?.courses["COS126 S2023"].channel).toBe("#126-grading");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("validateChannels", () => {
  const failure = (error: string): SlackErrorResponse => ({ ok: false, error });

  it("reports invalid and inaccessible channels", async () => {
    const responses: Record<string, SlackErrorResponse | null> = {
      C1: null,
      C2: failure("invalid_channel"),
      C3: failure("not_in_channel"),
    };
    const checker = { checkChannel: jest.fn(async (id: string) => responses[id] ?? null) };

    const errors = await validateChannels(checker, { "#ok": "C1", "#gone": "C2", "#private": "C3" });

    expect(errors).toEqual([
      'Invalid id for Slack channel "#gone"',
      'Slack key does not have access to channel "#private"',
    ]);
    expect(checker.checkChannel).toHaveBeenCalledTimes(3);
  });

  it("throws on any other Slack error", async () => {
    const checker = { checkChannel: async () => failure("ratelimited") };
    await expect(validateChannels(checker, { "#a": "C1" })).rejects.toBeInstanceOf(SlackApiError);
  });
});
