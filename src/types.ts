export type SubmissionState = "unclaimed" | "draft" | "finalized" | "deleted" | "unknown";

export interface SubmissionStatus {
  status: SubmissionState;
  grader: string | null;
}

// run index (stringified) -> timestamp label
export type RunLog = Record<string, string>;

// submission id -> run index -> status
export type SubmissionHistory = Record<string, Record<string, SubmissionStatus>>;

export interface AssignmentAggregate {
  total: number;
  finalized: number;
  drafts: number;
  unclaimed: number;
  runs: RunLog;
  submissions: SubmissionHistory;
  sent_deadline_message: string | null;
}

// assignment name -> aggregate
export type CourseAggregate = Record<string, AssignmentAggregate>;

// "<course> <period>" -> aggregate
export type CourseCache = Record<string, CourseAggregate>;

export interface LiveSubmission {
  id: number | string;
  isFinalized: boolean;
  grader: string | null;
}

export interface LiveAssignment {
  id: number;
  name: string;
}

export interface LiveCourse {
  id: number;
  name: string;
  period: string;
  assignments: LiveAssignment[];
}

export interface AssignmentConfig {
  name: string;
  validDateRange: boolean;
  deadline: string | null;
  passedDeadline: boolean;
}

export interface CourseConfig {
  course: string;
  period: string;
  channel: string;
  assignments: AssignmentConfig[];
}

export interface MessageTemplates {
  notification: string;
  recentGraders: string;
  deadline: string;
}

export interface MonitorConfig {
  channels: Record<string, string>;
  // keyed by "<course> <period>"
  courses: Record<string, CourseConfig>;
  messages: MessageTemplates;
  graderIgnorePrefix: string | null;
}

export interface SlackErrorResponse {
  ok: false;
  error: string;
  [key: string]: unknown;
}

export interface PostMessageResult {
  response: Record<string, unknown> | null;
  error: SlackErrorResponse | null;
}

export interface GradingApi {
  listCourses(name: string, period: string): Promise<LiveCourse[]>;
  listSubmissions(assignmentId: number): Promise<LiveSubmission[]>;
}

export interface Messenger {
  postMessage(channelId: string, text: string, options?: { asBlock?: boolean }): Promise<PostMessageResult>;
}
