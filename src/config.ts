import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { z } from "zod";

const schema = z.object({
  CODEPOST_API_KEY: z.string().min(1),
  SLACK_TOKEN: z.string().min(1),
  DECRYPTION_KEY: z.string().min(1),
  CODEPOST_BASE_URL: z.string().url().default("https://api.codepost.io"),
  SLACK_BASE_URL: z.string().url().default("https://slack.com/api"),
  CONFIG_PATH: z.string().default("config.yaml"),
  DATA_DIR: z.string().default("./data"),
  ERROR_LOG_PATH: z.string().optional(),
  CONFIG_TIMEZONE: z.string().default("America/New_York"),
  CRON_SCHEDULE: z.string().optional(),
  FIRESTORE_COLLECTION: z.string().default("grading_snapshots"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export type AppConfig = z.infer<typeof schema> & { ERROR_LOG_PATH: string };

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join(", ")}`);
    this.name = "ConfigError";
  }
}

// Empty strings count as unset, the way CI secrets arrive when missing
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

const credentialsSchema = schema.pick({
  CODEPOST_API_KEY: true,
  SLACK_TOKEN: true,
  CODEPOST_BASE_URL: true,
  SLACK_BASE_URL: true,
  CONFIG_PATH: true,
  CONFIG_TIMEZONE: true,
});

export type CredentialsConfig = z.infer<typeof credentialsSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map((e) =>
    e.message === "Required"
      ? `Environment variable "${e.path.join(".")}" could not be found`
      : `${e.path.join(".")}: ${e.message}`,
  );
}

// What config validation needs: no snapshot key, no storage
export function parseCredentials(env: NodeJS.ProcessEnv): CredentialsConfig {
  const parsed = credentialsSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error));
  return parsed.data;
}

export function parseAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    // Name the variables, never their values
    throw new ConfigError(describeIssues(parsed.error));
  }
  return {
    ...parsed.data,
    ERROR_LOG_PATH: parsed.data.ERROR_LOG_PATH ?? path.join(parsed.data.DATA_DIR, "ERRORS.txt"),
  };
}

export function loadAppConfig(): AppConfig {
  loadDotenv();
  return parseAppConfig(process.env);
}
