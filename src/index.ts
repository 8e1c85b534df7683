#!/usr/bin/env node
import cron from "node-cron";
import path from "node:path";
import { ConfigError, loadAppConfig, type AppConfig } from "./config.js";
import { FernetCipher, InvalidKeyError } from "./fernet.js";
import { connectFirestore } from "./firebase.js";
import { GradingClient } from "./grading.js";
import { runMonitorOnce, type MonitorDeps, type RunSummary } from "./monitor.js";
import { SlackClient } from "./slack.js";
import { appendErrors, FileSnapshotStore, FirestoreSnapshotStore, type SnapshotStore } from "./store.js";
import { errorMessage, formatError } from "./utils.js";

function buildStore(app: AppConfig, cipher: FernetCipher): SnapshotStore {
  const firestore = connectFirestore({
    serviceAccountJson: app.FIREBASE_SERVICE_ACCOUNT_JSON,
    credentialsPath: app.GOOGLE_APPLICATION_CREDENTIALS,
  });
  if (firestore) {
    console.log(`[BOT] Storing snapshots in Firestore collection ${app.FIRESTORE_COLLECTION}`);
    return new FirestoreSnapshotStore(firestore.collection(app.FIRESTORE_COLLECTION), cipher);
  }
  console.log(`[BOT] Storing snapshots in ${path.resolve(app.DATA_DIR)}`);
  return new FileSnapshotStore(app.DATA_DIR, cipher);
}

function buildDeps(app: AppConfig): MonitorDeps {
  const cipher = new FernetCipher(app.DECRYPTION_KEY);
  return {
    grading: new GradingClient(app.CODEPOST_API_KEY, { baseURL: app.CODEPOST_BASE_URL }),
    slack: new SlackClient(app.SLACK_TOKEN, { baseURL: app.SLACK_BASE_URL }),
    store: buildStore(app, cipher),
    configPath: app.CONFIG_PATH,
    errorLogPath: app.ERROR_LOG_PATH,
    timezone: app.CONFIG_TIMEZONE,
  };
}

async function runLogged(deps: MonitorDeps): Promise<RunSummary> {
  try {
    const summary = await runMonitorOnce(deps);
    console.log(
      `[BOT] Run ${summary.status}: ${summary.saved.length} course(s) saved, ${summary.errors.length} error(s)`,
    );
    return summary;
  } catch (err) {
    await appendErrors(deps.errorLogPath, [formatError(`Uncaught error: ${errorMessage(err)}`)]);
    throw err;
  }
}

async function main(): Promise<void> {
  let app: AppConfig;
  let deps: MonitorDeps;
  try {
    app = loadAppConfig();
    deps = buildDeps(app);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof InvalidKeyError) {
      const logPath = process.env.ERROR_LOG_PATH || path.join(process.env.DATA_DIR || "./data", "ERRORS.txt");
      const problems = err instanceof ConfigError ? err.problems : [err.message];
      await appendErrors(logPath, problems.map((p) => formatError(p)));
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const schedule = app.CRON_SCHEDULE;
  if (!schedule) {
    const summary = await runLogged(deps);
    if (summary.status === "aborted") process.exitCode = 1;
    return;
  }

  if (!cron.validate(schedule)) {
    throw new Error(`Invalid CRON_SCHEDULE: ${schedule}`);
  }
  console.log(`[BOT] Grading monitor starting. Schedule: ${schedule}`);

  // One run at a time: snapshots are read-modify-written without locking
  let running = false;
  const tick = async (): Promise<void> => {
    if (running) {
      console.log("[BOT] Previous run still in progress, skipping");
      return;
    }
    running = true;
    try {
      await runLogged(deps);
    } catch (err) {
      console.error("[BOT] Run error:", errorMessage(err));
    } finally {
      running = false;
    }
  };

  await tick();
  cron.schedule(schedule, () => {
    void tick();
  });
}

main().catch((e) => {
  console.error("[BOT] Fatal:", e);
  process.exit(1);
});
