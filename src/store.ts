import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { FernetCipher, InvalidTokenError } from "./fernet.js";
import type { CourseAggregate, CourseCache } from "./types.js";
import { slugify } from "./utils.js";

const statusSchema = z.object({
  status: z.enum(["unclaimed", "draft", "finalized", "deleted", "unknown"]),
  grader: z.string().nullable(),
});

const assignmentSchema = z.object({
  total: z.number().int().nonnegative(),
  finalized: z.number().int().nonnegative(),
  drafts: z.number().int().nonnegative(),
  unclaimed: z.number().int().nonnegative(),
  runs: z.record(z.string()).default({}),
  submissions: z.record(z.record(statusSchema)).default({}),
  sent_deadline_message: z.string().nullable().default(null),
});

const courseSchema = z.record(assignmentSchema);

export class SnapshotDecryptError extends Error {
  constructor(readonly courseKey: string) {
    super(`Invalid decryption key for stored data of "${courseKey}"`);
    this.name = "SnapshotDecryptError";
  }
}

export class SnapshotFormatError extends Error {
  constructor(readonly courseKey: string, detail: string) {
    super(`Stored data of "${courseKey}" is malformed: ${detail}`);
    this.name = "SnapshotFormatError";
  }
}

export interface SnapshotStore {
  read(courseKey: string): Promise<CourseAggregate | null>;
  write(courseKey: string, data: CourseAggregate): Promise<void>;
}

export function encodeCourse(cipher: FernetCipher, data: CourseAggregate): string {
  return cipher.encrypt(JSON.stringify(data));
}

export function decodeCourse(cipher: FernetCipher, courseKey: string, token: string): CourseAggregate {
  let plaintext: string;
  try {
    plaintext = cipher.decryptString(token);
  } catch (err) {
    if (err instanceof InvalidTokenError) throw new SnapshotDecryptError(courseKey);
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(plaintext);
  } catch {
    throw new SnapshotFormatError(courseKey, "not JSON");
  }
  const parsed = courseSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new SnapshotFormatError(courseKey, detail);
  }
  return parsed.data;
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(
    private readonly dataDir: string,
    private readonly cipher: FernetCipher,
  ) {}

  pathFor(courseKey: string): string {
    return path.join(this.dataDir, `${slugify(courseKey)}.txt`);
  }

  async read(courseKey: string): Promise<CourseAggregate | null> {
    const p = this.pathFor(courseKey);
    if (!fs.existsSync(p)) return null;
    const token = await fs.promises.readFile(p, "utf8");
    return decodeCourse(this.cipher, courseKey, token);
  }

  async write(courseKey: string, data: CourseAggregate): Promise<void> {
    await fs.promises.mkdir(this.dataDir, { recursive: true });
    await fs.promises.writeFile(this.pathFor(courseKey), encodeCourse(this.cipher, data), "utf8");
  }
}

// Structural slice of a Firestore CollectionReference
export interface SnapshotCollection {
  doc(id: string): {
    get(): Promise<{ exists: boolean; data(): Record<string, unknown> | undefined }>;
    set(data: Record<string, unknown>): Promise<unknown>;
  };
}

export class FirestoreSnapshotStore implements SnapshotStore {
  constructor(
    private readonly collection: SnapshotCollection,
    private readonly cipher: FernetCipher,
  ) {}

  async read(courseKey: string): Promise<CourseAggregate | null> {
    const doc = await this.collection.doc(slugify(courseKey)).get();
    if (!doc.exists) return null;
    const payload = doc.data()?.payload;
    if (typeof payload !== "string") {
      throw new SnapshotFormatError(courseKey, "missing payload");
    }
    return decodeCourse(this.cipher, courseKey, payload);
  }

  async write(courseKey: string, data: CourseAggregate): Promise<void> {
    await this.collection.doc(slugify(courseKey)).set({
      courseKey,
      payload: encodeCourse(this.cipher, data),
      updatedAt: new Date().toISOString(),
    });
  }
}

export async function readSnapshots(store: SnapshotStore, courseKeys: Iterable<string>): Promise<CourseCache> {
  const cache: CourseCache = {};
  for (const key of courseKeys) {
    const data = await store.read(key);
    if (data) cache[key] = data;
  }
  return cache;
}

export async function writeSnapshots(store: SnapshotStore, data: CourseCache): Promise<void> {
  for (const [key, course] of Object.entries(data)) {
    await store.write(key, course);
    console.log(`[STORE] Saved snapshot for ${key}`);
  }
}

export async function appendErrors(logPath: string, errors: readonly string[]): Promise<void> {
  if (errors.length === 0) return;
  await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
  await fs.promises.appendFile(logPath, errors.join("\n") + "\n", "utf8");
}
