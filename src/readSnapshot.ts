#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import fs from "node:fs";
import path from "node:path";
import { FernetCipher } from "./fernet.js";
import { decodeCourse, SnapshotDecryptError } from "./store.js";

const USAGE = [
  `Usage: ${path.basename(process.argv[1] ?? "readSnapshot")} FILE [OUTPUT_FILE]`,
  "",
  "  Decrypt a stored course snapshot and print it as JSON.",
].join("\n");

export function readSnapshotFile(filePath: string, key: string): string {
  const cipher = new FernetCipher(key);
  const token = fs.readFileSync(filePath, "utf8");
  const data = decodeCourse(cipher, path.basename(filePath), token);
  return JSON.stringify(data, null, 2);
}

export function main(args: string[]): number {
  if (args.length === 0 || args.some((a) => a === "-h" || a === "--help")) {
    console.log(USAGE);
    return 0;
  }

  const [filePath, outputPath] = args;
  if (!fs.existsSync(filePath)) {
    console.error(`Error: file "${filePath}" does not exist`);
    return 1;
  }

  loadDotenv();
  const key = process.env.DECRYPTION_KEY;
  if (!key) {
    console.error("Error: DECRYPTION_KEY is not set");
    return 1;
  }

  let json: string;
  try {
    json = readSnapshotFile(filePath, key);
  } catch (err) {
    if (err instanceof SnapshotDecryptError) {
      console.error("Error: Invalid decryption key used for stored data");
      return 1;
    }
    throw err;
  }

  if (outputPath) {
    fs.writeFileSync(outputPath, json + "\n", "utf8");
  } else {
    console.log(json);
  }
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
