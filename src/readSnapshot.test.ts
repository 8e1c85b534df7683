import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FernetCipher, generateKey } from "./fernet.js";
import { main, readSnapshotFile } from "./readSnapshot.js";
import { SnapshotDecryptError } from "./store.js";

describe("readSnapshot", () => {
  const key = generateKey();
  const data = { Hello: { total: 0, finalized: 0, drafts: 0, unclaimed: 0, runs: {}, submissions: {}, sent_deadline_message: null } };
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "read-snapshot-"));
    file = path.join(dir, "cos126-s2023.txt");
    fs.writeFileSync(file, new FernetCipher(key).encrypt(JSON.stringify(data)), "utf8");
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    delete process.env.DECRYPTION_KEY;
    jest.restoreAllMocks();
  });

  it("decrypts to indented JSON", () => {
    expect(readSnapshotFile(file, key)).toBe(JSON.stringify(data, null, 2));
  });

  it("refuses the wrong key", () => {
    expect(() => readSnapshotFile(file, generateKey())).toThrow(SnapshotDecryptError);
  });

  it("prints usage without arguments", () => {
    expect(main([])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("FILE [OUTPUT_FILE]"));
  });

  it("fails on a missing file", () => {
    expect(main([path.join(dir, "missing.txt")])).toBe(1);
  });

  it("writes to an output file", () => {
    process.env.DECRYPTION_KEY = key;
    const out = path.join(dir, "out.json");

    expect(main([file, out])).toBe(0);
    expect(fs.readFileSync(out, "utf8")).toBe(JSON.stringify(data, null, 2) + "\n");
  });

  it("reports a key mismatch", () => {
    process.env.DECRYPTION_KEY = generateKey();
    expect(main([file])).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error: Invalid decryption key used for stored data");
  });
});
