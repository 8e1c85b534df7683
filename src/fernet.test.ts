import { FernetCipher, generateKey, InvalidKeyError, InvalidTokenError } from "./fernet.js";

describe("FernetCipher", () => {
  const key = generateKey();

  it("round-trips text", () => {
    const cipher = new FernetCipher(key);
    const token = cipher.encrypt('{"COS126":{}}');
    expect(cipher.decryptString(token)).toBe('{"COS126":{}}');
  });

  it("produces url-safe padded tokens with the version byte and timestamp", () => {
    const cipher = new FernetCipher(key);
    const at = new Date("2024-02-10T12:00:00Z");
    const token = cipher.encrypt("hello", { iv: Buffer.alloc(16, 1), at });

    expect(token).toMatch(/^[A-Za-z0-9_-]+=*$/);
    expect(token.length % 4).toBe(0);
    expect(token.startsWith("gAAAAA")).toBe(true);
    expect(cipher.timestamp(token).toISOString()).toBe("2024-02-10T12:00:00.000Z");
  });

  it("is deterministic for a fixed iv and time", () => {
    const cipher = new FernetCipher(key);
    const options = { iv: Buffer.alloc(16, 7), at: new Date(0) };
    expect(cipher.encrypt("same", options)).toBe(cipher.encrypt("same", options));
  });

  it("rejects tokens from another key", () => {
    const token = new FernetCipher(generateKey()).encrypt("secret");
    expect(() => new FernetCipher(key).decrypt(token)).toThrow(InvalidTokenError);
  });

  it("rejects tampered tokens", () => {
    const cipher = new FernetCipher(key);
    const raw = Buffer.from(cipher.encrypt("secret"), "base64url");
    raw[raw.length - 40] ^= 0xff;
    expect(() => cipher.decrypt(raw.toString("base64url"))).toThrow(InvalidTokenError);
  });

  it("rejects garbage", () => {
    expect(() => new FernetCipher(key).decrypt("not a token")).toThrow(InvalidTokenError);
  });

  it("decrypts with any of several keys and encrypts with the first", () => {
    const oldKey = generateKey();
    const oldToken = new FernetCipher(oldKey).encrypt("old data");
    const rotated = new FernetCipher(`${key},${oldKey}`);

    expect(rotated.decryptString(oldToken)).toBe("old data");
    expect(new FernetCipher(key).decryptString(rotated.encrypt("new data"))).toBe("new data");
  });

  it("rejects malformed keys", () => {
    expect(() => new FernetCipher("short")).toThrow(InvalidKeyError);
    expect(() => new FernetCipher(" , ")).toThrow(InvalidKeyError);
  });
});
