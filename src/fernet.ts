import crypto from "node:crypto";

const VERSION = 0x80;
const HEADER_LENGTH = 1 + 8 + 16;
const HMAC_LENGTH = 32;
const BLOCK_SIZE = 16;

export class InvalidKeyError extends Error {
  constructor(message = "Fernet key must be 32 url-safe base64-encoded bytes") {
    super(message);
    this.name = "InvalidKeyError";
  }
}

export class InvalidTokenError extends Error {
  constructor(message = "Invalid token") {
    super(message);
    this.name = "InvalidTokenError";
  }
}

interface FernetKey {
  signing: Buffer;
  encryption: Buffer;
}

function decodeBase64Url(input: string): Buffer {
  return Buffer.from(input.trim().replace(/-/g, "+").replace(/_/g, "/"), "base64");
}

function encodeBase64Url(input: Buffer): string {
  return input.toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
}

function parseKey(key: string): FernetKey {
  if (!/^[A-Za-z0-9_\-+/]+={0,2}$/.test(key.trim())) throw new InvalidKeyError();
  const raw = decodeBase64Url(key);
  if (raw.length !== 32) throw new InvalidKeyError();
  return { signing: raw.subarray(0, 16), encryption: raw.subarray(16) };
}

export function generateKey(): string {
  return encodeBase64Url(crypto.randomBytes(32));
}

export interface EncryptOptions {
  iv?: Buffer;
  at?: Date;
}

/**
 * Fernet tokens (AES-128-CBC + HMAC-SHA256). Accepts several keys for
 * rotation: the first one encrypts, any of them may decrypt.
 */
export class FernetCipher {
  private readonly keys: FernetKey[];

  constructor(keys: string | readonly string[]) {
    const list = typeof keys === "string" ? keys.split(",") : [...keys];
    this.keys = list.map((k) => k.trim()).filter((k) => k.length > 0).map(parseKey);
    if (this.keys.length === 0) throw new InvalidKeyError("At least one Fernet key is required");
  }

  encrypt(data: Buffer | string, options: EncryptOptions = {}): string {
    const key = this.keys[0];
    const iv = options.iv ?? crypto.randomBytes(16);
    if (iv.length !== 16) throw new Error("IV must be 16 bytes");
    const seconds = Math.floor((options.at ?? new Date()).getTime() / 1000);

    const cipher = crypto.createCipheriv("aes-128-cbc", key.encryption, iv);
    const plaintext = typeof data === "string" ? Buffer.from(data, "utf8") : data;
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    const header = Buffer.alloc(9);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(seconds), 1);
    const basic = Buffer.concat([header, iv, ciphertext]);
    const hmac = crypto.createHmac("sha256", key.signing).update(basic).digest();
    return encodeBase64Url(Buffer.concat([basic, hmac]));
  }

  decrypt(token: string): Buffer {
    const raw = decodeBase64Url(token);
    if (raw.length < HEADER_LENGTH + BLOCK_SIZE + HMAC_LENGTH || raw[0] !== VERSION) {
      throw new InvalidTokenError();
    }
    const basic = raw.subarray(0, raw.length - HMAC_LENGTH);
    const signature = raw.subarray(raw.length - HMAC_LENGTH);
    const ciphertext = basic.subarray(HEADER_LENGTH);
    if (ciphertext.length % BLOCK_SIZE !== 0) throw new InvalidTokenError();
    const iv = basic.subarray(9, HEADER_LENGTH);

    for (const key of this.keys) {
      const expected = crypto.createHmac("sha256", key.signing).update(basic).digest();
      if (!crypto.timingSafeEqual(expected, signature)) continue;
      try {
        const decipher = crypto.createDecipheriv("aes-128-cbc", key.encryption, iv);
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
      } catch {
        throw new InvalidTokenError("Invalid padding");
      }
    }
    throw new InvalidTokenError();
  }

  decryptString(token: string): string {
    return this.decrypt(token).toString("utf8");
  }

  timestamp(token: string): Date {
    const raw = decodeBase64Url(token);
    if (raw.length < 9 || raw[0] !== VERSION) throw new InvalidTokenError();
    return new Date(Number(raw.readBigUInt64BE(1)) * 1000);
  }
}
