/**
 * SJCL-compatible payload cipher.
 *
 * Encrypted chunks and master key contents are SJCL JSON payloads:
 *
 *   {"iv":"…","v":1,"iter":101,"ks":256,"ts":64,"mode":"ccm","adata":"","cipher":"aes","salt":"…","ct":"…"}
 *
 * The key is PBKDF2-HMAC-SHA256 of the password string over `salt` with
 * `iter` rounds, `ks` bits long. `ct` is the AES-CCM ciphertext followed by a
 * `ts`-bit tag. CCM's length field size is derived from the message length
 * and the nonce is the IV truncated to match, as SJCL does.
 */

import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";
import type { CipherCCMTypes } from "node:crypto";
import { z } from "zod";
import { DecryptionError } from "../errors.js";

/** Decrypts one payload with a password. The only primitive the store needs. */
export interface Cipher {
  decrypt(payload: string, password: string): Buffer;
}

/** Producer side, used to build envelopes and key files. */
export interface EncryptingCipher extends Cipher {
  encrypt(plaintext: Buffer | string, password: string): string;
}

const payloadSchema = z.object({
  iv: z.string().min(1),
  v: z.literal(1).default(1),
  iter: z.number().int().positive().default(10000),
  ks: z.union([z.literal(128), z.literal(192), z.literal(256)]).default(128),
  ts: z.union([z.literal(64), z.literal(96), z.literal(128)]).default(64),
  mode: z.literal("ccm").default("ccm"),
  adata: z.string().default(""),
  cipher: z.literal("aes").default("aes"),
  salt: z.string().min(1),
  ct: z.string().min(1),
});

type SjclPayload = z.infer<typeof payloadSchema>;

export interface SjclParams {
  iter: number;
  ks: SjclPayload["ks"];
  ts: SjclPayload["ts"];
}

/** Parameters current clients use for item chunks. */
export const SJCL_ITEM_PARAMS: SjclParams = { iter: 101, ks: 256, ts: 64 };
/** Parameters current clients use for master keys. */
export const SJCL_KEY_PARAMS: SjclParams = { iter: 10000, ks: 256, ts: 64 };

const SALT_LENGTH = 8;
const IV_LENGTH = 16;
const MIN_IV_LENGTH = 7;

/** Bytes of CCM's length field for a message of `messageLength` bytes. */
function ccmLengthSize(messageLength: number, ivLength: number): number {
  let size = 2;
  while (size < 4 && messageLength >>> (8 * size)) size++;
  return Math.max(size, 15 - ivLength);
}

function ccmAlgorithm(keySize: SjclParams["ks"]): CipherCCMTypes {
  switch (keySize) {
    case 128:
      return "aes-128-ccm";
    case 192:
      return "aes-192-ccm";
    case 256:
      return "aes-256-ccm";
  }
}

function deriveKey(password: string, salt: Buffer, params: SjclParams): Buffer {
  return pbkdf2Sync(password, salt, params.iter, params.ks / 8, "sha256");
}

function parsePayload(payload: string): SjclPayload {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    throw new DecryptionError("payload is not valid JSON");
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecryptionError(`unsupported payload (${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"})`);
  }
  return parsed.data;
}

export class SjclCipher implements EncryptingCipher {
  constructor(private readonly params: SjclParams = SJCL_ITEM_PARAMS) {}

  decrypt(payload: string, password: string): Buffer {
    const p = parsePayload(payload);
    const iv = Buffer.from(p.iv, "base64");
    const salt = Buffer.from(p.salt, "base64");
    const data = Buffer.from(p.ct, "base64");
    const aad = Buffer.from(p.adata, "base64");
    const tagLength = p.ts / 8;

    if (iv.length < MIN_IV_LENGTH) {
      throw new DecryptionError("payload IV is too short");
    }
    if (data.length < tagLength) {
      throw new DecryptionError("payload ciphertext is shorter than its tag");
    }

    const ciphertext = data.subarray(0, data.length - tagLength);
    const tag = data.subarray(data.length - tagLength);
    const nonce = iv.subarray(0, 15 - ccmLengthSize(ciphertext.length, iv.length));
    const key = deriveKey(password, salt, p);

    try {
      const decipher = createDecipheriv(ccmAlgorithm(p.ks), key, nonce, { authTagLength: tagLength });
      decipher.setAuthTag(tag);
      decipher.setAAD(aad, { plaintextLength: ciphertext.length });
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      // CCM reports a wrong key and a tampered payload the same way.
      throw new DecryptionError("authentication failed");
    }
  }

  encrypt(plaintext: Buffer | string, password: string): string {
    const data = typeof plaintext === "string" ? Buffer.from(plaintext, "utf8") : plaintext;
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const tagLength = this.params.ts / 8;
    const nonce = iv.subarray(0, 15 - ccmLengthSize(data.length, iv.length));
    const key = deriveKey(password, salt, this.params);

    const cipher = createCipheriv(ccmAlgorithm(this.params.ks), key, nonce, { authTagLength: tagLength });
    cipher.setAAD(Buffer.alloc(0), { plaintextLength: data.length });
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final(), cipher.getAuthTag()]);

    return JSON.stringify({
      iv: iv.toString("base64"),
      v: 1,
      iter: this.params.iter,
      ks: this.params.ks,
      ts: this.params.ts,
      mode: "ccm",
      adata: "",
      cipher: "aes",
      salt: salt.toString("base64"),
      ct: ciphertext.toString("base64"),
    });
  }
}
