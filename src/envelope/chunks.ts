import { DecryptionError, InvalidFormatError, UnexpectedEndOfNoteError } from "../errors.js";
import type { MasterKey } from "../types.js";
import type { Cipher, EncryptingCipher } from "../crypto/sjcl-cipher.js";
import { parseHex } from "../format/item-values.js";
import { CharStream } from "./header.js";

const CHUNK_LENGTH_WIDTH = 6;
const MAX_CHUNK_LENGTH = 0xffffff;
/** Plaintext code points per chunk written by {@link encryptChunks}. */
export const DEFAULT_CHUNK_SIZE = 5000;

const ENCODED_ASCII_RE = /%([0-9a-fA-F]{2})/g;
const ENCODED_UNICODE_RE = /%u[0-9a-fA-F]{4}/g;

/** Replace each `%XX` left by the legacy producer with the character of that code. */
export function cleanEncodedAscii(text: string): string {
  return text.replace(ENCODED_ASCII_RE, (_match, code: string) => String.fromCharCode(Number.parseInt(code, 16)));
}

/**
 * Drop each `%uXXXX` left by the legacy producer. This loses the escaped
 * UTF-16 unit: the original character is not reconstructed.
 */
export function cleanEncodedUnicode(text: string): string {
  return text.replace(ENCODED_UNICODE_RE, "");
}

/**
 * Standard percent-decoding over the UTF-8 bytes of `text`. Malformed escapes
 * stay as they are; decoded bytes that are not valid UTF-8 become U+FFFD.
 */
export function percentDecode(text: string): string {
  const input = Buffer.from(text, "utf8");
  const output = Buffer.alloc(input.length);
  let length = 0;

  for (let i = 0; i < input.length; i++) {
    if (input[i] === 0x25 && i + 2 < input.length) {
      const code = parseHex(input.toString("latin1", i + 1, i + 3));
      if (code !== null) {
        output[length++] = code;
        i += 2;
        continue;
      }
    }
    output[length++] = input[i];
  }

  return output.toString("utf8", 0, length);
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decryptChunk(chunk: string, masterKey: MasterKey, cipher: Cipher, index: number): string {
  const bytes = cipher.decrypt(chunk, masterKey);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new DecryptionError(`chunk ${index} is not valid UTF-8`);
  }
}

/**
 * Decrypt the length-prefixed chunks that follow the envelope header and
 * reassemble them in stream order. Fewer than six characters left ends the
 * stream; a chunk shorter than its declared length does not.
 */
export function decryptChunks(input: string | CharStream, masterKey: MasterKey, cipher: Cipher): string {
  const stream = typeof input === "string" ? new CharStream(input) : input;
  let text = "";

  for (let index = 0; ; index++) {
    const lengthField = stream.take(CHUNK_LENGTH_WIDTH);
    if (lengthField.length < CHUNK_LENGTH_WIDTH) break;

    const length = parseHex(lengthField);
    if (length === null) {
      throw new InvalidFormatError(`chunk ${index} length '${lengthField}' is not a hex number`);
    }
    if (length === 0) {
      throw new InvalidFormatError(`chunk ${index} has zero length`);
    }

    const chunk = stream.take(length);
    if (chunk.length !== length) {
      throw new UnexpectedEndOfNoteError(length, chunk.length);
    }

    text += cleanEncodedUnicode(cleanEncodedAscii(decryptChunk(chunk, masterKey, cipher, index)));
  }

  return percentDecode(text);
}

/**
 * Encrypt `plaintext` as a chunk sequence. Chunks split on code point
 * boundaries so each one is valid UTF-8 on its own.
 */
export function encryptChunks(
  plaintext: string,
  masterKey: MasterKey,
  cipher: EncryptingCipher,
  chunkSize = DEFAULT_CHUNK_SIZE,
): string {
  const codePoints = Array.from(plaintext);
  const out: string[] = [];

  for (let i = 0; i < codePoints.length; i += chunkSize) {
    const encrypted = cipher.encrypt(codePoints.slice(i, i + chunkSize).join(""), masterKey);
    if (encrypted.length > MAX_CHUNK_LENGTH) {
      throw new InvalidFormatError(`encrypted chunk of ${encrypted.length} characters does not fit a 6-digit length`);
    }
    out.push(encrypted.length.toString(16).padStart(CHUNK_LENGTH_WIDTH, "0"), encrypted);
  }

  return out.join("");
}
