import { DecryptionError, InvalidFormatError } from "../errors.js";
import type { EncryptionHeader, EncryptionMethod, MasterKey, MasterKeyId } from "../types.js";
import type { Cipher, EncryptingCipher } from "../crypto/sjcl-cipher.js";
import {
  CharStream,
  HEADER_METADATA_LENGTH,
  HEADER_VERSION,
  MASTER_KEY_ID_LENGTH,
  parseEncryptionHeader,
  serializeEncryptionHeader,
} from "./header.js";
import { DEFAULT_CHUNK_SIZE, decryptChunks, encryptChunks } from "./chunks.js";

const NON_ASCII_RE = /[^\x00-\x7f]/;

export interface DecryptedEnvelope {
  header: EncryptionHeader;
  plaintext: string;
}

/** Decrypt a whole `encryption_cipher_text` value: header, then chunks. */
export function decryptEnvelope(cipherText: string, masterKey: MasterKey, cipher: Cipher): DecryptedEnvelope {
  if (NON_ASCII_RE.test(cipherText)) {
    throw new DecryptionError("encrypted text is not ASCII");
  }

  const stream = new CharStream(cipherText);
  const header = parseEncryptionHeader(stream);
  const plaintext = decryptChunks(stream, masterKey, cipher);

  return { header, plaintext };
}

export interface EnvelopeOptions {
  method?: EncryptionMethod;
  chunkSize?: number;
}

export function encryptEnvelope(
  plaintext: string,
  masterKeyId: MasterKeyId,
  masterKey: MasterKey,
  cipher: EncryptingCipher,
  options: EnvelopeOptions = {},
): string {
  if (masterKeyId.length !== MASTER_KEY_ID_LENGTH) {
    throw new InvalidFormatError(`master key id must be ${MASTER_KEY_ID_LENGTH} characters, got ${masterKeyId.length}`);
  }

  const header = serializeEncryptionHeader({
    version: HEADER_VERSION,
    length: HEADER_METADATA_LENGTH,
    method: options.method ?? "sjcl1a",
    master_key_id: masterKeyId,
  });
  return header + encryptChunks(plaintext, masterKey, cipher, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
}
