import { DecryptionError, InvalidFormatError, KeyIdMismatchError, NoteStoreError } from "../errors.js";
import type { MasterKey, MasterKeyId } from "../types.js";
import { readTextFile } from "../files.js";
import { scanKeyValues, splitLines } from "../format/key-value.js";
import type { Cipher } from "./sjcl-cipher.js";

/**
 * Unlock a master key. The key file's `content` is decrypted with the user's
 * passphrase; the id is checked first so a wrong file is reported as such
 * whatever the passphrase.
 */
export function loadMasterKey(keyPath: string, keyId: MasterKeyId, passphrase: string, cipher: Cipher): MasterKey {
  const values = scanKeyValues(splitLines(readTextFile(keyPath)));

  const id = values.get("id");
  if (id === undefined) {
    throw new InvalidFormatError(`no 'id' in key file '${keyPath}'`);
  }
  const content = values.get("content");
  if (content === undefined) {
    throw new InvalidFormatError(`no 'content' in key file '${keyPath}'`);
  }
  if (id !== keyId) {
    throw new KeyIdMismatchError(keyId, id);
  }

  let plaintext: Buffer;
  try {
    plaintext = cipher.decrypt(content, passphrase);
  } catch (err) {
    if (err instanceof NoteStoreError) {
      throw new DecryptionError(`master key '${keyId}' could not be unlocked (${err.message})`);
    }
    throw err;
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(plaintext);
  } catch {
    throw new DecryptionError(`master key '${keyId}' is not valid UTF-8`);
  }
}
