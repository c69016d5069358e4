import { InvalidFormatError, NoEncryptionKeyError, NoEncryptionTextError, NoTextError } from "../errors.js";
import type { ItemType, MasterKey, MasterKeyId, NoteId, NoteMetadata, NoteProperties } from "../types.js";
import { itemTypeFromCode } from "../types.js";
import type { Cipher } from "../crypto/sjcl-cipher.js";
import { SjclCipher } from "../crypto/sjcl-cipher.js";
import { parseEncryptionHeader } from "../envelope/header.js";
import { decryptEnvelope } from "../envelope/envelope.js";
import { deserializeItem, toNoteProperties } from "../format/item-codec.js";
import { parseInteger, parseItemTime } from "../format/item-values.js";
import { scanKeyValues, splitLines } from "../format/key-value.js";
import { readTextFile } from "../files.js";

/** Cached content older than this is read from disk again. */
export const REFRESH_INTERVAL_MS = 12 * 60 * 60 * 1000;

export interface NoteRecordOptions {
  cipher?: Cipher;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

interface NoteRecordInit {
  path: string;
  id: NoteId;
  type: ItemType;
  encryptionApplied: boolean;
  parentId: string | null;
  encryptionKeyId: MasterKeyId | null;
  updatedTime: Date | null;
}

export class NoteRecord {
  readonly path: string;
  readonly id: NoteId;
  readonly type: ItemType;
  readonly encryptionApplied: boolean;
  readonly parentId: string | null;
  readonly encryptionKeyId: MasterKeyId | null;
  readonly updatedTime: Date | null;

  private readonly cipher: Cipher;
  private readonly now: () => number;
  private lastReadTime: number | null = null;
  private content: NoteProperties = {};

  private constructor(init: NoteRecordInit, options: NoteRecordOptions) {
    this.path = init.path;
    this.id = init.id;
    this.type = init.type;
    this.encryptionApplied = init.encryptionApplied;
    this.parentId = init.parentId;
    this.encryptionKeyId = init.encryptionKeyId;
    this.updatedTime = init.updatedTime;
    this.cipher = options.cipher ?? new SjclCipher();
    this.now = options.now ?? Date.now;
  }

  /**
   * Index an item from the metadata lines of its file. Content is not decoded
   * here, but an encrypted item's envelope header is, so a broken header or
   * the key it needs is known before any read.
   */
  static fromFile(path: string, options: NoteRecordOptions = {}): NoteRecord {
    const values = scanKeyValues(splitLines(readTextFile(path)));

    const id = values.get("id");
    if (!id) {
      throw new InvalidFormatError(`no 'id' in item '${path}'`);
    }

    const typeValue = values.get("type_");
    if (typeValue === undefined) {
      throw new InvalidFormatError("missing required property: type_");
    }
    const typeCode = parseInteger(typeValue);
    if (typeCode === null) {
      throw new InvalidFormatError(`invalid value for 'type_': '${typeValue}'`);
    }

    const encryptionValue = values.get("encryption_applied");
    if (encryptionValue === undefined) {
      throw new InvalidFormatError(`no 'encryption_applied' in item '${path}'`);
    }
    const encryptionCode = parseInteger(encryptionValue);
    if (encryptionCode === null) {
      throw new InvalidFormatError(`invalid value for 'encryption_applied': '${encryptionValue}'`);
    }
    const encryptionApplied = encryptionCode === 1;

    let encryptionKeyId: MasterKeyId | null = null;
    if (encryptionApplied) {
      const cipherText = values.get("encryption_cipher_text");
      if (!cipherText) throw new NoEncryptionTextError();
      encryptionKeyId = parseEncryptionHeader(cipherText).master_key_id;
    }

    const updated = values.get("updated_time");

    return new NoteRecord(
      {
        path,
        id,
        type: itemTypeFromCode(typeCode),
        encryptionApplied,
        parentId: values.get("parent_id") || null,
        encryptionKeyId,
        updatedTime: updated === undefined ? null : parseItemTime(updated),
      },
      options,
    );
  }

  get isLoaded(): boolean {
    return this.lastReadTime !== null;
  }

  get lastRead(): Date | null {
    return this.lastReadTime === null ? null : new Date(this.lastReadTime);
  }

  /** Properties decoded by the last successful read; empty before the first. */
  get properties(): NoteProperties {
    return { ...this.content };
  }

  isStale(): boolean {
    return this.lastReadTime === null || this.now() - this.lastReadTime >= REFRESH_INTERVAL_MS;
  }

  /**
   * Return the item's body, reading it from disk first when it was never read
   * or the cache is stale. A failed read throws and leaves the previous cache
   * in place.
   */
  read(masterKey?: MasterKey): string {
    if (this.isStale()) {
      const content = this.loadContent(masterKey);
      this.content = content;
      this.lastReadTime = this.now();
    }

    if (this.content.body === undefined) {
      throw new NoTextError(this.id);
    }
    return this.content.body;
  }

  toMetadata(): NoteMetadata {
    return {
      note_id: this.id,
      path: this.path,
      type: this.type,
      encryption_applied: this.encryptionApplied,
      parent_id: this.parentId,
      encryption_key_id: this.encryptionKeyId,
      updated_time: this.updatedTime?.toISOString() ?? null,
      last_read_time: this.lastRead?.toISOString() ?? null,
    };
  }

  private loadContent(masterKey: MasterKey | undefined): NoteProperties {
    const text = readTextFile(this.path);

    if (!this.encryptionApplied) {
      return toNoteProperties(deserializeItem(splitLines(text)).properties);
    }

    if (masterKey === undefined) {
      throw new NoEncryptionKeyError(this.encryptionKeyId ?? "(none)");
    }
    const cipherText = scanKeyValues(splitLines(text)).get("encryption_cipher_text");
    if (!cipherText) {
      throw new NoEncryptionTextError();
    }

    const { plaintext } = decryptEnvelope(cipherText, masterKey, this.cipher);
    return toNoteProperties(deserializeItem(splitLines(plaintext)).properties);
  }
}
