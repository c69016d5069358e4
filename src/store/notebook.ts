import { existsSync, readdirSync, statSync } from "node:fs";
import type { Dirent } from "node:fs";
import { join, parse } from "node:path";
import { FileReadError, NoEncryptionKeyError, NoteNotFoundError, NoteStoreError } from "../errors.js";
import type { LoadIssue, MasterKey, MasterKeyId, NoteFilter, NoteId, NoteMetadata, NoteProperties } from "../types.js";
import { KEY_FILE_EXTENSION } from "../types.js";
import { describeFsError } from "../files.js";
import type { Cipher } from "../crypto/sjcl-cipher.js";
import { SjclCipher } from "../crypto/sjcl-cipher.js";
import { loadMasterKey } from "../crypto/master-key.js";
import { NoteRecord } from "./note-record.js";

export interface NotebookOptions {
  /** Decrypts key files and note chunks. */
  cipher?: Cipher;
  now?: () => number;
}

export interface PasswordEntry {
  keyId: MasterKeyId;
  passphrase: string;
}

/** Split `<key_id>,<passphrase>` on the first comma. Entries without one are ignored. */
export function parsePasswordEntry(entry: string): PasswordEntry | null {
  const comma = entry.indexOf(",");
  if (comma === -1) return null;
  return { keyId: entry.slice(0, comma), passphrase: entry.slice(comma + 1) };
}

export interface NoteContent {
  note_id: NoteId;
  title: string | null;
  body: string;
}

export interface SearchResult {
  note: NoteContent;
  /** Notes that could not be read while searching. */
  skipped: LoadIssue[];
}

function toIssue(kind: LoadIssue["kind"], path: string, err: NoteStoreError): LoadIssue {
  return { kind, path, code: err.code, message: err.message };
}

/**
 * A read-only view of a store directory: every item file indexed by id, and
 * the master keys unlocked from the supplied passwords.
 */
export class Notebook {
  private readonly notes = new Map<NoteId, NoteRecord>();
  private readonly masterKeys = new Map<MasterKeyId, MasterKey>();
  private readonly issues: LoadIssue[] = [];

  /**
   * @param passwords `<key_id>,<passphrase>` entries. Every named key file
   *   must exist; one that does not unlock is skipped and reported in
   *   {@link loadIssues}.
   */
  constructor(
    readonly directory: string,
    passwords: Iterable<string>,
    options: NotebookOptions = {},
  ) {
    const cipher = options.cipher ?? new SjclCipher();

    let entries: Dirent[];
    try {
      entries = readdirSync(directory, { withFileTypes: true });
    } catch (err) {
      throw new FileReadError(directory, describeFsError(err));
    }

    for (const entry of passwords) {
      const password = parsePasswordEntry(entry);
      if (!password) continue;

      const keyPath = join(directory, `${password.keyId}${KEY_FILE_EXTENSION}`);
      if (!existsSync(keyPath) || !statSync(keyPath).isFile()) {
        throw new NoEncryptionKeyError(password.keyId, `no key file at '${keyPath}'`);
      }

      try {
        this.masterKeys.set(password.keyId, loadMasterKey(keyPath, password.keyId, password.passphrase, cipher));
      } catch (err) {
        if (!(err instanceof NoteStoreError)) throw err;
        this.issues.push(toIssue("key", keyPath, err));
      }
    }

    const fileNames = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    for (const name of fileNames.sort()) {
      if (this.masterKeys.has(parse(name).name)) continue;
      const itemPath = join(directory, name);

      try {
        const record = NoteRecord.fromFile(itemPath, { cipher, now: options.now });
        const existing = this.notes.get(record.id);
        if (existing) {
          this.issues.push({
            kind: "item",
            path: itemPath,
            code: "DUPLICATE_ID",
            message: `Item id ${record.id} is already indexed from '${existing.path}'`,
          });
          continue;
        }
        this.notes.set(record.id, record);
      } catch (err) {
        if (!(err instanceof NoteStoreError)) throw err;
        this.issues.push(toIssue("item", itemPath, err));
      }
    }
  }

  get size(): number {
    return this.notes.size;
  }

  get keyIds(): MasterKeyId[] {
    return [...this.masterKeys.keys()].sort();
  }

  /** Keys and items skipped while loading. */
  get loadIssues(): readonly LoadIssue[] {
    return this.issues;
  }

  hasKey(keyId: MasterKeyId): boolean {
    return this.masterKeys.has(keyId);
  }

  getNote(noteId: NoteId): NoteMetadata {
    return this.getRecord(noteId).toMetadata();
  }

  listNotes(filter: NoteFilter = {}): NoteMetadata[] {
    return [...this.notes.values()]
      .filter((record) => filter.type === undefined || record.type === filter.type)
      .filter((record) => filter.parent_id === undefined || record.parentId === filter.parent_id)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((record) => record.toMetadata());
  }

  /** Body text of an item, decrypted with its master key when needed. */
  readNote(noteId: NoteId): string {
    const record = this.getRecord(noteId);
    return record.read(this.keyFor(record));
  }

  /** Title and body of an item; reads it like {@link readNote}. */
  readNoteContent(noteId: NoteId): NoteContent {
    const record = this.getRecord(noteId);
    const body = record.read(this.keyFor(record));
    return { note_id: record.id, title: record.properties.title ?? null, body };
  }

  /** Typed properties cached by the last successful read of an item. */
  getProperties(noteId: NoteId): NoteProperties {
    return this.getRecord(noteId).properties;
  }

  /**
   * First note, in id order, whose title or body contains `searchText`
   * (case-insensitive). Notes that cannot be read are listed in the result.
   */
  findNote(searchText: string): SearchResult {
    const needle = searchText.toLowerCase();
    const skipped: LoadIssue[] = [];

    for (const { note_id } of this.listNotes({ type: "note" })) {
      let content: NoteContent;
      try {
        content = this.readNoteContent(note_id);
      } catch (err) {
        if (!(err instanceof NoteStoreError)) throw err;
        skipped.push(toIssue("item", this.getRecord(note_id).path, err));
        continue;
      }

      const haystack = `${content.title ?? ""}\n${content.body}`.toLowerCase();
      if (haystack.includes(needle)) return { note: content, skipped };
    }

    throw NoteNotFoundError.forSearch(searchText);
  }

  private getRecord(noteId: NoteId): NoteRecord {
    const record = this.notes.get(noteId);
    if (!record) throw new NoteNotFoundError(noteId);
    return record;
  }

  private keyFor(record: NoteRecord): MasterKey | undefined {
    if (!record.encryptionApplied) return undefined;

    const keyId = record.encryptionKeyId;
    const key = keyId === null ? undefined : this.masterKeys.get(keyId);
    if (key === undefined) {
      throw new NoEncryptionKeyError(keyId ?? "(none)", `note ${record.id} needs a key that is not loaded`);
    }
    return key;
  }
}
