// ---- Identifiers ----

export type NoteId = string; // 32 hex chars, same as the item's filename stem
export type MasterKeyId = string;

/** Decrypted master key material. Lives only inside a Notebook's key table. */
export type MasterKey = string;

// ---- Item types ----

// Position in the list is the on-disk `type_` code.
export const ITEM_TYPES = [
  "undefined",
  "note",
  "folder",
  "setting",
  "resource",
  "tag",
  "note_tag",
  "search",
  "alarm",
  "master_key",
  "item_change",
  "note_resource",
  "resource_local_state",
  "revision",
  "migration",
  "smart_filter",
  "command",
] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

export function itemTypeFromCode(code: number): ItemType {
  return ITEM_TYPES[code] ?? "undefined";
}

// ---- Encryption ----

// Position in the list is the header's method code. Only `sjcl4` (keys) and
// `sjcl1a` (items) are produced by current clients; the rest are legacy.
export const ENCRYPTION_METHODS = ["undefined", "sjcl", "sjcl2", "sjcl3", "sjcl4", "sjcl1a"] as const;

export type EncryptionMethod = (typeof ENCRYPTION_METHODS)[number];

export function encryptionMethodFromCode(code: number): EncryptionMethod {
  return ENCRYPTION_METHODS[code] ?? "undefined";
}

export function encryptionMethodCode(method: EncryptionMethod): number {
  return ENCRYPTION_METHODS.indexOf(method);
}

export interface EncryptionHeader {
  version: number;
  length: number;
  method: EncryptionMethod;
  master_key_id: MasterKeyId;
}

// ---- Note content ----

export interface NoteProperties {
  title?: string;
  body?: string;
  created_time?: Date;
  altitude?: number;
  latitude?: number;
  longitude?: number;
  author?: string;
  source_url?: string;
  is_todo?: boolean;
  todo_due?: boolean;
  todo_completed?: boolean;
  source?: string;
  source_application?: string;
  application_data?: string;
  order?: number;
  user_created_time?: Date;
  user_updated_time?: Date;
  markup_language?: string;
  is_shared?: boolean;
}

// ---- Note metadata ----

export interface NoteMetadata {
  note_id: NoteId;
  path: string;
  type: ItemType;
  encryption_applied: boolean;
  parent_id: string | null;
  encryption_key_id: MasterKeyId | null;
  updated_time: string | null;
  last_read_time: string | null;
}

export interface NoteFilter {
  type?: ItemType;
  parent_id?: string;
}

// ---- Load issues ----

export type LoadIssueKind = "key" | "item";

export interface LoadIssue {
  kind: LoadIssueKind;
  path: string;
  code: string;
  message: string;
}

// ---- Constants ----

export const KEY_FILE_EXTENSION = ".md";
