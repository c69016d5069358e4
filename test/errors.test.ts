import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DecryptionError,
  FileReadError,
  InvalidFormatError,
  KeyIdMismatchError,
  NoEncryptionKeyError,
  NoEncryptionTextError,
  NoTextError,
  NoteNotFoundError,
  NoteStoreError,
  StoreNotOpenedError,
  UnexpectedEndOfNoteError,
  UnknownEncryptionMethodError,
} from "../src/errors.js";

describe("FileReadError", () => {
  it("should create error with correct name and code", () => {
    const error = new FileReadError("/path/to/item.md", "File not found");
    assert.equal(error.name, "FileReadError");
    assert.equal(error.code, "FILE_READ_ERROR");
  });

  it("should format message correctly", () => {
    const error = new FileReadError("/path/to/item.md", "File not found");
    assert.equal(error.message, "Failed to read file '/path/to/item.md': File not found");
  });

  it("should extend NoteStoreError", () => {
    const error = new FileReadError("/path/to/item.md", "Permission denied");
    assert.ok(error instanceof NoteStoreError);
    assert.ok(error instanceof Error);
  });
});

describe("InvalidFormatError", () => {
  it("should prefix the message", () => {
    const error = new InvalidFormatError("missing required property: type_");
    assert.equal(error.message, "Invalid format: missing required property: type_");
    assert.equal(error.code, "INVALID_FORMAT");
  });

  it("should be the base of header and cipher text errors", () => {
    const method = new UnknownEncryptionMethodError(7);
    assert.ok(method instanceof InvalidFormatError);
    assert.equal(method.code, "UNKNOWN_ENCRYPTION_METHOD");
    assert.equal(method.message, "Invalid format: unknown encryption method 0x07");

    const text = new NoEncryptionTextError();
    assert.ok(text instanceof InvalidFormatError);
    assert.equal(text.code, "NO_ENCRYPTION_TEXT");
  });
});

describe("key errors", () => {
  it("should name both ids on a key id mismatch", () => {
    const error = new KeyIdMismatchError("wanted", "found");
    assert.equal(error.message, "Key id mismatch: expected 'wanted', key file holds 'found'");
    assert.equal(error.code, "KEY_ID_MISMATCH");
    assert.equal(error.name, "KeyIdMismatchError");
  });

  it("should keep the missing key id", () => {
    const error = new NoEncryptionKeyError("abc");
    assert.equal(error.keyId, "abc");
    assert.equal(error.message, "Encryption key 'abc' not found");
  });

  it("should append detail when given", () => {
    const error = new NoEncryptionKeyError("abc", "no key file at '/store/abc.md'");
    assert.equal(error.message, "Encryption key 'abc' not found: no key file at '/store/abc.md'");
    assert.equal(error.code, "NO_ENCRYPTION_KEY");
  });
});

describe("read errors", () => {
  it("should format decryption errors", () => {
    const error = new DecryptionError("authentication failed");
    assert.equal(error.message, "Failed to decrypt: authentication failed");
    assert.equal(error.code, "DECRYPTION_ERROR");
  });

  it("should report truncated chunks", () => {
    const error = new UnexpectedEndOfNoteError(16, 5);
    assert.equal(error.message, "Unexpected end of note: chunk declares 16 characters, 5 remain");
    assert.equal(error.code, "UNEXPECTED_END_OF_NOTE");
  });

  it("should report unknown notes by id and by search text", () => {
    assert.equal(new NoteNotFoundError("n1").message, "Note not found: n1");

    const search = NoteNotFoundError.forSearch("groceries");
    assert.equal(search.message, "No note with text 'groceries' found");
    assert.equal(search.code, "NOTE_NOT_FOUND");
    assert.ok(search instanceof NoteNotFoundError);
  });

  it("should report items without text", () => {
    const error = new NoTextError("folder-1");
    assert.equal(error.message, "No text found in item: folder-1");
    assert.equal(error.code, "NO_TEXT");
  });

  it("should be catchable as NoteStoreError", () => {
    assert.throws(() => {
      throw new StoreNotOpenedError();
    }, NoteStoreError);
  });
});
