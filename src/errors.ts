export class NoteStoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "NoteStoreError";
  }
}

export class StoreNotOpenedError extends NoteStoreError {
  constructor() {
    super("Note store is not opened. Call store_open first.", "STORE_NOT_OPENED");
    this.name = "StoreNotOpenedError";
  }
}

export class FileReadError extends NoteStoreError {
  constructor(filePath: string, cause: string) {
    super(`Failed to read file '${filePath}': ${cause}`, "FILE_READ_ERROR");
    this.name = "FileReadError";
  }
}

export class InvalidFormatError extends NoteStoreError {
  constructor(message: string, code = "INVALID_FORMAT") {
    super(`Invalid format: ${message}`, code);
    this.name = "InvalidFormatError";
  }
}

export class UnknownEncryptionMethodError extends InvalidFormatError {
  constructor(code: number) {
    super(`unknown encryption method 0x${code.toString(16).padStart(2, "0")}`, "UNKNOWN_ENCRYPTION_METHOD");
    this.name = "UnknownEncryptionMethodError";
  }
}

export class NoEncryptionTextError extends InvalidFormatError {
  constructor() {
    super("no encryption_cipher_text in encrypted item", "NO_ENCRYPTION_TEXT");
    this.name = "NoEncryptionTextError";
  }
}

export class KeyIdMismatchError extends NoteStoreError {
  constructor(expected: string, actual: string) {
    super(`Key id mismatch: expected '${expected}', key file holds '${actual}'`, "KEY_ID_MISMATCH");
    this.name = "KeyIdMismatchError";
  }
}

export class NoEncryptionKeyError extends NoteStoreError {
  constructor(
    public readonly keyId: string,
    detail?: string,
  ) {
    super(
      detail ? `Encryption key '${keyId}' not found: ${detail}` : `Encryption key '${keyId}' not found`,
      "NO_ENCRYPTION_KEY",
    );
    this.name = "NoEncryptionKeyError";
  }
}

export class DecryptionError extends NoteStoreError {
  constructor(message: string) {
    super(`Failed to decrypt: ${message}`, "DECRYPTION_ERROR");
    this.name = "DecryptionError";
  }
}

export class UnexpectedEndOfNoteError extends NoteStoreError {
  constructor(expected: number, available: number) {
    super(`Unexpected end of note: chunk declares ${expected} characters, ${available} remain`, "UNEXPECTED_END_OF_NOTE");
    this.name = "UnexpectedEndOfNoteError";
  }
}

export class NoteNotFoundError extends NoteStoreError {
  constructor(noteId: string) {
    super(`Note not found: ${noteId}`, "NOTE_NOT_FOUND");
    this.name = "NoteNotFoundError";
  }

  static forSearch(searchText: string): NoteNotFoundError {
    const error = new NoteNotFoundError(searchText);
    error.message = `No note with text '${searchText}' found`;
    return error;
  }
}

export class NoTextError extends NoteStoreError {
  constructor(noteId: string) {
    super(`No text found in item: ${noteId}`, "NO_TEXT");
    this.name = "NoTextError";
  }
}
