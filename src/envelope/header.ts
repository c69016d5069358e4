import { InvalidFormatError, UnknownEncryptionMethodError } from "../errors.js";
import type { EncryptionHeader } from "../types.js";
import { encryptionMethodCode, encryptionMethodFromCode } from "../types.js";
import { parseHex } from "../format/item-values.js";

export const HEADER_IDENTIFIER = "JED";
export const HEADER_VERSION = 1;
/** Method (2) + master key id (32). The only header shape supported. */
export const HEADER_METADATA_LENGTH = 34;
export const MASTER_KEY_ID_LENGTH = 32;
/** Characters to skip before the first chunk. */
export const HEADER_SIZE = 3 + 2 + 6 + HEADER_METADATA_LENGTH;

/** Forward-only reader over a ciphertext field. */
export class CharStream {
  private offset: number;

  constructor(
    private readonly text: string,
    start = 0,
  ) {
    this.offset = start;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return Math.max(0, this.text.length - this.offset);
  }

  /** Consume up to `count` characters; fewer come back at the end of the text. */
  take(count: number): string {
    const slice = this.text.slice(this.offset, this.offset + count);
    this.offset += slice.length;
    return slice;
  }
}

function takeField(stream: CharStream, width: number): string {
  const field = stream.take(width);
  if (field.length !== width) {
    throw new InvalidFormatError("encryption header has invalid size");
  }
  return field;
}

function takeHexField(stream: CharStream, width: number, name: string): number {
  const value = parseHex(takeField(stream, width));
  if (value === null) {
    throw new InvalidFormatError(`encryption header ${name} is not a hex number`);
  }
  return value;
}

/**
 * Parse the fixed-width header at the start of `encryption_cipher_text`:
 *
 *   JED | version (2 hex) | length (6 hex) | method (2 hex) | master key id (32)
 */
export function parseEncryptionHeader(input: string | CharStream): EncryptionHeader {
  const stream = typeof input === "string" ? new CharStream(input) : input;

  if (takeField(stream, HEADER_IDENTIFIER.length) !== HEADER_IDENTIFIER) {
    throw new InvalidFormatError(`encryption header identifier is not '${HEADER_IDENTIFIER}'`);
  }

  const version = takeHexField(stream, 2, "version");
  if (version !== HEADER_VERSION) {
    throw new InvalidFormatError(`unsupported encryption header version ${version}, expected 01`);
  }

  const length = takeHexField(stream, 6, "length");
  if (length !== HEADER_METADATA_LENGTH) {
    throw new InvalidFormatError(`encryption header length must be ${HEADER_METADATA_LENGTH} (method + master key id), got ${length}`);
  }

  const methodCode = takeHexField(stream, 2, "method");
  const method = encryptionMethodFromCode(methodCode);
  if (method === "undefined") {
    throw new UnknownEncryptionMethodError(methodCode);
  }

  const master_key_id = takeField(stream, MASTER_KEY_ID_LENGTH);

  return { version, length, method, master_key_id };
}

function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, "0");
}

export function serializeEncryptionHeader(header: EncryptionHeader): string {
  return (
    HEADER_IDENTIFIER +
    hex(header.version, 2) +
    hex(header.length, 6) +
    hex(encryptionMethodCode(header.method), 2) +
    header.master_key_id
  );
}
