import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { SJCL_KEY_PARAMS, SjclCipher } from "../src/crypto/sjcl-cipher.js";
import { NotebookManager, REFRESH_INTERVAL_MS } from "../src/store/index.js";
import { parsePasswordList } from "../src/config.js";
import {
  FOLDER_ID,
  KEY_ID,
  MASTER_KEY,
  NOTE_ID,
  PASSPHRASE,
  SECRET_NOTE_ID,
  makeStoreDir,
  writeEncryptedItem,
  writeKeyFile,
  writePlainItem,
} from "./helpers/store-fixture.js";

describe("Integration: reading a synced store", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeStoreDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should unlock, index, read and refresh with the default cipher parameters", () => {
    // Key and items written the way current clients write them
    writeKeyFile(dir, KEY_ID, PASSPHRASE, MASTER_KEY, new SjclCipher(SJCL_KEY_PARAMS));
    writePlainItem(dir, FOLDER_ID, 2, { title: "Travel" });
    writePlainItem(dir, NOTE_ID, 1, {
      title: "Packing",
      body: "Passport\n\nCharger: USB-C",
      properties: { parent_id: FOLDER_ID, created_time: new Date(Date.UTC(2023, 4, 1)), is_todo: false },
    });
    writeEncryptedItem(
      dir,
      SECRET_NOTE_ID,
      1,
      KEY_ID,
      MASTER_KEY,
      { title: "Itinerary", body: "Flight at 9:40\nGate B", properties: { parent_id: FOLDER_ID } },
      new SjclCipher(),
    );

    let clock = Date.UTC(2024, 0, 1);
    const env = { NOTESTORE_PASSWORDS: `${KEY_ID},${PASSPHRASE}\n` };
    const manager = new NotebookManager(() => parsePasswordList(env), { now: () => clock });

    // Step 1: open
    const notebook = manager.open(dir);
    assert.deepEqual(notebook.keyIds, [KEY_ID]);
    assert.equal(notebook.size, 3);
    assert.deepEqual(notebook.loadIssues, []);

    // Step 2: browse the folder
    const children = notebook.listNotes({ parent_id: FOLDER_ID }).map((note) => note.note_id);
    assert.deepEqual(children, [NOTE_ID, SECRET_NOTE_ID]);

    // Step 3: read both notes
    assert.equal(notebook.readNote(NOTE_ID), "Passport\n\nCharger: USB-C");
    assert.deepEqual(notebook.readNoteContent(SECRET_NOTE_ID), {
      note_id: SECRET_NOTE_ID,
      title: "Itinerary",
      body: "Flight at 9:40\nGate B",
    });
    assert.deepEqual(notebook.getProperties(NOTE_ID), {
      title: "Packing",
      body: "Passport\n\nCharger: USB-C",
      created_time: new Date(Date.UTC(2023, 4, 1)),
      is_todo: false,
    });

    // Step 4: edits on disk show up once the cache is stale
    writePlainItem(dir, NOTE_ID, 1, { title: "Packing", body: "Passport only", properties: { parent_id: FOLDER_ID } });
    assert.equal(notebook.readNote(NOTE_ID), "Passport\n\nCharger: USB-C");

    clock += REFRESH_INTERVAL_MS;
    assert.equal(notebook.readNote(NOTE_ID), "Passport only");

    // Step 5: search reaches the encrypted note
    assert.equal(notebook.findNote("gate b").note.note_id, SECRET_NOTE_ID);
  });

  it("should read items written with CRLF line endings", () => {
    writeFileSync(
      join(dir, `${NOTE_ID}.md`),
      `Windows note\r\n\r\nFirst line\r\nSecond line\r\n\r\nid:${NOTE_ID}\r\nencryption_applied:0\r\ntype_:1\r\n`,
    );
    const notebook = new NotebookManager(() => []).open(dir);

    assert.deepEqual(notebook.readNoteContent(NOTE_ID), {
      note_id: NOTE_ID,
      title: "Windows note",
      body: "First line\nSecond line",
    });
  });
});
