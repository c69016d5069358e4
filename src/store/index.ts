export { NotebookManager } from "./manager.js";
export { Notebook, parsePasswordEntry } from "./notebook.js";
export { NoteRecord, REFRESH_INTERVAL_MS } from "./note-record.js";
