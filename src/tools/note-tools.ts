import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { NotebookManager } from "../store/index.js";
import { NoteStoreError } from "../errors.js";
import { ITEM_TYPES } from "../types.js";

export function registerNoteTools(server: McpServer, manager: NotebookManager): void {
  server.registerTool(
    "list_notes",
    {
      description:
        "List indexed items with their metadata (type, parent folder, encryption key). " +
        "Content is not read. Filter by item type or parent folder id.",
      inputSchema: {
        type: z.enum(ITEM_TYPES).optional().describe("Only items of this type, e.g. 'note' or 'folder'."),
        parent_id: z.string().optional().describe("Only items inside this folder."),
      },
    },
    async ({ type, parent_id }) => {
      try {
        const notes = manager.notebook.listNotes({ type, parent_id });
        return {
          content: [{ type: "text", text: JSON.stringify(notes, null, 2) }],
        };
      } catch (err) {
        if (err instanceof NoteStoreError) {
          return { isError: true, content: [{ type: "text" as const, text: err.message }] };
        }
        throw err;
      }
    },
  );

  server.registerTool(
    "get_note",
    {
      description: "Retrieve an item's metadata by its ID without reading or decrypting its content.",
      inputSchema: {
        note_id: z.string().describe("The item ID (its filename without extension)."),
      },
    },
    async ({ note_id }) => {
      try {
        const note = manager.notebook.getNote(note_id);
        return {
          content: [{ type: "text", text: JSON.stringify(note, null, 2) }],
        };
      } catch (err) {
        if (err instanceof NoteStoreError) {
          return { isError: true, content: [{ type: "text" as const, text: err.message }] };
        }
        throw err;
      }
    },
  );

  server.registerTool(
    "read_note",
    {
      description:
        "Read a note's title, body and properties. Encrypted notes are decrypted with their master key. " +
        "Content is cached and re-read from disk after 12 hours.",
      inputSchema: {
        note_id: z.string().describe("The note ID to read."),
      },
    },
    async ({ note_id }) => {
      try {
        const notebook = manager.notebook;
        const { title, body } = notebook.readNoteContent(note_id);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  note_id,
                  title,
                  body,
                  properties: notebook.getProperties(note_id),
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (err) {
        if (err instanceof NoteStoreError) {
          return { isError: true, content: [{ type: "text" as const, text: err.message }] };
        }
        throw err;
      }
    },
  );

  server.registerTool(
    "find_note",
    {
      description:
        "Find the first note whose title or body contains the given text (case-insensitive). " +
        "Reads and decrypts notes as needed; notes that cannot be read are listed as skipped.",
      inputSchema: {
        search_text: z.string().min(1).describe("Text to look for."),
      },
    },
    async ({ search_text }) => {
      try {
        const { note, skipped } = manager.notebook.findNote(search_text);
        return {
          content: [{ type: "text", text: JSON.stringify({ ...note, skipped }, null, 2) }],
        };
      } catch (err) {
        if (err instanceof NoteStoreError) {
          return { isError: true, content: [{ type: "text" as const, text: err.message }] };
        }
        throw err;
      }
    },
  );
}
