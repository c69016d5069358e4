import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Notebook, NotebookManager } from "../store/index.js";

export function registerStoreTools(
  server: McpServer,
  manager: NotebookManager,
  getStorePath: () => string | null,
): void {
  server.registerTool(
    "store_status",
    {
      description:
        "Check the note store status. Returns whether a store is open, how many items and master keys " +
        "were loaded, and which key or item files were skipped.",
    },
    async () => {
      if (!manager.isOpen()) {
        return {
          content: [
            {
              type: "text",
              text: JSON.stringify({ open: false, path: getStorePath() }, null, 2),
            },
          ],
        };
      }

      const notebook = manager.notebook;
      const notes = notebook.listNotes();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                open: true,
                path: manager.path,
                stats: {
                  items: notes.length,
                  notes: notes.filter((n) => n.type === "note").length,
                  encrypted: notes.filter((n) => n.encryption_applied).length,
                  keys: notebook.keyIds.length,
                },
                key_ids: notebook.keyIds,
                load_issues: notebook.loadIssues,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );

  server.registerTool(
    "store_open",
    {
      description:
        "Open (or re-open) the note store. Unlocks the configured master keys and indexes every item file. " +
        "Re-opening drops all cached note content.",
      inputSchema: {
        path: z.string().optional().describe("Store directory. Uses the configured default if omitted."),
      },
    },
    async ({ path: overridePath }) => {
      const targetPath = overridePath ?? getStorePath();
      if (!targetPath) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: "No store path configured. Pass a path or set NOTESTORE_PATH.",
            },
          ],
        };
      }

      let notebook: Notebook;
      try {
        notebook = manager.open(targetPath);
      } catch (err) {
        return {
          isError: true,
          content: [{ type: "text" as const, text: `Failed to open note store: ${err}` }],
        };
      }

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                open: true,
                path: targetPath,
                items: notebook.size,
                keys: notebook.keyIds.length,
                skipped: notebook.loadIssues.length,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
