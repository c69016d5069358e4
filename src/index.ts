#!/usr/bin/env node

import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { parsePasswordList, resolveStorePath } from "./config.js";
import { NotebookManager } from "./store/index.js";
import { registerStoreTools } from "./tools/store-tools.js";
import { registerNoteTools } from "./tools/note-tools.js";

/**
 * Auto-detect the store directory from the MCP client's roots.
 */
async function resolveStorePathFromRoots(lowLevelServer: Server): Promise<string> {
  const capabilities = lowLevelServer.getClientCapabilities();
  if (!capabilities?.roots) {
    throw new Error(
      "No store path configured and the MCP client does not support roots.\n" +
      "Either pass the store directory as an argument, set NOTESTORE_PATH, or use an MCP client that provides roots.",
    );
  }

  const { roots } = await lowLevelServer.listRoots();

  const fileRoot = roots.find((r) => r.uri.startsWith("file://"));
  if (!fileRoot) {
    throw new Error(
      "No store path configured and no file:// roots found from the MCP client.\n" +
      "Set NOTESTORE_PATH to configure the store location.",
    );
  }

  const rootPath = fileURLToPath(fileRoot.uri);
  console.error(`Auto-detected store path from MCP roots: ${rootPath}`);
  return rootPath;
}

// Mutable config: storePath may be set after MCP initialization
const config = { storePath: resolveStorePath(process.argv, process.env) };
const hasExplicitConfig = config.storePath !== null;

const server = new McpServer(
  {
    name: "notestore-mcp",
    version: "0.1.0",
    title: "Note Store Reader",
  },
  {
    instructions: [
      "This server reads notes from a note store directory. It never writes to the store.",
      "",
      "Typical workflow:",
      "1. Check store_status; call store_open if the store is not open yet.",
      "2. Use list_notes to browse items (filter by type 'note' or 'folder', or by parent_id).",
      "3. Use read_note to get a note's title and body; encrypted notes need their master key passphrase configured in NOTESTORE_PASSWORDS.",
      "4. Use find_note to look a note up by text in its title or body.",
    ].join("\n"),
  },
);

const manager = new NotebookManager(() => parsePasswordList(process.env));

function openStore(path: string): void {
  if (!existsSync(path)) {
    console.error(`Note store not found at ${path}; call store_open once it exists.`);
    return;
  }
  const notebook = manager.open(path);
  console.error(`Indexed ${notebook.size} items with ${notebook.keyIds.length} master keys from ${path}`);
  for (const issue of notebook.loadIssues) {
    console.error(`Skipped ${issue.kind} ${issue.path}: [${issue.code}] ${issue.message}`);
  }
}

// Register tools. store-tools receives a getter so it reads the resolved path at call time
registerStoreTools(server, manager, () => config.storePath);
registerNoteTools(server, manager);

async function main(): Promise<void> {
  const transport = new StdioServerTransport();

  // Open the store on startup (only when its path is already known)
  if (config.storePath !== null) {
    openStore(config.storePath);
  }

  if (!hasExplicitConfig) {
    // Resolve the store path from MCP roots after the handshake completes
    const lowLevelServer = server.server;

    await new Promise<void>((resolve, reject) => {
      lowLevelServer.oninitialized = async () => {
        try {
          const storePath = await resolveStorePathFromRoots(lowLevelServer);
          config.storePath = storePath;
          openStore(storePath);
          resolve();
        } catch (err) {
          reject(err);
        }
      };

      server.connect(transport).catch(reject);
    });
  } else {
    await server.connect(transport);
  }

  console.error(`notestore-mcp running (store: ${config.storePath ?? "not configured"})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
