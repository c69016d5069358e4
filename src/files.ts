import { readFileSync } from "node:fs";
import { FileReadError } from "./errors.js";

export function describeFsError(err: unknown): string {
  if (err instanceof Error && "code" in err) {
    if (err.code === "ENOENT") return "File not found";
    if (err.code === "EISDIR") return "Path is a directory, not a file";
    if (err.code === "EACCES") return "Permission denied";
  }
  return err instanceof Error ? err.message : String(err);
}

export function readTextFile(filePath: string): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new FileReadError(filePath, describeFsError(err));
  }
}
