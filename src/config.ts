export const STORE_PATH_ENV = "NOTESTORE_PATH";
export const PASSWORDS_ENV = "NOTESTORE_PASSWORDS";

type Env = Record<string, string | undefined>;

/**
 * Resolve the store directory from explicit configuration (CLI arg, env var).
 * Returns null when neither is set; the path then comes from the MCP client's
 * roots once the handshake completes.
 */
export function resolveStorePath(argv: readonly string[], env: Env): string | null {
  // 1. Explicit CLI argument
  if (argv[2]) return argv[2];

  // 2. Explicit env var
  const fromEnv = env[STORE_PATH_ENV];
  if (fromEnv) return fromEnv;

  return null;
}

/**
 * `<key_id>,<passphrase>` entries, one per line. Passphrases may contain
 * commas and spaces, so lines are not trimmed beyond a trailing `\r`.
 */
export function parsePasswordList(env: Env): string[] {
  const raw = env[PASSWORDS_ENV];
  if (!raw) return [];

  return raw
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line))
    .filter((line) => line.trim() !== "");
}
