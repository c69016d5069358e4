/**
 * Split text into lines the way the store's producer writes them: `\n`
 * separated, an optional `\r` before it dropped, and no empty trailing line
 * when the text ends with a newline.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();

  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

export interface KeyValue {
  key: string;
  value: string;
}

/** Split a line on its first colon. Returns null when there is no colon. */
export function splitKeyValue(line: string): KeyValue | null {
  const colon = line.indexOf(":");
  if (colon === -1) return null;
  return { key: line.slice(0, colon).trim(), value: line.slice(colon + 1).trim() };
}

/**
 * Forward scan of `key:value` lines. Lines without a colon are ignored and a
 * later duplicate overwrites an earlier one.
 */
export function scanKeyValues(lines: Iterable<string>): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of lines) {
    const pair = splitKeyValue(line);
    if (pair) values.set(pair.key, pair.value);
  }
  return values;
}
