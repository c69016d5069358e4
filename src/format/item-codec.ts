import { z } from "zod";
import { InvalidFormatError } from "../errors.js";
import type { ItemType, NoteProperties } from "../types.js";
import { itemTypeFromCode } from "../types.js";
import { splitKeyValue } from "./key-value.js";
import { formatItemTime, parseFlag, parseFloatStrict, parseInteger, parseItemTime } from "./item-values.js";

export interface DeserializedItem {
  type: ItemType;
  properties: Map<string, string>;
}

/**
 * Deserialize `title\n\nbody\n\nkey:value...` text. The body may contain
 * blank lines and colons, so the property block is found by walking the
 * lines backwards up to the first blank line.
 */
export function deserializeItem(lines: readonly string[]): DeserializedItem {
  const properties = new Map<string, string>();
  const body: string[] = [];
  let state: "props" | "body" = "props";

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];

    if (state === "body") {
      body.unshift(line);
      continue;
    }

    if (line.trim() === "") {
      state = "body";
      continue;
    }

    const pair = splitKeyValue(line);
    if (!pair) {
      throw new InvalidFormatError(`property line without a colon: '${line.trim()}'`);
    }
    // Walking backwards: the last assignment is the first in reading order.
    properties.set(pair.key, pair.value);
  }

  const typeCode = parseInteger(properties.get("type_") ?? "");
  if (typeCode === null) {
    throw new InvalidFormatError("missing required property: type_");
  }
  const type = itemTypeFromCode(typeCode);

  const title = body.shift();
  if (title !== undefined) {
    properties.set("title", title);
    body.shift(); // blank separator after the title
  }
  if (type === "note") {
    properties.set("body", body.join("\n"));
  }

  return { type, properties };
}

// ---- Typed properties ----

function scalar<T>(parse: (value: string) => T | null) {
  return z
    .string()
    .transform((value, ctx) => {
      const parsed = parse(value);
      if (parsed === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable value '${value}'` });
        return z.NEVER;
      }
      return parsed;
    })
    .optional()
    .catch(undefined);
}

const text = z.string().optional().catch(undefined);
const time = scalar(parseItemTime);
const float = scalar(parseFloatStrict);
const flag = scalar(parseFlag);
const int32 = scalar((value) => parseInteger(value));

const notePropertiesSchema = z.object({
  title: text,
  body: text,
  created_time: time,
  altitude: float,
  latitude: float,
  longitude: float,
  author: text,
  source_url: text,
  is_todo: flag,
  todo_due: flag,
  todo_completed: flag,
  source: text,
  source_application: text,
  application_data: text,
  order: int32,
  user_created_time: time,
  user_updated_time: time,
  markup_language: text,
  is_shared: flag,
});

/**
 * Convert raw properties into their typed form. A value that does not parse
 * leaves its field absent; unknown keys are dropped.
 */
export function toNoteProperties(properties: ReadonlyMap<string, string>): NoteProperties {
  const parsed = notePropertiesSchema.parse(Object.fromEntries(properties));

  const result: NoteProperties = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

// ---- Serialization ----

export type PropertyValue = string | number | boolean | Date;

export interface SerializableItem {
  title?: string;
  body?: string;
  properties: Record<string, PropertyValue | undefined>;
}

function formatProperty(value: PropertyValue): string {
  if (value instanceof Date) return formatItemTime(value);
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

/** Inverse of {@link deserializeItem}: absent parts are left out entirely. */
export function serializeItem(item: SerializableItem): string {
  const parts: string[] = [];
  if (item.title !== undefined) parts.push(item.title);
  if (item.body) parts.push(item.body);

  const props = Object.entries(item.properties)
    .filter((entry): entry is [string, PropertyValue] => entry[1] !== undefined)
    .map(([key, value]) => `${key}:${formatProperty(value)}`);
  if (props.length > 0) parts.push(props.join("\n"));

  return parts.join("\n\n");
}
