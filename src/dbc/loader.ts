/**
 * Database loading.
 *
 * `.json` files are read as database snapshots; every other file is read as
 * DBC text. All failures surface as LoadError and are not caught here.
 */

import fs from "fs/promises";
import path from "path";
import { LoadError, errorMessage } from "../errors.js";
import { logApplicationEvent } from "../util/logging.js";
import { parseDbc } from "./dbc-parser.js";
import { DatabaseSnapshotSchema } from "./schema.js";
import { createDatabase, createMessageRecord, messageKey, type CanDatabase, type MessageRecord } from "./types.js";

export async function loadDatabase(filePath: string): Promise<CanDatabase> {
  const text = await readText(filePath);
  const records = path.extname(filePath).toLowerCase() === ".json"
    ? parseSnapshot(text, filePath)
    : parseDbc(text, filePath);

  const database = createDatabase(path.basename(filePath), records);
  logApplicationEvent("loader", "loaded", {
    source: database.source,
    messages: database.messages.size,
  });
  return database;
}

/**
 * Parse a JSON database snapshot into message records.
 * @throws LoadError on invalid JSON, a schema violation or a duplicate message key
 */
export function parseSnapshot(text: string, filePath: string): MessageRecord[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new LoadError(filePath, `Invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = DatabaseSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new LoadError(filePath, `Invalid database snapshot - ${issues}`, { cause: parsed.error });
  }

  const seen = new Set<string>();
  return parsed.data.messages.map((message, index) => {
    const key = messageKey(message.name, message.frameId);
    if (seen.has(key)) {
      throw new LoadError(filePath, `Duplicate message ${key} at messages.${index}`);
    }
    seen.add(key);
    return createMessageRecord(message);
  });
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    // fs errors may come from another realm, so test the shape rather than the class
    const code = typeof error === "object" && error !== null && "code" in error ? String(error.code) : undefined;
    const reason = code === "ENOENT" ? "File not found" : `Cannot read file: ${errorMessage(error)}`;
    throw new LoadError(filePath, reason, { cause: error });
  }
}
