import fs from "node:fs";
import { parse } from "smol-toml";
import { IoError, errorMessage } from "../core/errors.js";

export type TomlTable = Record<string, unknown>;

export function isTable(val: unknown): val is TomlTable {
  return val !== null && typeof val === "object" && !Array.isArray(val) && !(val instanceof Date);
}

/** Read and parse a TOML file. Unreadable or unparsable files are fatal. */
export function readToml(filePath: string): TomlTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new IoError("MANIFEST_UNREADABLE", `Cannot read ${filePath}: ${errorMessage(e)}`, filePath, { cause: e });
  }

  try {
    return parse(raw);
  } catch (e) {
    throw new IoError("MANIFEST_UNREADABLE", `Cannot parse ${filePath}: ${errorMessage(e)}`, filePath, { cause: e });
  }
}

/** Look up a nested table, returning an empty table when any level is missing. */
export function tableAt(doc: TomlTable, ...keys: string[]): TomlTable {
  let current: TomlTable = doc;
  for (const key of keys) {
    const next = current[key];
    if (!isTable(next)) return {};
    current = next;
  }
  return current;
}

export function stringAt(table: TomlTable, key: string): string | undefined {
  const val = table[key];
  return typeof val === "string" ? val : undefined;
}

export function stringsAt(table: TomlTable, key: string): string[] {
  const val = table[key];
  if (!Array.isArray(val)) return [];
  return val.filter((v): v is string => typeof v === "string");
}
