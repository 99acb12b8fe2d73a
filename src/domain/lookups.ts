import fs from "fs";
import { fileURLToPath } from "url";

// data/ sits two levels up from both src/domain and dist/domain.
const DATA_DIR = new URL("../../data/", import.meta.url);

function readJson(name: string): unknown {
  return JSON.parse(fs.readFileSync(fileURLToPath(new URL(name, DATA_DIR)), "utf8"));
}

function loadStringMap(name: string): ReadonlyMap<string, string> {
  const data = readJson(name);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`${name}: expected an object of strings`);
  }
  const out = new Map<string, string>();
  for (const [k, v] of Object.entries(data)) {
    if (typeof v !== "string") throw new Error(`${name}: value for "${k}" is not a string`);
    out.set(k, v);
  }
  return out;
}

function loadStringList(name: string): readonly string[] {
  const data = readJson(name);
  if (!Array.isArray(data) || !data.every((v): v is string => typeof v === "string")) {
    throw new Error(`${name}: expected an array of strings`);
  }
  return Array.from(new Set(data));
}

/** Two-letter US state/territory abbreviation -> full name. */
export const US_STATES = loadStringMap("us-states.json");

export const CANADA_PLACES = loadStringList("canada-places.json");
export const MEXICO_PLACES = loadStringList("mexico-places.json");
