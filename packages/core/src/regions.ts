import { readFile } from "node:fs/promises";

import { RegionTableError } from "./errors.js";
import type { RegionTable } from "./types.js";

export async function loadRegionTable(filePath: string): Promise<RegionTable> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegionTableError(`cannot read region table ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegionTableError(`invalid JSON in region table ${filePath}: ${message}`);
  }

  return regionTableFromRecord(parsed);
}

export function regionTableFromRecord(input: unknown): RegionTable {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new RegionTableError("region table must be an object of subdomain code to region name");
  }

  const table = new Map<string, string>();
  for (const [code, region] of Object.entries(input)) {
    if (typeof region !== "string" || region.trim().length === 0) {
      throw new RegionTableError(`invalid region for subdomain ${JSON.stringify(code)}`);
    }
    table.set(code.toLowerCase(), region);
  }

  return table;
}
