import { CANONICAL_FIELDS, getField, withFields, type CanonicalRecord } from "./schema.js";
import { resolveFieldIndexes, type FieldResolution } from "./fieldMapper.js";
import { cleanField } from "./normalize.js";
import { US_STATES } from "./lookups.js";
import { UnknownStateError } from "./errors.js";

export type TabularDecodeResult = {
  records: CanonicalRecord[];
  resolution: FieldResolution;
};

function isEndOfData(row: readonly string[]): boolean {
  for (let i = 0; i < 5; i++) {
    if ((row[i] ?? "").trim() !== "") return false;
  }
  return true;
}

function logResolution(resolution: FieldResolution) {
  console.log(`Fields found:\n${resolution.matchedColumns.join("\n")}\n`);
  console.log(`Fields not found:\n${resolution.missingFields.join("\n")}\n`);
  if (resolution.unmatchedColumns.length) {
    console.log(`Columns not used:\n${resolution.unmatchedColumns.join("\n")}\n`);
  }
}

/**
 * Spreadsheet-style input: row 0 is the header, data runs until the first row
 * whose first five cells are empty.
 */
export function decodeTable(table: readonly (readonly string[])[]): TabularDecodeResult {
  const [header = [], ...rows] = table;
  const resolution = resolveFieldIndexes(header);
  logResolution(resolution);

  const records: CanonicalRecord[] = [];
  for (const [i, row] of rows.entries()) {
    if (isEndOfData(row)) break;
    // Row numbers are 1-based and count the header.
    records.push(decodeRow(row, resolution, i + 2));
  }
  return { records, resolution };
}

export function decodeRow(row: readonly string[], resolution: FieldResolution, rowNo: number): CanonicalRecord {
  const raw = CANONICAL_FIELDS.map((_, i) => {
    const idx = resolution.indexes[i];
    return idx === null || idx === undefined ? "" : cleanField(row[idx]);
  });

  const abbrev = getField(raw, "Escheatment State");
  const stateName = US_STATES.get(abbrev);
  if (stateName === undefined) throw new UnknownStateError(rowNo, abbrev);

  const lt = getField(raw, "LT") || `${getField(raw, "Company Number")}${getField(raw, "Account Number")}`;

  return withFields(raw, { "Escheatment State": stateName, LT: lt });
}
