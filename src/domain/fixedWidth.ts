import { CANONICAL_HEADER, fieldIndex, type CanonicalRecord, type FieldName } from "./schema.js";
import { collapseWhitespace, sanitizeAscii } from "./normalize.js";
import { FixedWidthLineError } from "./errors.js";

// Flat-file layout. The file carries seven address lines and no AddressType;
// the blank canonical slot is NameAddress7, so the seventh line lands in NameAddress8.
export const FLAT_FILE_LAYOUT: readonly { name: FieldName; width: number }[] = [
  { name: "FileTransmissionDate", width: 8 },
  { name: "UPRR Job Number", width: 6 },
  { name: "LT", width: 9 },
  { name: "Company Name", width: 40 },
  { name: "Company Number", width: 12 },
  { name: "ASTSourceFileDate", width: 8 },
  { name: "Account Number", width: 19 },
  { name: "NameAddress1", width: 40 },
  { name: "NameAddress2", width: 40 },
  { name: "NameAddress3", width: 40 },
  { name: "NameAddress4", width: 40 },
  { name: "NameAddress5", width: 40 },
  { name: "NameAddress6", width: 40 },
  { name: "NameAddress8", width: 40 },
  { name: "Verification Code", width: 4 },
  { name: "Filler", width: 36 },
  { name: "Mailing City", width: 40 },
  { name: "Zip", width: 9 },
  { name: "Mailing State", width: 2 },
  { name: "Shares", width: 14 },
  { name: "Certified", width: 1 },
  { name: "LetterCode", width: 2 },
  { name: "Sequence", width: 6 },
  { name: "Escheatment State", width: 20 }
];

export const FLAT_FILE_LINE_LENGTH = FLAT_FILE_LAYOUT.reduce((sum, f) => sum + f.width, 0);

function stripTerminator(line: string): string {
  return line.replace(/(\r\n|\n|\r)$/, "");
}

/**
 * Decode one flat-file line into a canonical record.
 * Throws FixedWidthLineError when the line is not exactly FLAT_FILE_LINE_LENGTH long.
 */
export function decodeFixedWidthLine(raw: string | Buffer, lineNo: number): CanonicalRecord {
  const line = stripTerminator(sanitizeAscii(raw));
  if (line.length !== FLAT_FILE_LINE_LENGTH) {
    throw new FixedWidthLineError(lineNo, line.length, FLAT_FILE_LINE_LENGTH);
  }

  const record = CANONICAL_HEADER.map(() => "");
  let offset = 0;
  for (const { name, width } of FLAT_FILE_LAYOUT) {
    record[fieldIndex(name)] = collapseWhitespace(line.slice(offset, offset + width));
    offset += width;
  }
  // NameAddress7 and AddressType stay empty.
  return record;
}

/** Inverse of decodeFixedWidthLine, without terminator. Values longer than their slot are cut. */
export function encodeFixedWidthLine(record: CanonicalRecord): string {
  return FLAT_FILE_LAYOUT
    .map(({ name, width }) => (record[fieldIndex(name)] ?? "").slice(0, width).padEnd(width, " "))
    .join("");
}

/** Split a whole flat file into records, skipping lines that are empty once the terminator is gone. */
export function decodeFixedWidthFile(content: Buffer): CanonicalRecord[] {
  const records: CanonicalRecord[] = [];
  const lines = content.toString("latin1").split("\n");
  lines.forEach((line, i) => {
    if (stripTerminator(line) === "") return;
    records.push(decodeFixedWidthLine(line, i + 1));
  });
  return records;
}
