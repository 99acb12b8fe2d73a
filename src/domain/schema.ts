// Canonical record layout. Order is the output column order for every artifact.

export const CANONICAL_FIELDS = [
  { name: "FileTransmissionDate", pattern: /^FileTransmissionDate/ },
  { name: "UPRR Job Number", pattern: /^UPRR\s?Job\s?Number/ },
  { name: "LT", pattern: /^XRX\s?Acct\s?Seq/ },
  { name: "Company Name", pattern: /^Issue\s?Name/ },
  { name: "Company Number", pattern: /^Company/ },
  { name: "ASTSourceFileDate", pattern: /^ASTSourceFileDate/ },
  { name: "Account Number", pattern: /^Account\s?(Number)?/ },
  { name: "NameAddress1", pattern: /^Name\/?\s?Address\s?1/ },
  { name: "NameAddress2", pattern: /^Name\/?\s?Address\s?2/ },
  { name: "NameAddress3", pattern: /^Name\/?\s?Address\s?3/ },
  { name: "NameAddress4", pattern: /^Name\/?\s?Address\s?4/ },
  { name: "NameAddress5", pattern: /^Name\/?\s?Address\s?5/ },
  { name: "NameAddress6", pattern: /^Name\/?\s?Address\s?6/ },
  { name: "NameAddress7", pattern: /^Name\/?\s?Address\s?7/ },
  { name: "NameAddress8", pattern: /^Name\/?\s?Address\s?8/ },
  { name: "Verification Code", pattern: /^Verification\s?Code/ },
  { name: "Filler", pattern: /^Filler/ },
  { name: "Mailing City", pattern: /^City/ },
  { name: "Zip", pattern: /^Zip/ },
  { name: "Mailing State", pattern: /^(Mailing\s?)?State/ },
  { name: "Shares", pattern: /^Eligible\s?Shares/ },
  { name: "Certified", pattern: /^Certified/ },
  { name: "LetterCode", pattern: /^Letter\s?Code/ },
  { name: "Sequence", pattern: /^Sequence/ },
  { name: "Escheatment State", pattern: /^(Escheatment|Eligibility)\s?State/ },
  { name: "AddressType", pattern: /^Address\s?Type/ }
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];
export type FieldName = CanonicalField["name"];

export const CANONICAL_HEADER: readonly FieldName[] = CANONICAL_FIELDS.map(f => f.name);

export const ADDRESS_LINE_FIELDS = [
  "NameAddress1",
  "NameAddress2",
  "NameAddress3",
  "NameAddress4",
  "NameAddress5",
  "NameAddress6",
  "NameAddress7",
  "NameAddress8"
] as const satisfies readonly FieldName[];

export const ADDRESS_SLOTS = ADDRESS_LINE_FIELDS.length;

/** One value per canonical field, in CANONICAL_HEADER order. */
export type CanonicalRecord = readonly string[];

export type AddressType = "DOM" | "CAN" | "MEX" | "FGN";

export const LETTER_CODES = ["A", "AC", "FA", "FC", "R", "RC"] as const;
export type LetterCode = (typeof LETTER_CODES)[number];

export const LETTER_CODE_LABELS: Record<LetterCode, string> = {
  A: "DDA",
  AC: "DDAC",
  FA: "DDFA",
  FC: "DDFC",
  R: "DDR",
  RC: "DDRC"
};

export function isLetterCode(value: string): value is LetterCode {
  return LETTER_CODES.some(code => code === value);
}

const FIELD_INDEX = new Map<FieldName, number>(CANONICAL_HEADER.map((name, i) => [name, i]));

export function fieldIndex(name: FieldName): number {
  const idx = FIELD_INDEX.get(name);
  if (idx === undefined) throw new Error(`Unknown canonical field: ${name}`);
  return idx;
}

export function getField(record: CanonicalRecord, name: FieldName): string {
  return record[fieldIndex(name)] ?? "";
}

export function withFields(record: CanonicalRecord, values: Partial<Record<FieldName, string>>): CanonicalRecord {
  const next = [...record];
  CANONICAL_HEADER.forEach((name, i) => {
    const value = values[name];
    if (value !== undefined) next[i] = value;
  });
  return next;
}

export function emptyRecord(): string[] {
  return CANONICAL_HEADER.map(() => "");
}

/** Address lines that carry data: blank and literal "NULL" entries removed, order kept. */
export function compactAddressLines(record: CanonicalRecord): string[] {
  return ADDRESS_LINE_FIELDS
    .map(name => getField(record, name))
    .filter(line => line !== "" && line.toUpperCase() !== "NULL");
}
