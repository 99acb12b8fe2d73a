import { getField, withFields, type CanonicalRecord, type LetterCode } from "./schema.js";
import { formatZip } from "./normalize.js";

export type PreClassification = {
  domestic: CanonicalRecord[];
  /** Mailing State "FO"; country still to be inferred. */
  foreign: CanonicalRecord[];
};

export const FOREIGN_STATE_CODE = "FO";

export function classifyRecord(record: CanonicalRecord, letterCode: LetterCode): { foreign: boolean; record: CanonicalRecord } {
  const stamped = withFields(record, { LetterCode: letterCode });
  if (getField(stamped, "Mailing State") === FOREIGN_STATE_CODE) {
    return { foreign: true, record: withFields(stamped, { Zip: "" }) };
  }
  return {
    foreign: false,
    record: withFields(stamped, { Zip: formatZip(getField(stamped, "Zip")), AddressType: "DOM" })
  };
}

export function classifyRecords(records: readonly CanonicalRecord[], letterCode: LetterCode): PreClassification {
  const out: PreClassification = { domestic: [], foreign: [] };
  for (const r of records) {
    const { foreign, record } = classifyRecord(r, letterCode);
    (foreign ? out.foreign : out.domestic).push(record);
  }
  return out;
}
