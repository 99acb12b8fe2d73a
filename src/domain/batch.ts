import { getField, withFields, type AddressType, type CanonicalRecord, type LetterCode } from "./schema.js";
import { classifyRecords } from "./classifier.js";
import { assignCountries } from "./countryInference.js";
import { formatAddressBlock, mailingBlockColumns } from "./addressBlock.js";

// Emission order; the sequence counter runs across all four in this order.
export const OUTPUT_ORDER: readonly AddressType[] = ["MEX", "CAN", "FGN", "DOM"];

export const ADDRESS_DATA_HEADER = [
  "IM barcode Digits",
  "OEL",
  "Sack and Pack Numbers",
  "Presort Sequence",
  "Full Name",
  "Name2",
  "Name3",
  "Name4",
  "Name5",
  "Name6",
  "Name7",
  "Name8",
  "Delivery Address",
  "Alternate 1 Address",
  "City",
  "State",
  "ZIP+4",
  "LTNo",
  "SEQ"
] as const;

export type MailingBatch = {
  partitions: Record<AddressType, CanonicalRecord[]>;
  /** All records in emission order with Sequence stamped. */
  records: CanonicalRecord[];
};

export type MailingCounts = {
  domestic: number;
  mexico: number;
  canada: number;
  other: number;
  foreign: number;
  total: number;
};

export function buildMailingBatch(decoded: readonly CanonicalRecord[], letterCode: LetterCode): MailingBatch {
  const { domestic, foreign } = classifyRecords(decoded, letterCode);
  const byCountry = assignCountries(foreign);

  const grouped: Record<AddressType, CanonicalRecord[]> = { ...byCountry, DOM: domestic };
  const partitions: Record<AddressType, CanonicalRecord[]> = { MEX: [], CAN: [], FGN: [], DOM: [] };
  const records: CanonicalRecord[] = [];

  let seq = 0;
  for (const type of OUTPUT_ORDER) {
    for (const record of grouped[type]) {
      const sequenced = withFields(record, { Sequence: String(++seq) });
      partitions[type].push(sequenced);
      records.push(sequenced);
    }
  }
  return { partitions, records };
}

export function tallyCounts(batch: MailingBatch): MailingCounts {
  const { MEX, CAN, FGN, DOM } = batch.partitions;
  const foreign = MEX.length + CAN.length + FGN.length;
  return {
    domestic: DOM.length,
    mexico: MEX.length,
    canada: CAN.length,
    other: FGN.length,
    foreign,
    total: DOM.length + foreign
  };
}

/** One AddressData row: presort placeholders, the mailing block, then LT and sequence. */
export function addressDataRow(record: CanonicalRecord): string[] {
  const seq = getField(record, "Sequence");
  const block = mailingBlockColumns(formatAddressBlock(record));
  return ["", "", "", seq, ...block, getField(record, "LT"), seq];
}
