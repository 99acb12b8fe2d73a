import { ADDRESS_SLOTS, compactAddressLines, getField, type CanonicalRecord } from "./schema.js";

export type MailingBlock = {
  nameLines: string[];
  deliveryAddress: string;
  alternateAddress: string;
  city: string;
  state: string;
  zip: string;
};

// Apartment / suite / floor qualifiers that belong in the Alternate Address slot.
export const APARTMENT_LINE =
  /^((#|B(UI)?LD(IN)?G|SUITE|LOT|UNIT|FLOOR|R(OO)?M|AP(ARTMEN)?T).+|(\d{1,4}\s?\w)|(\d{1,3}(ST|ND|RD|TH)?\s?FL(OO)?R?))$/i;

/** Right-pad with blanks to `slots` entries. Overflow is joined into the last slot. */
export function fitSlots(lines: readonly string[], slots = ADDRESS_SLOTS): string[] {
  if (lines.length <= slots) return [...lines, ...Array<string>(slots - lines.length).fill("")];
  return [...lines.slice(0, slots - 1), lines.slice(slots - 1).join(" ")];
}

export function isApartmentLine(line: string): boolean {
  return APARTMENT_LINE.test(line);
}

export function formatForeignAddress(lines: readonly string[], city: string): MailingBlock {
  return {
    nameLines: fitSlots([...lines, city]),
    deliveryAddress: "",
    alternateAddress: "",
    city: "",
    state: "",
    zip: ""
  };
}

export function formatDomesticAddress(
  lines: readonly string[],
  place: { city: string; state: string; zip: string }
): MailingBlock {
  if (lines.length < 2) {
    return { nameLines: fitSlots(lines), deliveryAddress: "", alternateAddress: "", ...place };
  }

  const last = lines[lines.length - 1];
  if (isApartmentLine(last) && lines.length > 2) {
    return {
      nameLines: fitSlots(lines.slice(0, -2)),
      deliveryAddress: lines[lines.length - 2],
      alternateAddress: last,
      ...place
    };
  }
  return { nameLines: fitSlots(lines.slice(0, -1)), deliveryAddress: last, alternateAddress: "", ...place };
}

const FOREIGN_TYPES: ReadonlySet<string> = new Set(["MEX", "CAN", "FGN"]);

export function formatAddressBlock(record: CanonicalRecord): MailingBlock {
  const lines = compactAddressLines(record);
  if (FOREIGN_TYPES.has(getField(record, "AddressType"))) {
    return formatForeignAddress(lines, getField(record, "Mailing City"));
  }
  return formatDomesticAddress(lines, {
    city: getField(record, "Mailing City"),
    state: getField(record, "Mailing State"),
    zip: getField(record, "Zip")
  });
}

/** The 11 columns of the block as the print vendor expects them. */
export function mailingBlockColumns(block: MailingBlock): string[] {
  return [
    ...block.nameLines,
    block.deliveryAddress,
    block.alternateAddress,
    block.city,
    block.state,
    block.zip
  ];
}
