import { compactAddressLines, getField, withFields, type AddressType, type CanonicalRecord } from "./schema.js";
import { CANADA_PLACES, MEXICO_PLACES } from "./lookups.js";

export type ForeignAddressType = Exclude<AddressType, "DOM">;

type Evidence = {
  city: string;
  lastAddressLine: string;
};

type CountryRule = {
  type: ForeignAddressType;
  matches: ((e: Evidence) => boolean)[];
  /** Checked after a match; a hit sends the record on to the next rule. */
  veto: (e: Evidence) => boolean;
};

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordList(words: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${words.map(escapeRegex).join("|")})\\b`, "i");
}

const CANADA_POSTAL = /\b[ABCEGHJ-NPRSTVXY][0-9][ABCEGHJ-NPRSTV-Z][\s-]?[0-9][ABCEGHJ-NPRSTV-Z][0-9]\b/i;
const ONTARIO_QUEBEC_FSA = /\b(?:ON|QC)\s[ABCEGHJ-NPRSTVXY][0-9][ABCEGHJ-NPRSTV-Z]/i;
const CANADA_KEYWORDS = wordList(["CANADA", "TORONTO", "ONTARIO", "QUEBEC", "ALBERTA", "MONTREAL"]);
const CANADA_PLACE_NAMES = wordList(CANADA_PLACES);
const NOT_CANADA = wordList(["LONDON", "UK", "UNIT", "GBR", "AUS", "AUSTRALIA"]);

const MEXICO_PLACE_NAMES = wordList(MEXICO_PLACES);
const NOT_MEXICO = wordList(["SPAIN", "ESPANA", "ITALY"]);

// Evaluated in order; first rule with evidence and no veto wins.
export const COUNTRY_RULES: readonly CountryRule[] = [
  {
    type: "CAN",
    matches: [
      e => CANADA_POSTAL.test(e.city),
      e => ONTARIO_QUEBEC_FSA.test(e.city),
      e => CANADA_KEYWORDS.test(e.lastAddressLine),
      e => CANADA_PLACE_NAMES.test(e.city)
    ],
    // Only the city text is checked, even when the Canadian evidence came from the address line.
    veto: e => NOT_CANADA.test(e.city)
  },
  {
    type: "MEX",
    matches: [e => MEXICO_PLACE_NAMES.test(e.city)],
    veto: e => NOT_MEXICO.test(e.city)
  }
];

export function evidenceFor(record: CanonicalRecord): Evidence {
  const lines = compactAddressLines(record);
  return {
    city: getField(record, "Mailing City"),
    lastAddressLine: lines[lines.length - 1] ?? ""
  };
}

export function inferCountry(record: CanonicalRecord): ForeignAddressType {
  const evidence = evidenceFor(record);
  for (const rule of COUNTRY_RULES) {
    if (!rule.matches.some(m => m(evidence))) continue;
    if (rule.veto(evidence)) continue;
    return rule.type;
  }
  return "FGN";
}

export function compareCity(a: CanonicalRecord, b: CanonicalRecord): number {
  const ca = getField(a, "Mailing City");
  const cb = getField(b, "Mailing City");
  return ca < cb ? -1 : ca > cb ? 1 : 0;
}

export type ForeignPartitions = Record<ForeignAddressType, CanonicalRecord[]>;

/** Sort the foreign set by city, then stamp and bucket each record by inferred country. */
export function assignCountries(foreign: readonly CanonicalRecord[]): ForeignPartitions {
  const out: ForeignPartitions = { MEX: [], CAN: [], FGN: [] };
  for (const record of [...foreign].sort(compareCity)) {
    const type = inferCountry(record);
    out[type].push(withFields(record, { AddressType: type }));
  }
  return out;
}
