import { describe, expect, it } from "vitest";
import { ADDRESS_DATA_HEADER, addressDataRow, buildMailingBatch, tallyCounts } from "../../src/domain/batch.js";
import { getField, type CanonicalRecord } from "../../src/domain/schema.js";
import { addressLines, makeRecord } from "../helpers/records.js";

const blank = (n: number) => Array<string>(n).fill("");

const r1 = makeRecord({
  LT: "L1",
  ...addressLines("AL JONES", "1 LAKE DR"),
  "Mailing City": "CHICAGO",
  "Mailing State": "IL",
  Zip: "606011234"
});
const r2 = makeRecord({
  LT: "L2",
  ...addressLines("BOB SMITH", "200 KING ST W"),
  "Mailing City": "TORONTO ON M5V 2T6",
  "Mailing State": "FO",
  Zip: "M5V2T6"
});
const r3 = makeRecord({
  LT: "L3",
  ...addressLines("CARLA RUIZ", "AV JUAREZ 100"),
  "Mailing City": "GUADALAJARA JALISCO",
  "Mailing State": "FO"
});
const r4 = makeRecord({
  LT: "L4",
  ...addressLines("HANS MULLER", "HAUPTSTRASSE 5"),
  "Mailing City": "BERLIN GERMANY",
  "Mailing State": "FO"
});
const r5 = makeRecord({
  LT: "L5",
  ...addressLines("DEB KIM", "9 OAK ST", "APT 2"),
  "Mailing City": "AUSTIN",
  "Mailing State": "TX",
  Zip: "78701"
});

const lts = (records: readonly CanonicalRecord[]) => records.map(r => getField(r, "LT"));

describe("buildMailingBatch", () => {
  const batch = buildMailingBatch([r1, r2, r3, r4, r5], "FC");

  it("emits Mexico, Canada, other foreign, then domestic", () => {
    expect(lts(batch.records)).toEqual(["L3", "L2", "L4", "L1", "L5"]);
    expect(lts(batch.partitions.MEX)).toEqual(["L3"]);
    expect(lts(batch.partitions.CAN)).toEqual(["L2"]);
    expect(lts(batch.partitions.FGN)).toEqual(["L4"]);
    expect(lts(batch.partitions.DOM)).toEqual(["L1", "L5"]);
  });

  it("numbers records from 1 across all partitions", () => {
    expect(batch.records.map(r => getField(r, "Sequence"))).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("stamps letter code, address type and ZIPs", () => {
    expect(batch.records.every(r => getField(r, "LetterCode") === "FC")).toBe(true);
    expect(batch.records.map(r => getField(r, "AddressType"))).toEqual(["MEX", "CAN", "FGN", "DOM", "DOM"]);
    expect(batch.records.map(r => getField(r, "Zip"))).toEqual(["", "", "", "60601-1234", "78701"]);
  });

  it("handles an empty input", () => {
    const empty = buildMailingBatch([], "A");
    expect(empty.records).toEqual([]);
    expect(tallyCounts(empty)).toEqual({ domestic: 0, mexico: 0, canada: 0, other: 0, foreign: 0, total: 0 });
  });
});

describe("tallyCounts", () => {
  it("counts each partition", () => {
    expect(tallyCounts(buildMailingBatch([r1, r2, r3, r4, r5], "FC"))).toEqual({
      domestic: 2,
      mexico: 1,
      canada: 1,
      other: 1,
      foreign: 3,
      total: 5
    });
  });
});

describe("addressDataRow", () => {
  const [, canada, , , austin] = buildMailingBatch([r1, r2, r3, r4, r5], "FC").records;

  it("has one value per header column", () => {
    expect(ADDRESS_DATA_HEADER).toHaveLength(19);
    expect(addressDataRow(austin)).toHaveLength(19);
  });

  it("lays out a domestic record with an apartment line", () => {
    expect(addressDataRow(austin)).toEqual([
      "", "", "", "5",
      "DEB KIM", ...blank(7),
      "9 OAK ST", "APT 2", "AUSTIN", "TX", "78701",
      "L5", "5"
    ]);
  });

  it("lays out a foreign record with the city folded into the name lines", () => {
    expect(addressDataRow(canada)).toEqual([
      "", "", "", "2",
      "BOB SMITH", "200 KING ST W", "TORONTO ON M5V 2T6", ...blank(5),
      "", "", "", "", "",
      "L2", "2"
    ]);
  });
});
