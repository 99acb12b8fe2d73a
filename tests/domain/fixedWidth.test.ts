import { describe, expect, it } from "vitest";
import {
  FLAT_FILE_LINE_LENGTH,
  decodeFixedWidthFile,
  decodeFixedWidthLine,
  encodeFixedWidthLine
} from "../../src/domain/fixedWidth.js";
import { FixedWidthLineError } from "../../src/domain/errors.js";
import { getField } from "../../src/domain/schema.js";
import { flatLine } from "../helpers/records.js";

const VALUES = {
  FileTransmissionDate: "20240301",
  "UPRR Job Number": "J00042",
  LT: "LT0000001",
  "Company Name": "ACME   HOLDINGS",
  "Company Number": "C0001",
  ASTSourceFileDate: "20240215",
  "Account Number": "A000123",
  NameAddress1: "JOHN   DOE",
  NameAddress2: "123 MAIN ST",
  NameAddress3: "APT 4B",
  "Mailing City": "SPRINGFIELD",
  Zip: "627011234",
  "Mailing State": "IL",
  Shares: "100.5",
  Certified: "Y",
  LetterCode: "XX",
  Sequence: "000001",
  "Escheatment State": "Illinois"
};

describe("decodeFixedWidthLine", () => {
  it("uses a 453 byte layout", () => {
    expect(FLAT_FILE_LINE_LENGTH).toBe(453);
    expect(flatLine(VALUES)).toHaveLength(453);
  });

  it("slices fields and collapses whitespace", () => {
    const record = decodeFixedWidthLine(flatLine(VALUES), 1);
    expect(record).toHaveLength(26);
    expect(getField(record, "Company Name")).toBe("ACME HOLDINGS");
    expect(getField(record, "NameAddress1")).toBe("JOHN DOE");
    expect(getField(record, "NameAddress3")).toBe("APT 4B");
    expect(getField(record, "Mailing City")).toBe("SPRINGFIELD");
    expect(getField(record, "Zip")).toBe("627011234");
    expect(getField(record, "Escheatment State")).toBe("Illinois");
  });

  it("puts the seventh flat-file address line in NameAddress8", () => {
    const line = flatLine({ ...VALUES, NameAddress8: "LINE SEVEN" });
    expect(line.slice(342, 352)).toBe("LINE SEVEN");
    const record = decodeFixedWidthLine(line, 1);
    expect(getField(record, "NameAddress6")).toBe("");
    expect(getField(record, "NameAddress7")).toBe("");
    expect(getField(record, "NameAddress8")).toBe("LINE SEVEN");
    expect(getField(record, "Verification Code")).toBe("");
    expect(getField(record, "AddressType")).toBe("");
  });

  it("accepts LF and CRLF terminators", () => {
    const line = flatLine(VALUES);
    expect(decodeFixedWidthLine(`${line}\n`, 1)).toEqual(decodeFixedWidthLine(line, 1));
    expect(decodeFixedWidthLine(`${line}\r\n`, 1)).toEqual(decodeFixedWidthLine(line, 1));
  });

  it("replaces non-ASCII bytes without shifting later fields", () => {
    const line = flatLine({ ...VALUES, NameAddress1: "JOS\u00c9 PEREZ" });
    const record = decodeFixedWidthLine(Buffer.from(line, "latin1"), 1);
    expect(getField(record, "NameAddress1")).toBe("JOS PEREZ");
    expect(getField(record, "NameAddress2")).toBe("123 MAIN ST");
    expect(getField(record, "Escheatment State")).toBe("Illinois");
  });

  it("rejects a line of the wrong length", () => {
    const short = flatLine(VALUES).slice(0, 400);
    expect(() => decodeFixedWidthLine(short, 7)).toThrow(FixedWidthLineError);
    expect(() => decodeFixedWidthLine(short, 7)).toThrow("Line 7: expected 453 characters, got 400");
    expect(() => decodeFixedWidthLine(`${flatLine(VALUES)}X`, 1)).toThrow(FixedWidthLineError);
  });
});

describe("decodeFixedWidthFile", () => {
  it("decodes each line and skips blank ones", () => {
    const a = flatLine(VALUES);
    const b = flatLine({ ...VALUES, LT: "LT0000002" });
    const content = Buffer.from(`${a}\r\n\r\n${b}\r\n`, "latin1");
    const records = decodeFixedWidthFile(content);
    expect(records.map(r => getField(r, "LT"))).toEqual(["LT0000001", "LT0000002"]);
  });

  it("keeps a full-length line of spaces as an empty record", () => {
    const content = Buffer.from(`${flatLine(VALUES)}\r\n${" ".repeat(453)}\r\n`, "latin1");
    const records = decodeFixedWidthFile(content);
    expect(records).toHaveLength(2);
    expect(getField(records[1], "LT")).toBe("");
    expect(records[1].every(v => v === "")).toBe(true);
  });

  it("reports the failing line number", () => {
    const content = Buffer.from(`${flatLine(VALUES)}\nTOO SHORT\n`, "latin1");
    expect(() => decodeFixedWidthFile(content)).toThrow("Line 2: expected 453 characters, got 9");
  });
});

describe("encodeFixedWidthLine", () => {
  it("re-serializes a decoded record to the same layout", () => {
    const record = decodeFixedWidthLine(flatLine(VALUES), 1);
    const encoded = encodeFixedWidthLine(record);
    expect(encoded).toHaveLength(453);
    expect(decodeFixedWidthLine(encoded, 1)).toEqual(record);
  });

  it("reproduces a line that had no extra whitespace", () => {
    const clean = flatLine({ ...VALUES, "Company Name": "ACME HOLDINGS", NameAddress1: "JOHN DOE" });
    expect(encodeFixedWidthLine(decodeFixedWidthLine(clean, 1))).toBe(clean);
  });
});
