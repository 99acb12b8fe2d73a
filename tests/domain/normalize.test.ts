import { describe, expect, it } from "vitest";
import { cleanField, collapseWhitespace, formatZip, sanitizeAscii } from "../../src/domain/normalize.js";

describe("sanitizeAscii", () => {
  it("replaces non-breaking space, broken bar and accented letters with spaces", () => {
    expect(sanitizeAscii("Caf\u00e9\u00a0Bar\u00a6X")).toBe("Caf  Bar X");
  });

  it("replaces the replacement character", () => {
    expect(sanitizeAscii("A\ufffdB")).toBe("A B");
  });

  it("reads buffers byte for byte so widths are kept", () => {
    const bytes = Buffer.from("Zo\u00eb", "utf8");
    const out = sanitizeAscii(bytes);
    expect(out).toBe("Zo  ");
    expect(out.length).toBe(bytes.length);
  });

  it("leaves plain ASCII untouched", () => {
    expect(sanitizeAscii("123 MAIN ST #4")).toBe("123 MAIN ST #4");
  });
});

describe("collapseWhitespace / cleanField", () => {
  it("collapses runs and trims", () => {
    expect(collapseWhitespace("  12  MAIN\tST ")).toBe("12 MAIN ST");
  });

  it("treats missing values as empty", () => {
    expect(cleanField(undefined)).toBe("");
    expect(cleanField(null)).toBe("");
  });

  it("sanitizes before collapsing", () => {
    expect(cleanField("JOS\u00c9 PEREZ ")).toBe("JOS PEREZ");
  });
});

describe("formatZip", () => {
  it("inserts the ZIP+4 hyphen after the fifth character", () => {
    expect(formatZip("627011234")).toBe("62701-1234");
  });

  it("is idempotent", () => {
    const once = formatZip("627011234");
    expect(formatZip(once)).toBe(once);
  });

  it("never changes five-character or shorter codes", () => {
    expect(formatZip("62701")).toBe("62701");
    expect(formatZip("0210")).toBe("0210");
    expect(formatZip("")).toBe("");
  });

  it("splits any longer unhyphenated value literally", () => {
    expect(formatZip("A1B2C3")).toBe("A1B2C-3");
  });
});
