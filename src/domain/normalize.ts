// Characters replaced with a plain space before anything else sees the text.
// Everything else above 0x7F is replaced too; the table names the ones the
// source exports are known to contain.
export const ASCII_SUBSTITUTIONS: ReadonlyMap<string, string> = new Map([
  ["\ufffd", " "], // replacement character (undecodable byte)
  ["\u00a0", " "], // non-breaking space
  ["\u00a6", " "]  // broken bar
]);

/** Reduce text to 7-bit ASCII, one output character per code point. Buffers are read as Latin-1 so byte offsets survive. */
export function sanitizeAscii(input: string | Buffer): string {
  const text = typeof input === "string" ? input : input.toString("latin1");
  let out = "";
  for (const ch of text) {
    const sub = ASCII_SUBSTITUTIONS.get(ch);
    if (sub !== undefined) { out += sub; continue; }
    out += ch.charCodeAt(0) > 0x7f ? " " : ch;
  }
  return out;
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function cleanField(raw: string | Buffer | undefined | null): string {
  return collapseWhitespace(sanitizeAscii(raw ?? ""));
}

/** ZIP+4 formatting: "123456789" -> "12345-6789"; short or already-hyphenated codes are kept. */
export function formatZip(zip: string): string {
  if (zip.length > 5 && !zip.includes("-")) return `${zip.slice(0, 5)}-${zip.slice(5)}`;
  return zip;
}
