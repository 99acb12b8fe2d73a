import ExcelJS from "exceljs";
import type { MailingSourceAdapter, RawTable } from "./MailingSourceAdapter.js";
import type { CanonicalRecord } from "../domain/schema.js";
import { decodeTable } from "../domain/tabular.js";
import { UnsupportedInputError } from "../domain/errors.js";

const CONDITION = /^\[(<=|>=|<>|<|>|=)(-?\d+(?:\.\d+)?)\]/;

function stripLiterals(section: string): string {
  return section.replace(CONDITION, "").replace(/\\(.)/g, "$1").replace(/"/g, "");
}

function meetsCondition(section: string, n: number): boolean {
  const m = CONDITION.exec(section);
  if (!m) return true;
  const limit = Number(m[2]);
  switch (m[1]) {
    case "<=": return n <= limit;
    case ">=": return n >= limit;
    case "<>": return n !== limit;
    case "<": return n < limit;
    case ">": return n > limit;
    default: return n === limit;
  }
}

// "00000", "00000-0000": digits fill the zeros right-aligned, extra digits go in front.
function applyDigitMask(n: number, mask: string): string | undefined {
  if (!/^[0\- ]*0[0\- ]*$/.test(mask) || !Number.isInteger(n) || n < 0) return undefined;
  const zeros = mask.split("").filter(ch => ch === "0").length;
  const digits = String(n).padStart(zeros, "0");
  const extra = digits.length - zeros;
  let out = digits.slice(0, extra);
  let i = extra;
  for (const ch of mask) out += ch === "0" ? digits[i++] : ch;
  return out;
}

function applyDateMask(d: Date, mask: string): string | undefined {
  const fmt = mask.toLowerCase();
  if (!/^[ymd\/\-. ]+$/.test(fmt)) return undefined;
  const pad = (v: number) => String(v).padStart(2, "0");
  return fmt.replace(/yyyy|yy|mm|m|dd|d/g, token => {
    switch (token) {
      case "yyyy": return String(d.getUTCFullYear());
      case "yy": return pad(d.getUTCFullYear() % 100);
      case "mm": return pad(d.getUTCMonth() + 1);
      case "m": return String(d.getUTCMonth() + 1);
      case "dd": return pad(d.getUTCDate());
      default: return String(d.getUTCDate());
    }
  });
}

/**
 * Render a numeric or date cell the way its number format displays it.
 * Covers zero-padded digit masks (ZIP, ZIP+4, conditional ZIP) and plain
 * y/m/d dates; returns undefined for anything else.
 */
export function renderWithFormat(value: number | Date, numFmt: string): string | undefined {
  const sections = numFmt.split(";");
  if (value instanceof Date) return applyDateMask(value, stripLiterals(sections[0]));

  const section = sections.find(sec => meetsCondition(sec, value)) ?? sections[0];
  return applyDigitMask(value, stripLiterals(section));
}

function cellText(cell: ExcelJS.Cell): string {
  const { value, numFmt } = cell;
  if (numFmt && (typeof value === "number" || value instanceof Date)) {
    const rendered = renderWithFormat(value, numFmt);
    if (rendered !== undefined) return rendered;
  }
  return cell.text;
}

/** First worksheet as display text, one string per cell, empty rows kept. */
export async function readWorkbookTable(filePath: string): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) throw new UnsupportedInputError(filePath, "workbook has no worksheets");

  const table: RawTable = [];
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= sheet.columnCount; c++) {
      cells.push(cellText(row.getCell(c)));
    }
    table.push(cells);
  }
  return table;
}

export class SpreadsheetAdapter implements MailingSourceAdapter {
  label(): string { return "xlsx"; }

  async readRecords(filePath: string): Promise<CanonicalRecord[]> {
    const table = await readWorkbookTable(filePath);
    return decodeTable(table).records;
  }
}
