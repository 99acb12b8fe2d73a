import fs from "fs";
import ExcelJS from "exceljs";
import { CANONICAL_HEADER, type CanonicalRecord } from "../domain/schema.js";
import { ADDRESS_DATA_HEADER, addressDataRow } from "../domain/batch.js";

const EOL = "\r\n";

/** Every value quoted, embedded quotes doubled. */
export function toCsvLine(values: readonly string[]): string {
  return values.map(v => `"${String(v).replace(/"/g, '""')}"`).join(",");
}

function writeCsv(outPath: string, rows: readonly (readonly string[])[]) {
  fs.writeFileSync(outPath, rows.map(toCsvLine).join(EOL) + EOL, "utf8");
}

export function writeStaticData(outPath: string, records: readonly CanonicalRecord[]) {
  writeCsv(outPath, [CANONICAL_HEADER, ...records]);
}

export function writeAddressData(outPath: string, records: readonly CanonicalRecord[]) {
  writeCsv(outPath, [ADDRESS_DATA_HEADER, ...records.map(addressDataRow)]);
}

export async function writeWorkbook(outPath: string, records: readonly CanonicalRecord[]) {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Records");
  sheet.addRow([...CANONICAL_HEADER]);
  for (const record of records) sheet.addRow([...record]);
  await workbook.xlsx.writeFile(outPath);
}
