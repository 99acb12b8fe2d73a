import path from "path";
import type { MailingSourceAdapter } from "./MailingSourceAdapter.js";
import { FixedWidthAdapter } from "./FixedWidthAdapter.js";
import { CsvAdapter } from "./CsvAdapter.js";
import { SpreadsheetAdapter } from "./SpreadsheetAdapter.js";
import { UnsupportedInputError } from "../domain/errors.js";

/** Spreadsheet exports by extension; anything else is treated as the flat file. */
export function adapterFor(filePath: string): MailingSourceAdapter {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".xlsx") return new SpreadsheetAdapter();
  if (ext === ".csv") return new CsvAdapter();
  if (ext === ".xls") throw new UnsupportedInputError(filePath, "legacy .xls workbooks are not readable; save as .xlsx");
  return new FixedWidthAdapter();
}
