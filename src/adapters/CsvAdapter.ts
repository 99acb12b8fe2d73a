import fs from "fs";
import path from "path";
import csv from "csv-parser";
import type { MailingSourceAdapter, RawTable } from "./MailingSourceAdapter.js";
import type { CanonicalRecord } from "../domain/schema.js";
import { decodeTable } from "../domain/tabular.js";

function stripBom(s: string): string {
  return s.replace(/^\uFEFF/, "");
}

/** Read a delimited file as rows of cells, header included. */
export function readCsvTable(filePath: string): Promise<RawTable> {
  return new Promise<RawTable>((resolve, reject) => {
    const rows: RawTable = [];
    fs.createReadStream(path.resolve(filePath))
      .on("error", reject)
      .pipe(csv({ headers: false }))
      .on("data", (row: Record<string, unknown>) => {
        // With headers off, keys are column positions "0", "1", ...
        const cells = Object.values(row).map(v => (v == null ? "" : String(v)));
        if (rows.length === 0 && cells.length) cells[0] = stripBom(cells[0]);
        rows.push(cells);
      })
      .on("end", () => resolve(rows))
      .on("error", reject);
  });
}

export class CsvAdapter implements MailingSourceAdapter {
  label(): string { return "csv"; }

  async readRecords(filePath: string): Promise<CanonicalRecord[]> {
    const table = await readCsvTable(filePath);
    return decodeTable(table).records;
  }
}
