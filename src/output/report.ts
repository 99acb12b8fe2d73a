import fs from "fs";
import type { MailingCounts } from "../domain/batch.js";

export function formatCountsReport(filename: string, counts: MailingCounts): string {
  return [
    `Filename: ${filename}`,
    `Domestic count: ${counts.domestic}`,
    `Foreign count: ${counts.foreign}`,
    `Total Records: ${counts.total}`,
    "",
    `Mexico count: ${counts.mexico}`,
    `Canada count: ${counts.canada}`,
    `Other count: ${counts.other}`
  ].join("\r\n");
}

export function writeCountsReport(outPath: string, report: string) {
  fs.writeFileSync(outPath, report, "utf8");
}
