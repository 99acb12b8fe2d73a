import type { CanonicalRecord } from "../domain/schema.js";

export type RawTable = string[][];

export interface MailingSourceAdapter {
  label(): string; // e.g., flat-file, csv, xlsx
  readRecords(filePath: string): Promise<CanonicalRecord[]>;
}
