import fs from "fs";
import type { MailingSourceAdapter } from "./MailingSourceAdapter.js";
import type { CanonicalRecord } from "../domain/schema.js";
import { decodeFixedWidthFile } from "../domain/fixedWidth.js";

export class FixedWidthAdapter implements MailingSourceAdapter {
  label(): string { return "flat-file"; }

  async readRecords(filePath: string): Promise<CanonicalRecord[]> {
    const content = await fs.promises.readFile(filePath);
    return decodeFixedWidthFile(content);
  }
}
