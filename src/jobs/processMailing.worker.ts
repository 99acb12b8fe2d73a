import fs from "fs";
import path from "path";
import type { JobsOptions } from "bullmq";
import { adapterFor } from "../adapters/index.js";
import { buildMailingBatch, tallyCounts, type MailingCounts } from "../domain/batch.js";
import { isLetterCode, type LetterCode } from "../domain/schema.js";
import { InvalidLetterCodeError } from "../domain/errors.js";
import { writeAddressData, writeStaticData, writeWorkbook } from "../output/writers.js";
import { formatCountsReport, writeCountsReport } from "../output/report.js";

export type ProcessMailingOptions = {
  filePath: string;
  letterCode: LetterCode;
  outputDir?: string;
};

export type MailingOutputs = {
  staticData: string;
  addressData: string;
  workbook: string;
  counts: string;
};

export type ProcessMailingResult = {
  counts: MailingCounts;
  outputs: MailingOutputs;
};

const OUTPUT_KEYS: readonly (keyof MailingOutputs)[] = ["staticData", "addressData", "workbook", "counts"];

export type ProcessMailingJobData = {
  batchId: string;
  filePath: string;
  letterCode: string;
  outputDir?: string;
};

/** Arguments for queue.add. The job id is the bare batch id (BullMQ rejects custom ids with ":"). */
export function processMailingJobRequest(data: ProcessMailingJobData): { data: ProcessMailingJobData; opts: JobsOptions } {
  return { data, opts: { attempts: 1, jobId: data.batchId } };
}

function baseName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function outputPaths(filePath: string, outputDir: string): MailingOutputs {
  return {
    staticData: path.join(outputDir, "StaticData.dat"),
    addressData: path.join(outputDir, "AddressData.csv"),
    workbook: path.join(outputDir, `${baseName(filePath)}_rev.xlsx`),
    counts: path.join(outputDir, "COUNTS.txt")
  };
}

function tempPath(p: string): string {
  // Keep the extension last so the workbook writer still sees .xlsx.
  const ext = path.extname(p);
  return path.join(path.dirname(p), `.${path.basename(p, ext)}.partial${ext}`);
}

/**
 * Run one input file end to end. Everything is decoded and ordered in memory
 * first; the four artifacts are then written under temporary names and moved
 * into place together, so a failure leaves none of them behind.
 */
export async function processMailingFile(opts: ProcessMailingOptions): Promise<ProcessMailingResult> {
  const filePath = path.resolve(opts.filePath);
  const outputDir = path.resolve(opts.outputDir || path.dirname(filePath));
  const adapter = adapterFor(filePath);

  console.log(`Formatting data from ${adapter.label()}....`);
  const decoded = await adapter.readRecords(filePath);

  console.log("Sorting records....");
  const batch = buildMailingBatch(decoded, opts.letterCode);
  const counts = tallyCounts(batch);
  const report = formatCountsReport(path.basename(filePath), counts);

  const outputs = outputPaths(filePath, outputDir);
  const temps: MailingOutputs = {
    staticData: tempPath(outputs.staticData),
    addressData: tempPath(outputs.addressData),
    workbook: tempPath(outputs.workbook),
    counts: tempPath(outputs.counts)
  };

  fs.mkdirSync(outputDir, { recursive: true });
  try {
    console.log("Writing records to CSV....");
    writeStaticData(temps.staticData, batch.records);
    writeAddressData(temps.addressData, batch.records);

    console.log("Writing records to Excel....");
    await writeWorkbook(temps.workbook, batch.records);

    writeCountsReport(temps.counts, report);
  } catch (err) {
    for (const key of OUTPUT_KEYS) fs.rmSync(temps[key], { force: true });
    throw err;
  }

  const placed: (keyof MailingOutputs)[] = [];
  try {
    for (const key of OUTPUT_KEYS) {
      fs.renameSync(temps[key], outputs[key]);
      placed.push(key);
    }
  } catch (err) {
    for (const key of placed) fs.rmSync(outputs[key], { force: true });
    for (const key of OUTPUT_KEYS) fs.rmSync(temps[key], { force: true });
    throw err;
  }

  console.log(report);
  return { counts, outputs };
}

export async function processMailingJob(job: { data: ProcessMailingJobData }) {
  const { batchId, filePath, letterCode, outputDir } = job.data;
  if (!isLetterCode(letterCode)) throw new InvalidLetterCodeError(letterCode);

  console.log(`Processing batch ${batchId}: ${filePath}`);
  const result = await processMailingFile({ filePath, letterCode, outputDir });
  console.log(`Batch ${batchId} done: ${result.counts.total} records.`);
  return result.counts;
}
