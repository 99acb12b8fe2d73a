import path from "path";
import fs from "fs";
import { v4 as uuidv4 } from "uuid";
import { env } from "../config/env.js";
import { connection, qProcessMailing, PROCESS_MAILING_QUEUE } from "../jobs/queues.js";
import { processMailingJobRequest } from "../jobs/processMailing.worker.js";
import { argValue, resolveLetterCode } from "./cli.js";

async function main() {
  const filePathArg = process.argv[2];
  if (!filePathArg || filePathArg.startsWith("--")) {
    throw new Error("Usage: npm run kickoff -- <inputFile> [--letterCode A] [--outputDir dir]");
  }

  const filePath = path.resolve(filePathArg);
  if (!fs.existsSync(filePath)) throw new Error(`Input not found: ${filePath}`);

  const letterCode = await resolveLetterCode(argValue("--letterCode"));
  const outputDir = argValue("--outputDir") || env.OUTPUT_DIR || undefined;
  const batchId = uuidv4();

  const { data, opts } = processMailingJobRequest({ batchId, filePath, letterCode, outputDir });
  await qProcessMailing.add(PROCESS_MAILING_QUEUE, data, opts);
  console.log("Batch created:", batchId);
  console.log("Processing enqueued. Start workers with: npm run workers");

  await qProcessMailing.close();
  await connection.quit();
}

main().catch(e => { console.error(e); process.exit(1); });
