#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { env } from "../config/env.js";
import { processMailingFile } from "../jobs/processMailing.worker.js";
import { argValue, resolveLetterCode } from "./cli.js";

async function main() {
  const filePathArg = process.argv[2];
  if (!filePathArg || filePathArg.startsWith("--")) {
    throw new Error("Usage: npm run process -- <inputFile> [--letterCode A] [--outputDir dir]");
  }

  const absPath = path.resolve(filePathArg);
  if (!fs.existsSync(absPath)) throw new Error(`Input not found: ${absPath}`);

  const letterCode = await resolveLetterCode(argValue("--letterCode"));
  const outputDir = argValue("--outputDir") || env.OUTPUT_DIR || undefined;

  await processMailingFile({ filePath: absPath, letterCode, outputDir });
}

main().catch(e => { console.error(e); process.exit(1); });
