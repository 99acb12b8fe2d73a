import { Worker } from "bullmq";
import { createConnection, PROCESS_MAILING_QUEUE } from "../jobs/queues.js";
import { processMailingJob } from "../jobs/processMailing.worker.js";

// One batch at a time: sequence numbers and outputs are per input file.
const worker = new Worker(PROCESS_MAILING_QUEUE, processMailingJob, { connection: createConnection(), concurrency: 1 });

worker.on("failed", (job, err) => {
  console.error(`Job ${job?.id ?? "?"} failed:`, err);
});

console.log("Workers started.");
