import { Queue } from "bullmq";
import { Redis } from "ioredis";
import { requireEnv } from "../config/env.js";

export const PROCESS_MAILING_QUEUE = "process_mailing";

export function createConnection() {
  return new Redis(requireEnv("REDIS_URL"), { maxRetriesPerRequest: null });
}

export const connection = createConnection();

export const qProcessMailing = new Queue(PROCESS_MAILING_QUEUE, { connection });
