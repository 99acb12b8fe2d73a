import dotenv from "dotenv";
dotenv.config();

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

export const env = {
  // Optional: skips the interactive template prompt when set.
  LETTER_CODE: (process.env.LETTER_CODE || "").trim().toUpperCase(),
  // Optional: defaults to the input file's directory.
  OUTPUT_DIR: process.env.OUTPUT_DIR || ""
  // REDIS_URL is read by jobs/queues.ts only, so direct runs need no Redis.
};
