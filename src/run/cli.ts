import * as readline from "readline";
import { env } from "../config/env.js";
import { LETTER_CODES, LETTER_CODE_LABELS, isLetterCode, type LetterCode } from "../domain/schema.js";
import { InvalidLetterCodeError } from "../domain/errors.js";

export function argValue(name: string, argv: readonly string[] = process.argv): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function askQuestion(query: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) =>
    rl.question(query, (ans) => {
      rl.close();
      resolve(ans);
    })
  );
}

export function letterCodeMenu(): string {
  return [
    "",
    "Select letter code",
    ...LETTER_CODES.map(code => `${code} = ${LETTER_CODE_LABELS[code]}`)
  ].join("\n");
}

/** Ask until a valid template code is entered. */
export async function chooseLetterCode(ask: (query: string) => Promise<string> = askQuestion): Promise<LetterCode> {
  console.log(letterCodeMenu());
  for (;;) {
    const answer = (await ask("-->  ")).trim().toUpperCase();
    if (isLetterCode(answer)) return answer;
    console.log("\nNot a valid choice !!!\n");
    console.log(letterCodeMenu());
  }
}

export function parseLetterCode(value: string): LetterCode {
  const code = value.trim().toUpperCase();
  if (!isLetterCode(code)) throw new InvalidLetterCodeError(value);
  return code;
}

/** --letterCode flag, then LETTER_CODE, then the interactive prompt. */
export async function resolveLetterCode(flag: string | undefined, ask?: (query: string) => Promise<string>): Promise<LetterCode> {
  if (flag) return parseLetterCode(flag);
  if (env.LETTER_CODE) return parseLetterCode(env.LETTER_CODE);
  return chooseLetterCode(ask);
}
