import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Characters whose titlecase form differs from their uppercase form,
// taken from the title column of Unicode SpecialCasing and UnicodeData
const TITLECASE_TABLE = join(__dirname, "../../data/titlecase.json");

const titlecaseSchema = z.record(z.string(), z.string());

let exceptions: ReadonlyMap<string, string> | null = null;

function titlecaseExceptions(): ReadonlyMap<string, string> {
  if (!exceptions) {
    const table = titlecaseSchema.parse(JSON.parse(readFileSync(TITLECASE_TABLE, "utf8")));
    exceptions = new Map(Object.entries(table));
  }
  return exceptions;
}

/**
 * Titlecase the first character of a word and leave the rest untouched.
 * Leading characters without case (digits, punctuation) stay as they are.
 */
export function toTitleCase(word: string): string {
  const first = word.codePointAt(0);
  if (first === undefined) {
    return word;
  }
  const head = String.fromCodePoint(first);
  const rest = word.slice(head.length);
  return (titlecaseExceptions().get(head) ?? head.toUpperCase()) + rest;
}
