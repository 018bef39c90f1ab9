import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { parseArgs } from "util";
import { z } from "zod";
import type { GenerationRequest, SeparatorSpec, WordList } from "./types/index.js";
import { DEFAULT_MINIMUM_ENTROPY, resolveRequest } from "./services/EntropyResolver.js";
import { formatEntropyReport } from "./services/EntropyReporter.js";
import { PassphraseEngine } from "./services/PassphraseEngine.js";
import { isGeneratedSeparator, parseSeparatorSpec } from "./services/SeparatorProvider.js";
import { BUILT_IN_LISTS, DEFAULT_LIST, WordListService } from "./services/WordListService.js";
import { ErrorCode, InvalidRequestError, PhraseError, errorMessage } from "./utils/errors.js";
import Logger from "./utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const EXIT_OK = 0;
export const EXIT_CONFIGURATION_ERROR = 1;
export const EXIT_INVALID_REQUEST = 2;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDependencies {
  engine: PassphraseEngine;
  wordLists: WordListService;
}

export interface CliOptions {
  request: GenerationRequest;
  separator: SeparatorSpec;
  list?: string;
  customList?: string;
  titleCase: boolean;
  passphrases: number;
  verbose: boolean;
}

export type CliCommand =
  | { kind: "generate"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" };

const ARG_OPTIONS = {
  words: { type: "string", short: "w" },
  "minimum-entropy": { type: "string", short: "e" },
  strength: { type: "boolean", short: "S", multiple: true },
  sep: { type: "string", short: "s" },
  list: { type: "string", short: "l" },
  "custom-list": { type: "string", short: "c" },
  "title-case": { type: "boolean", short: "t" },
  passphrases: { type: "string", short: "n" },
  verbose: { type: "boolean", short: "v" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
} as const;

// Digits only: Number() would also take "1e3", "0x10" and padded input
const wholeNumber = (label: string) =>
  z
    .string()
    .regex(/^\d+$/, `${label} must be a whole number`)
    .transform(Number)
    .pipe(z.number().positive(`${label} must be greater than zero`));

const optionsSchema = z
  .object({
    words: wholeNumber("--words").optional(),
    minimumEntropy: wholeNumber("--minimum-entropy").optional(),
    strength: z.number().int().nonnegative(),
    separator: z.string(),
    list: z.string().min(1, "--list needs a value").optional(),
    customList: z.string().min(1, "--custom-list needs a path").optional(),
    titleCase: z.boolean(),
    passphrases: wholeNumber("--passphrases"),
    verbose: z.boolean(),
  })
  .superRefine((opts, ctx) => {
    const modes = [
      opts.words !== undefined && "--words",
      opts.minimumEntropy !== undefined && "--minimum-entropy",
      opts.strength > 0 && "--strength",
    ].filter((mode): mode is string => typeof mode === "string");
    if (modes.length > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${modes.join(" and ")} cannot be used together` });
    }
    if (opts.list !== undefined && opts.customList !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "--list and --custom-list cannot be used together" });
    }
    // Concatenated custom words could not be split apart again
    const separator = parseSeparatorSpec(opts.separator);
    if (separator.kind === "literal" && separator.value === "" && opts.customList !== undefined && !opts.titleCase) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "An empty separator with a custom word list requires --title-case so words stay distinguishable",
      });
    }
  });

function readArgValues(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: ARG_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new InvalidRequestError(errorMessage(error));
  }
}

/**
 * Parse argv into a command. Throws InvalidRequestError for unknown flags,
 * malformed numbers and conflicting options.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const values = readArgValues(argv);
  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  const parsed = optionsSchema.safeParse({
    words: values.words,
    minimumEntropy: values["minimum-entropy"],
    strength: values.strength?.length ?? 0,
    separator: values.sep ?? "-",
    list: values.list,
    customList: values["custom-list"],
    titleCase: values["title-case"] ?? false,
    passphrases: values.passphrases ?? "1",
    verbose: values.verbose ?? false,
  });
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  const opts = parsed.data;
  return {
    kind: "generate",
    options: {
      request: toGenerationRequest(opts.words, opts.minimumEntropy, opts.strength),
      separator: parseSeparatorSpec(opts.separator),
      list: opts.list,
      customList: opts.customList,
      titleCase: opts.titleCase,
      passphrases: opts.passphrases,
      verbose: opts.verbose,
    },
  };
}

function toGenerationRequest(words: number | undefined, minimumEntropy: number | undefined, strength: number): GenerationRequest {
  if (words !== undefined) return { kind: "wordCount", count: words };
  if (strength > 0) return { kind: "strength", steps: strength };
  return { kind: "minimumEntropy", bits: minimumEntropy ?? DEFAULT_MINIMUM_ENTROPY };
}

export function usage(): string {
  const lists = BUILT_IN_LISTS.map((list) => {
    const letters = [list.letter, ...(list.aliases ?? [])].join("/");
    return `      ${`${letters},`.padEnd(5)}${list.name.padEnd(7)} ${list.description}`;
  });
  return [
    "Usage: phrasewright [options]",
    "",
    "Generate random passphrases with a guaranteed minimum entropy.",
    "",
    "Options:",
    "  -w, --words <n>              Number of words in each passphrase",
    "  -e, --minimum-entropy <bits> Minimum entropy in bits (default: 80)",
    "  -S, --strength               Add 20 bits to the minimum; repeat for more",
    "  -s, --sep <separator>        Word separator (default: -). Special values:",
    "                                 _n random digits, _s random symbols, _b both",
    "  -l, --list <list>            Built-in word list (default: medium):",
    ...lists,
    "  -c, --custom-list <path>     Read words from a file, one per line",
    "  -t, --title-case             Capitalize the first letter of each word",
    "  -n, --passphrases <n>        Number of passphrases to generate (default: 1)",
    "  -v, --verbose                Print the estimated entropy to stderr",
    "  -h, --help                   Show this help",
    "  -V, --version                Show the version",
  ].join("\n");
}

const packageSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const contents = readFileSync(join(__dirname, "../package.json"), "utf8");
  return packageSchema.parse(JSON.parse(contents)).version;
}

function loadWordList(options: CliOptions, wordLists: WordListService): WordList {
  if (options.customList !== undefined) {
    return wordLists.readCustomList(options.customList);
  }
  return wordLists.loadBuiltInList(options.list ?? DEFAULT_LIST);
}

/**
 * Run one invocation. Nothing reaches stdout unless every passphrase of the
 * run was generated. Returns the process exit code.
 */
export function runCli(
  argv: string[],
  io: CliIO,
  deps: CliDependencies = { engine: new PassphraseEngine(), wordLists: new WordListService() }
): number {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      io.stdout(usage());
      return EXIT_OK;
    }
    if (command.kind === "version") {
      io.stdout(readVersion());
      return EXIT_OK;
    }

    const { options } = command;
    const list = loadWordList(options, deps.wordLists);
    const wordCount = resolveRequest(options.request, list.words.length);
    Logger.debug("Resolved word count", {
      mode: options.request.kind,
      wordCount,
      list: list.name,
      listSize: list.words.length,
    });
    if (isGeneratedSeparator(options.separator)) {
      Logger.debug("Random separators are not counted in the entropy estimate", { separator: options.separator.kind });
    }

    const passphrases = deps.engine.generateMany(
      options.passphrases,
      { wordCount, separator: options.separator, titleCase: options.titleCase },
      list.words
    );

    if (options.verbose) {
      io.stderr(formatEntropyReport({ wordCount, listLength: list.words.length, passphraseCount: passphrases.length }));
    }
    for (const passphrase of passphrases) {
      io.stdout(passphrase);
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof PhraseError) {
      Logger.debug("Run aborted", { code: error.code });
      io.stderr(`error: ${error.message}`);
      return error.code === ErrorCode.INVALID_REQUEST ? EXIT_INVALID_REQUEST : EXIT_CONFIGURATION_ERROR;
    }
    throw error;
  }
}
