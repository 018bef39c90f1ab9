import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import type { BuiltInListInfo, BuiltInListName, NormalizationReport, WordList } from "../types/index.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import Logger from "../utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Same relative location from src/services and dist/services
export const DEFAULT_WORDLIST_DIRECTORY = join(__dirname, "../../wordlists");

export const DEFAULT_LIST: BuiltInListName = "medium";

export const BUILT_IN_LISTS: readonly BuiltInListInfo[] = [
    { name: "long", letter: "l", description: "17,576 five-letter words" },
    { name: "medium", letter: "m", description: "8,192 five-letter words (default)" },
    { name: "dice", letter: "d", aliases: ["e"], description: "7,776 five-letter words, one per roll of five dice" },
    { name: "voice", letter: "v", aliases: ["n"], description: "1,633 five-letter words that are easy to say aloud" },
    { name: "short", letter: "s", description: "1,296 four-letter words" },
    { name: "qwerty", letter: "q", description: "1,296 four-letter words with little finger travel on QWERTY" },
    { name: "alpha", letter: "a", description: "1,296 four-letter words with little travel on an alphabetical keyboard" },
];

/**
 * Turn raw file contents into a word list: one word per line, trimmed, blank
 * lines dropped, duplicates removed, sorted.
 */
export function parseWordList(contents: string): string[] {
    const words = new Set<string>();
    for (const line of contents.split(/\r?\n/)) {
        const word = line.trim();
        if (word.length > 0) {
            words.add(word);
        }
    }
    return [...words].sort();
}

/**
 * Check that a list does not mix Unicode normalization forms. Mixed lists can
 * hold visually identical words, which inflates the entropy estimate.
 */
export function checkNormalization(words: readonly string[]): NormalizationReport {
    let allNfc = true;
    let allNfd = true;
    const normalized = new Set<string>();

    for (const word of words) {
        const nfc = word.normalize("NFC");
        if (nfc !== word) allNfc = false;
        if (word.normalize("NFD") !== word) allNfd = false;
        normalized.add(nfc);
    }

    return {
        uniform: allNfc || allNfd,
        collisions: words.length - normalized.size,
    };
}

export function findBuiltInList(choice: string): BuiltInListInfo | undefined {
    const key = choice.trim().toLowerCase();
    return BUILT_IN_LISTS.find(
        (list) => list.name === key || list.letter === key || (list.aliases ?? []).includes(key)
    );
}

export class WordListService {
    private readonly cache = new Map<BuiltInListName, WordList>();

    constructor(private readonly listDirectory: string = DEFAULT_WORDLIST_DIRECTORY) {}

    /**
     * Load a built-in list by name (`medium`) or letter (`m`).
     */
    loadBuiltInList(choice: string = DEFAULT_LIST): WordList {
        const info = findBuiltInList(choice);
        if (!info) {
            const available = BUILT_IN_LISTS.map((list) => `${list.name} (${list.letter})`).join(", ");
            throw new ConfigurationError(
                `List choice '${choice}' doesn't correspond to an available word list. Available: ${available}.`
            );
        }

        const cached = this.cache.get(info.name);
        if (cached) {
            return cached;
        }

        const path = join(this.listDirectory, `${info.name}.txt`);
        const list: WordList = Object.freeze({
            name: info.name,
            words: Object.freeze(parseWordList(this.readFile(path))),
        });
        Logger.debug("Loaded built-in word list", { name: info.name, size: list.words.length });
        this.cache.set(info.name, list);
        return list;
    }

    /**
     * Read a user-supplied list file. Lists with fewer than two distinct words
     * are rejected because they cannot provide any entropy.
     */
    readCustomList(path: string): WordList {
        const words = parseWordList(this.readFile(path));
        if (words.length < 2) {
            throw new ConfigurationError(
                `Custom word list '${path}' has ${words.length} distinct ${words.length === 1 ? "word" : "words"}; at least 2 are required.`
            );
        }

        const report = checkNormalization(words);
        if (!report.uniform) {
            // Only mixed lists can collide, so one warning covers both cases
            Logger.warn("Custom word list mixes Unicode normalization forms", { path, collisions: report.collisions });
        }

        Logger.debug("Loaded custom word list", { path, size: words.length });
        return Object.freeze({ name: path, words: Object.freeze(words) });
    }

    private readFile(path: string): string {
        try {
            return readFileSync(path, "utf8");
        } catch (error) {
            throw new ConfigurationError(`Unable to read word list '${path}': ${errorMessage(error)}`);
        }
    }
}
