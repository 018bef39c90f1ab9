import { ConfigurationError } from "../utils/errors.js";

export interface EntropyReportInput {
    wordCount: number;
    listLength: number;
    passphraseCount: number;
}

/**
 * Estimated entropy of a passphrase: `log2(listLength) * wordCount`.
 *
 * Random separators are not counted, so the figure stays a lower bound.
 */
export function estimateEntropyBits(wordCount: number, listLength: number): number {
    if (listLength < 1) {
        throw new ConfigurationError("Cannot estimate entropy for an empty word list.");
    }
    return Math.log2(listLength) * wordCount;
}

/**
 * One human-readable line describing the entropy of a run. Every passphrase of a
 * run shares word count and list, so batches get a single aggregate line.
 */
export function formatEntropyReport({ wordCount, listLength, passphraseCount }: EntropyReportInput): string {
    const bits = estimateEntropyBits(wordCount, listLength).toFixed(2);
    const words = `${wordCount} ${wordCount === 1 ? "word" : "words"}`;
    const list = `a list of ${listLength.toLocaleString("en-US")} ${listLength === 1 ? "word" : "words"}`;
    const subject = passphraseCount === 1 ? "Passphrase has" : `Each of the ${passphraseCount} passphrases has`;
    return `${subject} an estimated ${bits} bits of entropy (${words} from ${list}).`;
}
