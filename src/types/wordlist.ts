/**
 * Read-only, indexable word sequence. Built-in and custom lists share it.
 */
export type WordSource = readonly string[];

export type BuiltInListName = "long" | "medium" | "dice" | "voice" | "short" | "qwerty" | "alpha";

export interface BuiltInListInfo {
    name: BuiltInListName;
    /** Single-letter shorthand accepted by `--list` */
    letter: string;
    /** Other letters that select the same list */
    aliases?: readonly string[];
    description: string;
}

export interface WordList {
    /** List name, or the file path for custom lists */
    name: string;
    words: WordSource;
}

export interface NormalizationReport {
    /** Every word is NFC, or every word is NFD */
    uniform: boolean;
    /** Words that stop being distinct once NFC-normalized */
    collisions: number;
}
