import type { GenerationOptions, SeparatorSpec, WordSource } from "../types/index.js";
import { ConfigurationError, InvalidRequestError } from "../utils/errors.js";
import { toTitleCase } from "../utils/casing.js";
import Logger from "../utils/logger.js";
import { CryptoRandomSource, type RandomSource, uniformInt } from "./RandomSource.js";
import { SeparatorProvider } from "./SeparatorProvider.js";

/**
 * Assembles passphrases from a word list.
 *
 * Words are drawn independently and uniformly with the injected RandomSource,
 * which should be cryptographically secure outside of tests. The word list is
 * only read, so one list can serve any number of engines and calls.
 *
 * @example
 * ```typescript
 * const engine = new PassphraseEngine();
 * engine.generate(7, { kind: "literal", value: "-" }, false, list.words);
 * // "rufol-dikan-semuz-botiv-japuk-gezan-tolim"
 * ```
 */
export class PassphraseEngine {
    private readonly separators: SeparatorProvider;

    constructor(private readonly random: RandomSource = new CryptoRandomSource()) {
        this.separators = new SeparatorProvider(random);
    }

    generate(wordCount: number, separator: SeparatorSpec, titleCase: boolean, words: WordSource): string {
        this.checkWordSource(wordCount, words);
        return this.assemble(wordCount, separator, titleCase, words);
    }

    /**
     * Produce `count` independent passphrases, one after the other.
     */
    generateMany(count: number, options: GenerationOptions, words: WordSource): string[] {
        if (!Number.isInteger(count) || count < 1) {
            throw new InvalidRequestError(`Passphrase count must be a positive integer (got ${count}).`);
        }
        this.checkWordSource(options.wordCount, words);
        const passphrases: string[] = [];
        for (let i = 0; i < count; i++) {
            passphrases.push(this.assemble(options.wordCount, options.separator, options.titleCase, words));
        }
        return passphrases;
    }

    private checkWordSource(wordCount: number, words: WordSource): void {
        if (!Number.isInteger(wordCount) || wordCount < 1) {
            throw new InvalidRequestError(`Word count must be a positive integer (got ${wordCount}).`);
        }
        if (words.length === 0) {
            throw new ConfigurationError("Cannot generate a passphrase from an empty word list.");
        }
        if (words.length === 1) {
            Logger.warn("Word list has a single entry; every passphrase will be identical", { wordCount });
        }
    }

    private assemble(wordCount: number, separator: SeparatorSpec, titleCase: boolean, words: WordSource): string {
        let passphrase = "";
        for (let i = 0; i < wordCount; i++) {
            if (i > 0) {
                passphrase += this.separators.next(separator);
            }
            const word = words[uniformInt(this.random, words.length)];
            passphrase += titleCase ? toTitleCase(word) : word;
        }
        return passphrase;
    }
}
