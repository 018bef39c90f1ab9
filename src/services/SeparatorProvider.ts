import type { SeparatorSpec } from "../types/index.js";
import { type RandomSource, uniformInt } from "./RandomSource.js";

/** Alphabet for symbolic separators. */
export const SEPARATOR_SYMBOLS = "!#$%&*+-=?@^_~";
export const SEPARATOR_DIGITS = "0123456789";

const SENTINELS: Record<string, SeparatorSpec> = {
    _n: { kind: "numeric" },
    _s: { kind: "symbolic" },
    _b: { kind: "mixed" },
};

/**
 * Interpret the raw `--sep` value. `_n`, `_s` and `_b` select generated
 * separators; anything else is used literally. Surrounding single quotes are
 * dropped, so `'_n'` is still numeric and `''` is the empty separator.
 */
export function parseSeparatorSpec(raw: string): SeparatorSpec {
    const value = raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'") ? raw.slice(1, -1) : raw;
    return SENTINELS[value] ?? { kind: "literal", value };
}

export function isGeneratedSeparator(spec: SeparatorSpec): boolean {
    return spec.kind !== "literal";
}

export class SeparatorProvider {
    constructor(private readonly random: RandomSource) {}

    /**
     * Separator for one gap between adjacent words. Generated separators are
     * drawn fresh on every call.
     */
    next(spec: SeparatorSpec): string {
        switch (spec.kind) {
            case "literal":
                return spec.value;
            case "numeric":
                return this.digit();
            case "symbolic":
                return this.symbol();
            case "mixed":
                return uniformInt(this.random, 2) === 0 ? this.digit() : this.symbol();
        }
    }

    private digit(): string {
        return SEPARATOR_DIGITS[uniformInt(this.random, SEPARATOR_DIGITS.length)];
    }

    private symbol(): string {
        return SEPARATOR_SYMBOLS[uniformInt(this.random, SEPARATOR_SYMBOLS.length)];
    }
}
