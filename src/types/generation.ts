/**
 * How the caller asked for the passphrase length. Exactly one mode applies.
 */
export type GenerationRequest =
    | { kind: "wordCount"; count: number }
    | { kind: "minimumEntropy"; bits: number }
    | { kind: "strength"; steps: number };

/**
 * Loose form of a request, as it arrives from option parsing.
 * Applying both `minimumEntropy` and `strengthSteps` is allowed and additive.
 */
export interface WordCountOptions {
    /** Exact word count; bypasses every entropy calculation */
    wordCount?: number;
    /** Minimum entropy in bits (defaults to 80) */
    minimumEntropy?: number;
    /** Each step adds 20 bits on top of the minimum */
    strengthSteps: number;
}

export interface GenerationOptions {
    wordCount: number;
    separator: SeparatorSpec;
    titleCase: boolean;
}

/**
 * Separator between two adjacent words, parsed once from the raw option.
 */
export type SeparatorSpec =
    | { kind: "literal"; value: string }
    | { kind: "numeric" }
    | { kind: "symbolic" }
    | { kind: "mixed" };
