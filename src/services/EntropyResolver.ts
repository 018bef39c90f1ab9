import type { GenerationRequest, WordCountOptions } from "../types/index.js";
import { ConfigurationError, InvalidRequestError } from "../utils/errors.js";

export const DEFAULT_MINIMUM_ENTROPY = 80;
export const BITS_PER_STRENGTH_STEP = 20;

/**
 * Entropy contributed by one word drawn uniformly from a list of this size.
 */
export function bitsPerWord(listLength: number): number {
    if (!Number.isInteger(listLength) || listLength < 2) {
        throw new ConfigurationError(
            `Word list must contain at least 2 distinct words to provide any entropy (got ${listLength}).`
        );
    }
    return Math.log2(listLength);
}

/**
 * Smallest word count whose entropy reaches the requested minimum.
 *
 * An explicit `wordCount` is returned as is. Otherwise the minimum is
 * `(minimumEntropy ?? 80) + strengthSteps * 20` and the count is its ceiling
 * division by `log2(listLength)`.
 */
export function resolveWordCount(options: WordCountOptions, listLength: number): number {
    const { wordCount, minimumEntropy, strengthSteps } = options;

    if (wordCount !== undefined) {
        if (!Number.isInteger(wordCount) || wordCount < 1) {
            throw new InvalidRequestError(`Word count must be a positive integer (got ${wordCount}).`);
        }
        return wordCount;
    }

    if (!Number.isInteger(strengthSteps) || strengthSteps < 0) {
        throw new InvalidRequestError(`Strength steps must be a non-negative integer (got ${strengthSteps}).`);
    }
    if (minimumEntropy !== undefined && (!Number.isFinite(minimumEntropy) || minimumEntropy < 0)) {
        throw new InvalidRequestError(`Minimum entropy must be a non-negative number (got ${minimumEntropy}).`);
    }

    const target = (minimumEntropy ?? DEFAULT_MINIMUM_ENTROPY) + strengthSteps * BITS_PER_STRENGTH_STEP;
    const bits = bitsPerWord(listLength);

    let count = Math.max(1, Math.ceil(target / bits));
    // Float division can land one off; settle on the exact boundary
    while (count * bits < target) {
        count += 1;
    }
    while (count > 1 && (count - 1) * bits >= target) {
        count -= 1;
    }
    return count;
}

export function resolveRequest(request: GenerationRequest, listLength: number): number {
    switch (request.kind) {
        case "wordCount":
            return resolveWordCount({ wordCount: request.count, strengthSteps: 0 }, listLength);
        case "minimumEntropy":
            return resolveWordCount({ minimumEntropy: request.bits, strengthSteps: 0 }, listLength);
        case "strength":
            return resolveWordCount({ strengthSteps: request.steps }, listLength);
    }
}
