import { describe, it, expect } from 'vitest';
import { bitsPerWord, resolveRequest, resolveWordCount } from './EntropyResolver.js';
import { ConfigurationError, InvalidRequestError } from '../utils/errors.js';

const LIST_LENGTHS = [2, 3, 7, 1296, 1633, 7776, 8192, 17576];
const MINIMUMS = [1, 10, 52, 80, 100, 128, 256];

describe('resolveWordCount', () => {
    it('needs 7 words from an 8,192 word list for 80 bits', () => {
        expect(resolveWordCount({ minimumEntropy: 80, strengthSteps: 0 }, 8192)).toBe(7);
    });

    it('defaults to an 80 bit minimum', () => {
        expect(resolveWordCount({ strengthSteps: 0 }, 8192)).toBe(7);
        expect(resolveWordCount({ strengthSteps: 0 }, 1296)).toBe(8);
        expect(resolveWordCount({ strengthSteps: 0 }, 17576)).toBe(6);
    });

    it('returns the smallest count that reaches the minimum', () => {
        for (const listLength of LIST_LENGTHS) {
            const bits = Math.log2(listLength);
            for (const minimumEntropy of MINIMUMS) {
                const count = resolveWordCount({ minimumEntropy, strengthSteps: 0 }, listLength);
                expect(count * bits).toBeGreaterThanOrEqual(minimumEntropy);
                expect((count - 1) * bits).toBeLessThan(minimumEntropy);
            }
        }
    });

    it('rounds up rather than to the nearest count', () => {
        // 80 / log2(7776) is about 6.19
        expect(resolveWordCount({ minimumEntropy: 80, strengthSteps: 0 }, 7776)).toBe(7);
    });

    it('lands exactly on whole-bit boundaries', () => {
        expect(resolveWordCount({ minimumEntropy: 77, strengthSteps: 0 }, 2048)).toBe(7);
        expect(resolveWordCount({ minimumEntropy: 78, strengthSteps: 0 }, 2048)).toBe(8);
    });

    it('treats strength steps as 20 bits each above 80', () => {
        for (const listLength of LIST_LENGTHS) {
            for (let steps = 0; steps <= 5; steps++) {
                expect(resolveWordCount({ strengthSteps: steps }, listLength)).toBe(
                    resolveWordCount({ minimumEntropy: 80 + 20 * steps, strengthSteps: 0 }, listLength)
                );
            }
        }
    });

    it('adds strength steps on top of an explicit minimum', () => {
        // 60 + 20 = 80 bits
        expect(resolveWordCount({ minimumEntropy: 60, strengthSteps: 1 }, 8192)).toBe(7);
    });

    it('returns an explicit word count unchanged', () => {
        expect(resolveWordCount({ wordCount: 4, strengthSteps: 0 }, 1296)).toBe(4);
        expect(resolveWordCount({ wordCount: 3, minimumEntropy: 500, strengthSteps: 2 }, 8192)).toBe(3);
        expect(resolveWordCount({ wordCount: 9, strengthSteps: 0 }, 1)).toBe(9);
    });

    it('rejects a zero or fractional word count', () => {
        expect(() => resolveWordCount({ wordCount: 0, strengthSteps: 0 }, 8192)).toThrow(InvalidRequestError);
        expect(() => resolveWordCount({ wordCount: 2.5, strengthSteps: 0 }, 8192)).toThrow(InvalidRequestError);
    });

    it('rejects negative strength steps and entropy', () => {
        expect(() => resolveWordCount({ strengthSteps: -1 }, 8192)).toThrow(InvalidRequestError);
        expect(() => resolveWordCount({ minimumEntropy: -5, strengthSteps: 0 }, 8192)).toThrow(InvalidRequestError);
    });

    it('always returns at least one word', () => {
        expect(resolveWordCount({ minimumEntropy: 0, strengthSteps: 0 }, 8192)).toBe(1);
    });

    it('works with a two word list', () => {
        expect(resolveWordCount({ minimumEntropy: 80, strengthSteps: 0 }, 2)).toBe(80);
    });

    it('signals a configuration error for lists without entropy', () => {
        expect(() => resolveWordCount({ strengthSteps: 0 }, 1)).toThrow(ConfigurationError);
        expect(() => resolveWordCount({ strengthSteps: 0 }, 0)).toThrow(ConfigurationError);
    });
});

describe('bitsPerWord', () => {
    it('is log2 of the list length', () => {
        expect(bitsPerWord(8192)).toBe(13);
        expect(bitsPerWord(2)).toBe(1);
    });

    it('rejects lists shorter than two words', () => {
        expect(() => bitsPerWord(1)).toThrow(/at least 2 distinct words/);
    });
});

describe('resolveRequest', () => {
    it('maps each request kind onto the resolver', () => {
        expect(resolveRequest({ kind: 'wordCount', count: 4 }, 1296)).toBe(4);
        expect(resolveRequest({ kind: 'minimumEntropy', bits: 80 }, 8192)).toBe(7);
        // 100 bits / 13 bits per word
        expect(resolveRequest({ kind: 'strength', steps: 1 }, 8192)).toBe(8);
    });
});
