import { randomFillSync } from "crypto";

const UINT32_RANGE = 0x1_0000_0000;
const BUFFER_SIZE = 256;

/**
 * Source of uniformly distributed unsigned 32-bit integers.
 *
 * Generation code never reaches for a global generator; it is handed one of
 * these, so tests can substitute a scripted sequence.
 */
export interface RandomSource {
    nextUint32(): number;
}

/**
 * RandomSource backed by the operating system CSPRNG.
 *
 * Values are fetched in blocks and handed out one at a time. The instance is
 * meant to be shared for a whole run.
 */
export class CryptoRandomSource implements RandomSource {
    private readonly buffer = new Uint32Array(BUFFER_SIZE);
    private position = BUFFER_SIZE;

    nextUint32(): number {
        if (this.position >= BUFFER_SIZE) {
            randomFillSync(this.buffer);
            this.position = 0;
        }
        const value = this.buffer[this.position];
        // Spent values are not kept around
        this.buffer[this.position] = 0;
        this.position += 1;
        return value;
    }
}

/**
 * Draw an integer in `[0, bound)` without modulo bias.
 *
 * Values from the top, partial copy of `bound` inside the 32-bit range are
 * rejected and drawn again.
 */
export function uniformInt(random: RandomSource, bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
        throw new RangeError(`bound must be an integer between 1 and 2^32, got ${bound}`);
    }

    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (;;) {
        const value = random.nextUint32();
        if (value < limit) {
            return value % bound;
        }
    }
}
