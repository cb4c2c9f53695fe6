// src/codec/factoraccess.ts

/**
 * The mixed-radix digit codec of the factorial engine.
 *
 * Digit `i` of a factorial-base number lies in `[0, i]`, so it needs exactly
 * as many bits as `i` has. Digits are packed back to back with no padding:
 * digit 0 takes no bits at all, digit 1 one bit, digits 2 and 3 two bits,
 * digits 4 through 7 three bits, and so on.
 *
 * ```
 * index:   1 | 2  | 3  | 4   | 5   | 6   | 7   | 8    ...
 * offset:  0 | 1  | 3  | 5   | 8   | 11  | 14  | 17   ...
 * ```
 *
 * The offset of a digit is the total width of every digit before it, which
 * has a closed form (see {@link totalBitsUpTo}), so any digit can be reached
 * without walking the ones before it.
 */

import type { DigitStorage, WordStorage } from '../storage/wordstorage.js';

import { BitCursor } from './bitcursor.js';
import { IndexOutOfRangeError, RadixViolationError } from '../util/errors.js';


// Constants =========================================================


const ZERO: bigint = 0n;
const ONE: bigint = 1n;
const TWO: bigint = 2n;

/** The largest digit index the offset formula is defined for, `2^63 - 1`. */
const MAXINDEX: bigint = (ONE << 63n) - ONE;

const TWO_POW_32 = 2 ** 32;


// Bit Widths =========================================================


/**
 * The number of bits in the binary representation of a non-negative safe integer.
 * `countBits(0)` is 0.
 */
function countBits(value: number): number {
	if (value === 0) return 0;
	let width = 0;
	while (value >= TWO_POW_32) {
		value = Math.floor(value / TWO_POW_32);
		width += 32;
	}
	return width + 32 - Math.clz32(value);
}

/** How many bits the digit at an index occupies, `ceil(log2(index + 1))`. */
function bitsNeeded(index: number): number {
	return countBits(index);
}

/**
 * The total width of digits `0` through `index - 1`, which is
 * the bit offset the digit at `index` starts at.
 *
 * With `N = index - 1` and `M = floor(log2(N))`, the sum of the bit lengths
 * of `1..N` is `N + M*N - (2^(M+1) - M - 2)`.
 * @throws {IndexOutOfRangeError} if the index is negative or above {@link MAXINDEX}.
 */
function totalBitsUpTo(index: bigint): bigint {
	if (index < ZERO) throw new IndexOutOfRangeError(`Digit index cannot be negative. Received: ${index}`);
	if (index > MAXINDEX) throw new IndexOutOfRangeError('Digit index is too large: exceeds MAXINDEX');
	if (index === ZERO || index === ONE) return ZERO;

	const n = index - ONE;
	const m = BigInt(n.toString(2).length - 1);
	const powerOfTwo = ONE << (m + ONE);
	return n + (m * n - (powerOfTwo - m - TWO));
}

/**
 * The bit offset of a digit as a safe integer.
 * @throws {IndexOutOfRangeError} if the index is not a non-negative safe integer,
 * or its offset is beyond what a safe integer addresses.
 */
function bitOffset(index: number): number {
	if (!Number.isSafeInteger(index) || index < 0) throw new IndexOutOfRangeError(`Digit index must be a non-negative safe integer. Received: ${index}`);
	const offset = totalBitsUpTo(BigInt(index));
	if (offset > BigInt(Number.MAX_SAFE_INTEGER)) throw new IndexOutOfRangeError(`The bit offset of digit index ${index} is out of the addressable range`);
	return Number(offset);
}


// Access =========================================================


/**
 * Reads the digit at an index.
 * @returns The digit, or undefined if the digit's bits start or end past the
 * occupied words. Callers treat that as a 0 digit, or as the end of the number.
 */
function extract(storage: WordStorage, index: number): number | undefined {
	const offset = bitOffset(index);
	const width = bitsNeeded(index);
	if (width === 0) return 0;

	const bitsInStorage = storage.size * storage.wordBits;
	if (offset >= bitsInStorage || offset + width > bitsInStorage) return undefined;

	return new BitCursor(storage, offset).read(width);
}

/**
 * Writes the digit at an index, growing the storage by whole words if the
 * digit doesn't fit yet, and raising the cached highest index if needed.
 * @throws {RadixViolationError} if the value is not an integer in `[0, index]`.
 */
function put(storage: DigitStorage, index: number, value: number): void {
	const offset = bitOffset(index);
	const width = bitsNeeded(index);
	if (!Number.isInteger(value) || value < 0 || value > index) throw new RadixViolationError(index, value);
	if (width === 0) return;

	if (storage.highestIndex < index) storage.setHighestIndex(index);

	const wordsNeeded = Math.ceil((offset + width) / storage.wordBits);
	if (wordsNeeded > storage.size) storage.resize(wordsNeeded);

	new BitCursor(storage, offset).write(width, value);
}


export { MAXINDEX };

export default {
	// Bit Widths
	countBits,
	bitsNeeded,
	totalBitsUpTo,
	bitOffset,
	// Access
	extract,
	put,
};
