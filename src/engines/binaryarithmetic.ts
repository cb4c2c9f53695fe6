// src/engines/binaryarithmetic.ts

/**
 * The binary engine's primitives: positional arithmetic in base `2^wordBits`,
 * directly over {@link WordStorage}.
 *
 * Canonical form: zero is exactly one `0` word and is never negative,
 * and a nonzero magnitude has no zero words at its most significant end.
 * Every function returns a new storage and leaves its operands untouched.
 */

import type { Ordering } from '../operators/operators.js';
import type { WordBits } from '../storage/wordstorage.js';
import type { Bit } from '../storage/overflowops.js';

import overflowops from '../storage/overflowops.js';
import decimalstring from '../decimal/decimalstring.js';
import { WordStorage } from '../storage/wordstorage.js';
import { DivideByZeroError, InvalidFormatError, MagnitudeError, OverflowError } from '../util/errors.js';


// Constants ====================================================


const ZERO: bigint = 0n;
const ONE: bigint = 1n;

/** Base of each decimal chunk built while stringifying large magnitudes. */
const CHUNK_BASE = 1_000_000_000;
const CHUNK_DIGITS = 9;

/** Magnitudes occupying at most this many bits are stringified natively. */
const NATIVE_STRING_BITS = 64;


// Helpers ======================================================


function createZero(wordBits: WordBits): WordStorage {
	return new WordStorage(wordBits, [0]);
}

/** Trims zero words and clears the sign of a zero result, in place. */
function canonicalize(storage: WordStorage): WordStorage {
	storage.trimTrailingZeros();
	if (storage.isAllZero()) storage.setSign(false);
	return storage;
}

function assertSameFamily(a: WordStorage, b: WordStorage): void {
	if (a.wordBits !== b.wordBits) throw new TypeError(`Cannot combine ${a.wordBits}-bit and ${b.wordBits}-bit word storages`);
}

function isZero(storage: WordStorage): boolean {
	return storage.isAllZero();
}

/** A non-negative copy. */
function magnitudeOf(storage: WordStorage): WordStorage {
	const copy = storage.clone();
	copy.setSign(false);
	return copy;
}

/** A copy with the given sign. Zero stays non-negative. */
function withSign(storage: WordStorage, negative: boolean): WordStorage {
	const copy = storage.clone();
	copy.setSign(negative);
	return canonicalize(copy);
}


// Comparison ===================================================


/** Compares the magnitudes word by word from the most significant end. Missing words count as 0. */
function compareMagnitude(a: WordStorage, b: WordStorage): Ordering {
	for (let i = Math.max(a.size, b.size) - 1; i >= 0; i--) {
		const lhsWord = a.at(i);
		const rhsWord = b.at(i);
		if (lhsWord < rhsWord) return -1;
		if (lhsWord > rhsWord) return 1;
	}
	return 0;
}

/** Signed three-way comparison. */
function compare(a: WordStorage, b: WordStorage): Ordering {
	// 1. Compare signs
	if (a.sign !== b.sign) return a.sign ? -1 : 1;

	const lhsIsZero = isZero(a);
	const rhsIsZero = isZero(b);
	if (lhsIsZero && rhsIsZero) return 0;
	if (lhsIsZero) return -1;
	if (rhsIsZero) return 1;

	// 2. Compare magnitudes. Negative operands invert the order.
	const order = compareMagnitude(a, b);
	if (order === 0) return 0;
	return a.sign ? (order < 0 ? 1 : -1) : order;
}


// Arithmetic ===================================================


/** The sum of the magnitudes. The result is non-negative. */
function add(a: WordStorage, b: WordStorage): WordStorage {
	assertSameFamily(a, b);
	const result = new WordStorage(a.wordBits);
	let carry: Bit = 0;
	for (let idx = 0; idx < Math.max(a.size, b.size); idx++) {
		const sum = overflowops.sum(a.at(idx), b.at(idx), carry, a.wordBits);
		result.set(idx, sum.result);
		carry = sum.carry;
	}
	if (carry) result.push(1);
	return canonicalize(result);
}

/**
 * The difference of the magnitudes. The result is non-negative.
 * @throws {MagnitudeError} if `|a| < |b|`. Callers pass the larger magnitude first.
 */
function subtract(a: WordStorage, b: WordStorage): WordStorage {
	assertSameFamily(a, b);
	const result = new WordStorage(a.wordBits);
	let borrow: Bit = 0;
	for (let idx = 0; idx < Math.max(a.size, b.size); idx++) {
		const difference = overflowops.subtract(a.at(idx), b.at(idx), borrow, a.wordBits);
		result.set(idx, difference.result);
		borrow = difference.borrow;
	}
	if (borrow) throw new MagnitudeError('Binary magnitude subtraction requires |lhs| >= |rhs|.');
	return canonicalize(result);
}

/** Shift-and-add multiplication: the left magnitude, shifted to every set bit of the right one, is summed. */
function multiply(a: WordStorage, b: WordStorage): WordStorage {
	assertSameFamily(a, b);
	if (isZero(a) || isZero(b)) return createZero(a.wordBits);

	let result = createZero(a.wordBits);
	const bitCount = b.size * b.wordBits;
	for (let bitPos = 0; bitPos < bitCount; bitPos++) {
		if (b.testBit(bitPos)) result = add(result, a.shiftLeft(bitPos));
	}

	result.setSign(a.sign !== b.sign);
	return canonicalize(result);
}

/**
 * Truncating division by restoring binary long division.
 * The quotient's sign is the XOR of the operands' signs.
 * @throws {DivideByZeroError} if the divisor is zero.
 */
function divide(a: WordStorage, b: WordStorage): WordStorage {
	assertSameFamily(a, b);
	if (isZero(b)) throw new DivideByZeroError();
	if (isZero(a)) return createZero(a.wordBits);

	const quotient = new WordStorage(a.wordBits);
	let remainder = createZero(a.wordBits);
	for (let i = a.bitLength() - 1; i >= 0; i--) {
		// Bring down the next bit of the dividend
		remainder = remainder.shiftLeft(1);
		if (a.testBit(i)) remainder.setBit(0);

		if (compareMagnitude(remainder, b) >= 0) {
			remainder = subtract(remainder, b);
			quotient.setBit(i);
		}
	}

	quotient.setSign(a.sign !== b.sign);
	return canonicalize(quotient);
}

/**
 * The remainder of truncating division, `a - (a / b) * b`.
 * It always carries the dividend's sign.
 * @throws {DivideByZeroError} if the divisor is zero.
 */
function modulo(a: WordStorage, b: WordStorage): WordStorage {
	if (isZero(b)) throw new DivideByZeroError();
	if (isZero(a)) return createZero(a.wordBits);

	const product = multiply(magnitudeOf(divide(a, b)), magnitudeOf(b));
	const remainder = subtract(a, product);
	remainder.setSign(a.sign);
	return canonicalize(remainder);
}


// Conversion ===================================================


/**
 * Reads a decimal string by repeatedly halving it,
 * collecting each remainder as the next bit.
 * @throws {InvalidFormatError} if the string is not a canonical decimal integer.
 */
function fromDecimalString(str: string, wordBits: WordBits): WordStorage {
	if (!decimalstring.isIntegralString(str)) throw new InvalidFormatError(str);

	const negative = str.startsWith('-');
	let value = negative ? str.slice(1) : str;
	if (value === '0') return createZero(wordBits);

	const storage = new WordStorage(wordBits);
	let word = 0;
	let bitIndex = 0;
	while (value !== '0') {
		const { quotient, remainder } = decimalstring.divideByWord(value, 2);
		value = quotient;
		word += remainder * 2 ** bitIndex;
		bitIndex++;
		// Once the word is full, store it and start the next one
		if (bitIndex === wordBits) {
			storage.push(word);
			word = 0;
			bitIndex = 0;
		}
	}
	if (bitIndex !== 0) storage.push(word);

	storage.setSign(negative);
	return canonicalize(storage);
}

function fromBigInt(value: bigint, wordBits: WordBits): WordStorage {
	if (value === ZERO) return createZero(wordBits);

	const negative = value < ZERO;
	let magnitude = negative ? -value : value;
	const mask = (ONE << BigInt(wordBits)) - ONE;
	const storage = new WordStorage(wordBits);
	while (magnitude !== ZERO) {
		storage.push(Number(magnitude & mask));
		magnitude >>= BigInt(wordBits);
	}

	storage.setSign(negative);
	return canonicalize(storage);
}

function magnitudeToBigInt(storage: WordStorage): bigint {
	let magnitude = ZERO;
	for (let i = storage.size - 1; i >= 0; i--) {
		magnitude = (magnitude << BigInt(storage.wordBits)) | BigInt(storage.at(i));
	}
	return magnitude;
}

/**
 * Converts to a native bigint confined to a fixed-width integer type.
 * @param width - The width of the target type, in bits.
 * @param signed - Whether the target type is signed.
 * @throws {OverflowError} if the magnitude occupies more bits than the target type holds.
 */
function toBigInt(storage: WordStorage, width: number, signed: boolean): bigint {
	if (isZero(storage)) return ZERO;

	const bitLength = storage.bitLength();
	const magnitude = magnitudeToBigInt(storage);
	if (signed) {
		// The one value that needs all `width` bits is the most negative one
		const fitsNegativeLimit = storage.sign && magnitude === ONE << BigInt(width - 1);
		if (bitLength > width - 1 && !fitsNegativeLimit) throw new OverflowError();
		return storage.sign ? -magnitude : magnitude;
	}

	if (storage.sign) throw new OverflowError('A negative value cannot be held by an unsigned integral type');
	if (bitLength > width) throw new OverflowError();
	return magnitude;
}

/**
 * Doubles a little-endian list of base-10^9 chunks and adds a bit to it.
 * Done once per bit, from the most significant, this converts binary to decimal.
 */
function doubleAndAdd(chunks: number[], bit: 0 | 1): void {
	let carry: number = bit;
	for (let i = 0; i < chunks.length; i++) {
		const value = (chunks[i] ?? 0) * 2 + carry;
		chunks[i] = value % CHUNK_BASE;
		carry = Math.floor(value / CHUNK_BASE);
	}
	if (carry) chunks.push(carry);
}

/** Renders canonical decimal text: a `-` only for negative nonzero values, no leading zeros. */
function toDecimalString(storage: WordStorage): string {
	if (isZero(storage)) return '0';
	const prefix = storage.sign ? '-' : '';

	// Small enough for a native conversion
	if (storage.size * storage.wordBits <= NATIVE_STRING_BITS) return prefix + magnitudeToBigInt(storage).toString();

	const chunks: number[] = [0];
	for (let i = storage.bitLength() - 1; i >= 0; i--) {
		doubleAndAdd(chunks, storage.testBit(i) ? 1 : 0);
	}

	// Every chunk except the most significant one is zero-padded to 9 digits
	let result = String(chunks[chunks.length - 1] ?? 0);
	for (let i = chunks.length - 2; i >= 0; i--) {
		result += String(chunks[i] ?? 0).padStart(CHUNK_DIGITS, '0');
	}
	return prefix + result;
}


export default {
	// Helpers
	createZero,
	isZero,
	withSign,
	// Comparison
	compareMagnitude,
	compare,
	// Arithmetic
	add,
	subtract,
	multiply,
	divide,
	modulo,
	// Conversion
	fromDecimalString,
	fromBigInt,
	toBigInt,
	toDecimalString,
};
