// src/engines/binaryinteger.ts

/**
 * Arbitrary-precision signed integers stored in base `2^wordBits`.
 * The word width comes from `NUMSYS_BINARY_WORD_BITS`.
 *
 * Values are immutable. Every operation returns a new BinaryInteger.
 */

import type { IntegralOperators, IntegralValue, Ordering } from '../operators/operators.js';
import type { WordStorage, WordBits } from '../storage/wordstorage.js';

import config from '../util/config.js';
import binaryarithmetic from './binaryarithmetic.js';
import { IntegerCell } from '../operators/integercell.js';
import { IntegralBase } from '../operators/integralbase.js';
import { deriveOperators, primitivesOf } from '../operators/operators.js';
import { InvalidFormatError } from '../util/errors.js';


/** Anything a BinaryInteger can be built from. */
type BinaryInput = BinaryInteger | string | number | bigint;


export class BinaryInteger extends IntegralBase<BinaryInteger, BinaryInput> implements IntegralValue<BinaryInteger> {
	/** The word width shared by every BinaryInteger. */
	static readonly WORD_BITS: WordBits = config.binaryWordBits;

	private readonly storage: WordStorage;

	private constructor(storage: WordStorage) {
		super();
		this.storage = storage;
	}

	// Construction ================================================

	/**
	 * Creates a BinaryInteger from a decimal string matching `-?(0|[1-9][0-9]*)`.
	 * @throws {InvalidFormatError} for anything else.
	 */
	static fromString(value: string): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.fromDecimalString(value, BinaryInteger.WORD_BITS));
	}

	/**
	 * Creates a BinaryInteger from a native number.
	 * @throws {InvalidFormatError} if the number is not a safe integer.
	 */
	static fromNumber(value: number): BinaryInteger {
		if (!Number.isSafeInteger(value)) throw new InvalidFormatError(String(value), 'Number is not a safe integer');
		return BinaryInteger.fromBigInt(BigInt(value));
	}

	static fromBigInt(value: bigint): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.fromBigInt(value, BinaryInteger.WORD_BITS));
	}

	/** Creates a BinaryInteger from any supported input. BinaryIntegers are returned as they are. */
	static from(value: BinaryInput): BinaryInteger {
		if (value instanceof BinaryInteger) return value;
		if (typeof value === 'string') return BinaryInteger.fromString(value);
		if (typeof value === 'number') return BinaryInteger.fromNumber(value);
		return BinaryInteger.fromBigInt(value);
	}

	static zero(): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.createZero(BinaryInteger.WORD_BITS));
	}

	static one(): BinaryInteger {
		return BinaryInteger.fromNumber(1);
	}

	/** A mutable cell for compound assignment (`+=`, `++`, ...). */
	static cell(initial: BinaryInput = 0): IntegerCell<BinaryInteger> {
		return new IntegerCell(binaryOperators, BinaryInteger.from(initial));
	}

	// State =======================================================

	/** True if negative. Zero is never negative. */
	get sign(): boolean {
		return this.storage.sign;
	}

	/** The magnitude's words, least significant first. */
	get words(): readonly number[] {
		return this.storage.words;
	}

	isZero(): boolean {
		return binaryarithmetic.isZero(this.storage);
	}

	/** A copy with the given sign. Zero stays non-negative. */
	withSign(negative: boolean): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.withSign(this.storage, negative));
	}

	// Primitives ==================================================

	compare(other: BinaryInput): Ordering {
		return binaryarithmetic.compare(this.storage, BinaryInteger.from(other).storage);
	}

	/** The sum of both magnitudes, ignoring signs. Use {@link plus} for signed addition. */
	add(other: BinaryInput): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.add(this.storage, BinaryInteger.from(other).storage));
	}

	/**
	 * The difference of both magnitudes, ignoring signs. Requires `|this| >= |other|`.
	 * Use {@link minus} for signed subtraction.
	 */
	subtract(other: BinaryInput): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.subtract(this.storage, BinaryInteger.from(other).storage));
	}

	multiply(other: BinaryInput): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.multiply(this.storage, BinaryInteger.from(other).storage));
	}

	/** Truncating division. */
	divide(other: BinaryInput): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.divide(this.storage, BinaryInteger.from(other).storage));
	}

	/** The remainder of truncating division. It has the sign of this value. */
	modulo(other: BinaryInput): BinaryInteger {
		return new BinaryInteger(binaryarithmetic.modulo(this.storage, BinaryInteger.from(other).storage));
	}

	// Operators ===================================================

	protected override get operators(): IntegralOperators<BinaryInteger> {
		return binaryOperators;
	}

	protected override self(): BinaryInteger {
		return this;
	}

	protected override coerce(value: BinaryInput): BinaryInteger {
		return BinaryInteger.from(value);
	}

	// Conversion ==================================================

	override toString(): string {
		return binaryarithmetic.toDecimalString(this.storage);
	}

	override toBigInt(width: number = 64, signed: boolean = true): bigint {
		return binaryarithmetic.toBigInt(this.storage, width, signed);
	}
}


const binaryOperators: IntegralOperators<BinaryInteger> = deriveOperators(primitivesOf(BinaryInteger.fromNumber));


export type { BinaryInput };
