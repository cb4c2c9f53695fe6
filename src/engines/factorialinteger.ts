// src/engines/factorialinteger.ts

/**
 * Arbitrary-precision signed integers in the factorial number system.
 * Digits are packed into words whose width comes from `NUMSYS_FACTORIAL_WORD_BITS`.
 *
 * Values are immutable. Every operation returns a new FactorialInteger.
 */

import type { IntegralOperators, IntegralValue, Ordering } from '../operators/operators.js';
import type { DigitStorage, WordBits } from '../storage/wordstorage.js';

import config from '../util/config.js';
import factoraccess from '../codec/factoraccess.js';
import factorialarithmetic from './factorialarithmetic.js';
import { IntegerCell } from '../operators/integercell.js';
import { IntegralBase } from '../operators/integralbase.js';
import { deriveOperators, primitivesOf } from '../operators/operators.js';
import { InvalidFormatError } from '../util/errors.js';


/** Anything a FactorialInteger can be built from. */
type FactorialInput = FactorialInteger | string | number | bigint;


export class FactorialInteger extends IntegralBase<FactorialInteger, FactorialInput> implements IntegralValue<FactorialInteger> {
	/** The word width shared by every FactorialInteger. */
	static readonly WORD_BITS: WordBits = config.factorialWordBits;

	private readonly storage: DigitStorage;

	private constructor(storage: DigitStorage) {
		super();
		this.storage = storage;
	}

	// Construction ================================================

	/**
	 * Creates a FactorialInteger from a decimal string matching `-?(0|[1-9][0-9]*)`.
	 * @throws {InvalidFormatError} for anything else.
	 */
	static fromString(value: string): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.fromDecimalString(value, FactorialInteger.WORD_BITS));
	}

	/**
	 * Creates a FactorialInteger from a native number.
	 * @throws {InvalidFormatError} if the number is not a safe integer.
	 */
	static fromNumber(value: number): FactorialInteger {
		if (!Number.isSafeInteger(value)) throw new InvalidFormatError(String(value), 'Number is not a safe integer');
		return FactorialInteger.fromBigInt(BigInt(value));
	}

	static fromBigInt(value: bigint): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.fromBigInt(value, FactorialInteger.WORD_BITS));
	}

	static from(value: FactorialInput): FactorialInteger {
		if (value instanceof FactorialInteger) return value;
		if (typeof value === 'string') return FactorialInteger.fromString(value);
		if (typeof value === 'number') return FactorialInteger.fromNumber(value);
		return FactorialInteger.fromBigInt(value);
	}

	static zero(): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.createZero(FactorialInteger.WORD_BITS));
	}

	static one(): FactorialInteger {
		return FactorialInteger.fromNumber(1);
	}

	/** A mutable cell for compound assignment (`+=`, `++`, ...). */
	static cell(initial: FactorialInput = 0): IntegerCell<FactorialInteger> {
		return new IntegerCell(factorialOperators, FactorialInteger.from(initial));
	}

	// State =======================================================

	/** True if negative. Zero is never negative. */
	get sign(): boolean {
		return this.storage.sign;
	}

	/** The packed words, least significant first. Zero has none. */
	get words(): readonly number[] {
		return this.storage.words;
	}

	/** The index of the highest nonzero digit. 0 for zero. */
	get highestIndex(): number {
		return this.storage.highestIndex;
	}

	/**
	 * The factorial digits, least significant first, up to the highest nonzero one.
	 * Digit `i` lies in `[0, i]`. Zero gives `[]`.
	 */
	digits(): number[] {
		if (this.isZero()) return [];
		const digits: number[] = [];
		for (let idx = 0; idx <= this.storage.highestIndex; idx++) {
			digits.push(factoraccess.extract(this.storage, idx) ?? 0);
		}
		return digits;
	}

	isZero(): boolean {
		return factorialarithmetic.isZero(this.storage);
	}

	withSign(negative: boolean): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.withSign(this.storage, negative));
	}

	// Primitives ==================================================

	compare(other: FactorialInput): Ordering {
		return factorialarithmetic.compare(this.storage, FactorialInteger.from(other).storage);
	}

	/** The sum of both magnitudes, ignoring signs. Use {@link plus} for signed addition. */
	add(other: FactorialInput): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.add(this.storage, FactorialInteger.from(other).storage));
	}

	/**
	 * The difference of both magnitudes, ignoring signs. Requires `|this| >= |other|`.
	 * Use {@link minus} for signed subtraction.
	 */
	subtract(other: FactorialInput): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.subtract(this.storage, FactorialInteger.from(other).storage));
	}

	multiply(other: FactorialInput): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.multiply(this.storage, FactorialInteger.from(other).storage));
	}

	divide(other: FactorialInput): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.divide(this.storage, FactorialInteger.from(other).storage));
	}

	modulo(other: FactorialInput): FactorialInteger {
		return new FactorialInteger(factorialarithmetic.modulo(this.storage, FactorialInteger.from(other).storage));
	}

	// Operators ===================================================

	protected override get operators(): IntegralOperators<FactorialInteger> {
		return factorialOperators;
	}

	protected override self(): FactorialInteger {
		return this;
	}

	protected override coerce(value: FactorialInput): FactorialInteger {
		return FactorialInteger.from(value);
	}

	// Conversion ==================================================

	override toString(): string {
		return factorialarithmetic.toDecimalString(this.storage);
	}

	override toBigInt(width: number = 64, signed: boolean = true): bigint {
		return factorialarithmetic.toBigInt(this.storage, width, signed);
	}
}


const factorialOperators: IntegralOperators<FactorialInteger> = deriveOperators(primitivesOf(FactorialInteger.fromNumber));


export type { FactorialInput };
