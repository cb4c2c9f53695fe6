// src/operators/integralbase.ts

/**
 * The operator methods shared by every integer value class.
 *
 * A subclass supplies its derived {@link IntegralOperators}, a way to coerce
 * its accepted inputs, and its conversions. Everything here forwards to those.
 */

import type { IntegralOperators } from './operators.js';

import { OverflowError } from '../util/errors.js';


/**
 * @template T - The concrete value class.
 * @template I - Every input the class accepts as an operand.
 */
export abstract class IntegralBase<T, I> {
	/** The operators derived from the subclass's primitives. */
	protected abstract get operators(): IntegralOperators<T>;

	/** This value, typed as the concrete class. */
	protected abstract self(): T;

	/** Turns an accepted input into a value of the concrete class. */
	protected abstract coerce(value: I): T;

	abstract toString(): string;

	/**
	 * Converts to a native bigint that fits a fixed-width integer type.
	 * @param width - Bit width of the target type. Default 64.
	 * @param signed - Whether the target type is signed. Default true.
	 * @throws {OverflowError} if the value doesn't fit.
	 */
	abstract toBigInt(width?: number, signed?: boolean): bigint;

	// Operators ===================================================

	plus(other: I): T {
		return this.operators.plus(this.self(), this.coerce(other));
	}

	minus(other: I): T {
		return this.operators.minus(this.self(), this.coerce(other));
	}

	times(other: I): T {
		return this.operators.times(this.self(), this.coerce(other));
	}

	/** Truncating division. */
	dividedBy(other: I): T {
		return this.operators.dividedBy(this.self(), this.coerce(other));
	}

	/** The remainder of truncating division. It has the sign of this value. */
	mod(other: I): T {
		return this.operators.mod(this.self(), this.coerce(other));
	}

	negate(): T {
		return this.operators.negate(this.self());
	}

	increment(): T {
		return this.operators.increment(this.self());
	}

	decrement(): T {
		return this.operators.decrement(this.self());
	}

	abs(): T {
		return this.operators.abs(this.self());
	}

	pow(exponent: number): T {
		return this.operators.pow(this.self(), exponent);
	}

	/** The integer square root, truncated. */
	sqrt(): T {
		return this.operators.sqrt(this.self());
	}

	lt(other: I): boolean {
		return this.operators.lt(this.self(), this.coerce(other));
	}

	le(other: I): boolean {
		return this.operators.le(this.self(), this.coerce(other));
	}

	gt(other: I): boolean {
		return this.operators.gt(this.self(), this.coerce(other));
	}

	ge(other: I): boolean {
		return this.operators.ge(this.self(), this.coerce(other));
	}

	eq(other: I): boolean {
		return this.operators.eq(this.self(), this.coerce(other));
	}

	ne(other: I): boolean {
		return this.operators.ne(this.self(), this.coerce(other));
	}

	// Conversion ==================================================

	toJSON(): string {
		return this.toString();
	}

	/**
	 * Converts to a native number.
	 * @throws {OverflowError} if the value is outside the safe integer range.
	 */
	toNumber(): number {
		const value = this.toBigInt(64, true);
		if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) throw new OverflowError('Value is outside the safe integer range of a number');
		return Number(value);
	}
}
