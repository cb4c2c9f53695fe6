// src/operators/operators.ts

/**
 * Derives the full set of integer operators from a handful of engine primitives.
 *
 * Each engine only implements comparison, magnitude addition and subtraction,
 * and signed multiplication, division and modulo. Everything sign-aware on top of
 * those (signed addition, negation, increments, the six comparisons, abs, pow, sqrt)
 * is written once here and shared by both engines.
 */

import { DomainError } from '../util/errors.js';


// Types ========================================================


/** The result of a three-way comparison. */
type Ordering = -1 | 0 | 1;

/** The minimal contract an engine provides for its values of type T. */
interface IntegralPrimitives<T> {
	/** Signed three-way comparison. */
	compare(a: T, b: T): Ordering;
	/** The sum of the magnitudes. The result is non-negative. */
	add(a: T, b: T): T;
	/** The difference of the magnitudes. Requires `|a| >= |b|`. The result is non-negative. */
	subtract(a: T, b: T): T;
	multiply(a: T, b: T): T;
	divide(a: T, b: T): T;
	modulo(a: T, b: T): T;
	isNegative(a: T): boolean;
	/** A copy with the given sign. Zero stays non-negative. */
	withSign(a: T, negative: boolean): T;
	fromNumber(value: number): T;
}

/** The operators derived from an engine's {@link IntegralPrimitives}. */
interface IntegralOperators<T> {
	plus(a: T, b: T): T;
	minus(a: T, b: T): T;
	times(a: T, b: T): T;
	dividedBy(a: T, b: T): T;
	mod(a: T, b: T): T;
	negate(a: T): T;
	increment(a: T): T;
	decrement(a: T): T;
	lt(a: T, b: T): boolean;
	le(a: T, b: T): boolean;
	gt(a: T, b: T): boolean;
	ge(a: T, b: T): boolean;
	eq(a: T, b: T): boolean;
	ne(a: T, b: T): boolean;
	abs(a: T): T;
	pow(base: T, exponent: number): T;
	sqrt(a: T): T;
}

/** The methods an integer value class exposes, enough to build its {@link IntegralPrimitives}. */
interface IntegralValue<T> {
	readonly sign: boolean;
	compare(other: T): Ordering;
	add(other: T): T;
	subtract(other: T): T;
	multiply(other: T): T;
	divide(other: T): T;
	modulo(other: T): T;
	withSign(negative: boolean): T;
}


// Derivation ===================================================


/**
 * Builds the primitive contract of a value class out of its own methods.
 * @param fromNumber - Constructs a value of the class from a native integer.
 */
function primitivesOf<T extends IntegralValue<T>>(fromNumber: (value: number) => T): IntegralPrimitives<T> {
	return {
		compare: (a, b) => a.compare(b),
		add: (a, b) => a.add(b),
		subtract: (a, b) => a.subtract(b),
		multiply: (a, b) => a.multiply(b),
		divide: (a, b) => a.divide(b),
		modulo: (a, b) => a.modulo(b),
		isNegative: (a) => a.sign,
		withSign: (a, negative) => a.withSign(negative),
		fromNumber,
	};
}

/** Derives every operator from the primitives of one engine. */
function deriveOperators<T>(primitives: IntegralPrimitives<T>): IntegralOperators<T> {
	const { compare, isNegative, withSign, fromNumber } = primitives;

	const negate = (a: T): T => withSign(a, !isNegative(a));
	const abs = (a: T): T => isNegative(a) ? negate(a) : a;

	function plus(a: T, b: T): T {
		// a + b | (-a) + (-b)
		if (isNegative(a) === isNegative(b)) return withSign(primitives.add(a, b), isNegative(a));

		// Differing signs: subtract the smaller magnitude from the larger one
		const order = compare(abs(a), abs(b));
		if (order === 0) return fromNumber(0);
		const [larger, smaller]: [T, T] = order > 0 ? [a, b] : [b, a];
		return withSign(primitives.subtract(larger, smaller), isNegative(larger));
	}

	const minus = (a: T, b: T): T => plus(a, negate(b));
	const times = (a: T, b: T): T => primitives.multiply(a, b);
	const dividedBy = (a: T, b: T): T => primitives.divide(a, b);
	const lt = (a: T, b: T): boolean => compare(a, b) < 0;
	const le = (a: T, b: T): boolean => compare(a, b) <= 0;

	/**
	 * Exponentiation by squaring.
	 * @throws {DomainError} if the exponent is not a non-negative safe integer.
	 */
	function pow(base: T, exponent: number): T {
		if (!Number.isSafeInteger(exponent) || exponent < 0) throw new DomainError(`Exponent must be a non-negative safe integer. Received: ${exponent}`);

		let result = fromNumber(1);
		while (exponent > 0) {
			if (exponent % 2 === 1) result = times(result, base);
			exponent = Math.floor(exponent / 2);
			if (exponent > 0) base = times(base, base);
		}
		return result;
	}

	/**
	 * The integer square root, the largest `m` with `m * m <= a`.
	 * Binary search over `[1, a]`.
	 * @throws {DomainError} if the value is negative.
	 */
	function sqrt(a: T): T {
		if (isNegative(a)) throw new DomainError('sqrt of negative value');
		const zero = fromNumber(0);
		if (compare(a, zero) === 0) return zero;

		const one = fromNumber(1);
		const two = fromNumber(2);
		let low = one;
		let high = a;
		while (le(low, high)) {
			const mid = dividedBy(plus(low, high), two);
			const order = compare(times(mid, mid), a);
			if (order === 0) return mid;
			if (order < 0) low = plus(mid, one);
			else high = minus(mid, one);
		}
		return high;
	}

	return {
		plus,
		minus,
		times,
		dividedBy,
		mod: (a, b) => primitives.modulo(a, b),
		negate,
		increment: (a) => plus(a, fromNumber(1)),
		decrement: (a) => minus(a, fromNumber(1)),
		lt,
		le,
		gt: (a, b) => compare(a, b) > 0,
		ge: (a, b) => compare(a, b) >= 0,
		eq: (a, b) => compare(a, b) === 0,
		ne: (a, b) => compare(a, b) !== 0,
		abs,
		pow,
		sqrt,
	};
}


export type { Ordering, IntegralPrimitives, IntegralOperators, IntegralValue };

export { primitivesOf, deriveOperators };
