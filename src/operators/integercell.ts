// src/operators/integercell.ts

import type { IntegralOperators } from './operators.js';

/**
 * A mutable slot holding an immutable integer value.
 *
 * Compound assignment and the increment/decrement forms replace the held value
 * with the result of the matching derived operator. The value itself is never
 * modified in place, so anything else holding it is unaffected.
 */
export class IntegerCell<T> {
	private readonly operators: IntegralOperators<T>;
	private current: T;

	constructor(operators: IntegralOperators<T>, initial: T) {
		this.operators = operators;
		this.current = initial;
	}

	get value(): T {
		return this.current;
	}

	set value(value: T) {
		this.current = value;
	}

	// Compound assignment =========================================

	/** `+=` */
	addAssign(rhs: T): T {
		this.current = this.operators.plus(this.current, rhs);
		return this.current;
	}

	/** `-=` */
	subtractAssign(rhs: T): T {
		this.current = this.operators.minus(this.current, rhs);
		return this.current;
	}

	/** `*=` */
	multiplyAssign(rhs: T): T {
		this.current = this.operators.times(this.current, rhs);
		return this.current;
	}

	/** `/=` */
	divideAssign(rhs: T): T {
		this.current = this.operators.dividedBy(this.current, rhs);
		return this.current;
	}

	/** `%=` */
	moduloAssign(rhs: T): T {
		this.current = this.operators.mod(this.current, rhs);
		return this.current;
	}

	// Increment and decrement =====================================

	/** `++x`, returns the new value. */
	preIncrement(): T {
		this.current = this.operators.increment(this.current);
		return this.current;
	}

	/** `x++`, returns the value from before the increment. */
	postIncrement(): T {
		const old = this.current;
		this.current = this.operators.increment(this.current);
		return old;
	}

	/** `--x`, returns the new value. */
	preDecrement(): T {
		this.current = this.operators.decrement(this.current);
		return this.current;
	}

	/** `x--`, returns the value from before the decrement. */
	postDecrement(): T {
		const old = this.current;
		this.current = this.operators.decrement(this.current);
		return old;
	}
}
