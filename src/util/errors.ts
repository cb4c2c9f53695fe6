// src/util/errors.ts

/**
 * Error types raised by the numeric systems.
 *
 * Every error is thrown synchronously where it is detected, and nothing
 * inside the library catches them. Each carries a stable {@link ErrorCode}
 * so callers can branch on it without string matching.
 */


// Error Codes ===================================================


/**
 * Error code categories:
 * - E1xxx: Input errors
 * - E2xxx: Arithmetic errors
 * - E3xxx: Digit codec errors
 */
export const ErrorCodes = {
	// Input errors (1xxx)
	INVALID_FORMAT: 'E1001',

	// Arithmetic errors (2xxx)
	DIVIDE_BY_ZERO: 'E2001',
	OVERFLOW: 'E2002',
	DOMAIN: 'E2003',
	MAGNITUDE: 'E2004',

	// Digit codec errors (3xxx)
	RADIX_VIOLATION: 'E3001',
	INDEX_OUT_OF_RANGE: 'E3002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];


// Base Error Class ==============================================


/** Base class of every error the numeric systems raise. */
export class NumericError extends Error {
	/** Error code for programmatic handling */
	readonly code: ErrorCode;

	constructor(message: string, code: ErrorCode) {
		super(message);
		this.name = 'NumericError';
		this.code = code;
	}

	/** Format error for display */
	toDisplayString(): string {
		return `${this.message} [${this.code}]`;
	}
}


// Input Errors ==================================================


/** A decimal string or native number could not be read as an integer. */
export class InvalidFormatError extends NumericError {
	/** The rejected input, as text. */
	readonly input: string;

	constructor(input: string, reason = 'Invalid integral string') {
		super(`${reason}. Value: "${input}"`, ErrorCodes.INVALID_FORMAT);
		this.name = 'InvalidFormatError';
		this.input = input;
	}
}


// Arithmetic Errors =============================================


export class DivideByZeroError extends NumericError {
	constructor(message = 'Division by zero.') {
		super(message, ErrorCodes.DIVIDE_BY_ZERO);
		this.name = 'DivideByZeroError';
	}
}

/** The value does not fit the requested native integer width. */
export class OverflowError extends NumericError {
	constructor(message = 'Value exceeds the bit width of the target integral type') {
		super(message, ErrorCodes.OVERFLOW);
		this.name = 'OverflowError';
	}
}

/** An argument lies outside the domain of a function, such as sqrt(-1). */
export class DomainError extends NumericError {
	constructor(message: string) {
		super(message, ErrorCodes.DOMAIN);
		this.name = 'DomainError';
	}
}

/**
 * An unsigned subtraction was asked to produce a negative magnitude.
 * Callers are expected to pass the larger magnitude first.
 */
export class MagnitudeError extends NumericError {
	constructor(message = 'Subtraction of a larger number from a smaller one is not supported for positive results.') {
		super(message, ErrorCodes.MAGNITUDE);
		this.name = 'MagnitudeError';
	}
}


// Digit Codec Errors ============================================


/** A factorial-base digit was given a value outside `[0, index]`. */
export class RadixViolationError extends NumericError {
	readonly index: number;
	readonly value: number;

	constructor(index: number, value: number) {
		super(`Digit value ${value} exceeds the radix at index ${index}: a digit at index i must lie in [0, i]`, ErrorCodes.RADIX_VIOLATION);
		this.name = 'RadixViolationError';
		this.index = index;
		this.value = value;
	}
}

/** A digit index, or the bit offset derived from it, is beyond what can be addressed. */
export class IndexOutOfRangeError extends NumericError {
	constructor(message: string) {
		super(message, ErrorCodes.INDEX_OUT_OF_RANGE);
		this.name = 'IndexOutOfRangeError';
	}
}
