// src/index.ts

/**
 * Arbitrary-precision signed integers in two number systems:
 * {@link BinaryInteger} (base `2^k` words) and {@link FactorialInteger} (factorial base).
 */

export { BinaryInteger } from './engines/binaryinteger.js';
export { FactorialInteger } from './engines/factorialinteger.js';
export { IntegerCell } from './operators/integercell.js';
export { deriveOperators, primitivesOf } from './operators/operators.js';
export { loadConfig, DEFAULT_CONFIG } from './util/config.js';
export { configureLogging } from './util/logEvents.js';
export {
	ErrorCodes,
	NumericError,
	InvalidFormatError,
	DivideByZeroError,
	OverflowError,
	DomainError,
	MagnitudeError,
	RadixViolationError,
	IndexOutOfRangeError,
} from './util/errors.js';

export type { BinaryInput } from './engines/binaryinteger.js';
export type { FactorialInput } from './engines/factorialinteger.js';
export type { Ordering, IntegralPrimitives, IntegralOperators, IntegralValue } from './operators/operators.js';
export type { NumericConfig } from './util/config.js';
export type { LogLevel, LoggingOptions } from './util/logEvents.js';
export type { ErrorCode } from './util/errors.js';
