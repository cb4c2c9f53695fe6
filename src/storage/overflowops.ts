// src/storage/overflowops.ts

/**
 * Carry-in/carry-out addition and borrow-in/borrow-out subtraction of single
 * unsigned words. These are the only functions that reason about word overflow;
 * the engines route all of their word arithmetic through them.
 *
 * Operands must be unsigned integers of the given width. Results wrap around.
 */

import type { WordBits } from './wordstorage.js';


// Types ========================================================


/** A carry or borrow flag. */
type Bit = 0 | 1;

interface SumResult {
	result: number;
	carry: Bit;
}

interface DifferenceResult {
	result: number;
	borrow: Bit;
}


// Operations ===================================================


/**
 * Adds two words and an incoming carry.
 * @returns The wrapped sum, and 1 as the carry if it overflowed the word.
 */
function sum(a: number, b: number, carry: Bit, wordBits: WordBits): SumResult {
	const wordSize = 2 ** wordBits;
	const total = a + b + carry;
	if (total >= wordSize) return { result: total - wordSize, carry: 1 };
	return { result: total, carry: 0 };
}

/**
 * Subtracts a word and an incoming borrow from another word.
 * @returns The wrapped difference, and 1 as the borrow if it went below zero.
 */
function subtract(a: number, b: number, borrow: Bit, wordBits: WordBits): DifferenceResult {
	const difference = a - b - borrow;
	if (difference < 0) return { result: difference + 2 ** wordBits, borrow: 1 };
	return { result: difference, borrow: 0 };
}


export type { Bit, SumResult, DifferenceResult };

export default {
	sum,
	subtract,
};
