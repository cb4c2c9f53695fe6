// src/storage/wordstorage.ts

/**
 * The sign-magnitude storage shared by both engines.
 *
 * A magnitude is an ordered list of unsigned words, least significant first.
 * Every word of one storage has the same width, which is fixed for an engine family.
 * The sign lives in a packed {@link StateInfo} next to an auxiliary value that
 * only {@link DigitStorage} gives a meaning.
 */

import { StateInfo } from './stateinfo.js';


// Types ========================================================


/** The supported word widths, in bits. */
type WordBits = 8 | 16 | 32;


// Constants ====================================================


const SUPPORTED_WORD_BITS: readonly WordBits[] = [8, 16, 32];


// WordStorage ==================================================


class WordStorage {
	/** The width of every word, in bits. */
	readonly wordBits: WordBits;
	/** The largest value a single word holds, `2^wordBits - 1`. */
	readonly maxWordValue: number;

	protected readonly state: StateInfo;
	protected readonly data: number[];

	constructor(wordBits: WordBits, words: readonly number[] = [], negative: boolean = false) {
		if (!SUPPORTED_WORD_BITS.includes(wordBits)) throw new RangeError(`Word width must be one of ${SUPPORTED_WORD_BITS.join(', ')}. Received: ${wordBits}`);
		this.wordBits = wordBits;
		this.maxWordValue = 2 ** wordBits - 1;
		this.state = new StateInfo(0n, negative);
		this.data = [];
		for (const word of words) this.push(word);
	}

	/** A read-only view of the words, least significant first. */
	get words(): readonly number[] {
		return this.data;
	}

	get size(): number {
		return this.data.length;
	}

	/** True if negative. */
	get sign(): boolean {
		return this.state.sign;
	}

	setSign(negative: boolean): void {
		this.state.setSign(negative);
	}

	isEmpty(): boolean {
		return this.data.length === 0;
	}

	/** True if every word is zero, including when there are no words at all. */
	isAllZero(): boolean {
		return this.data.every(word => word === 0);
	}

	/** Returns the word at the index. Words past the end read as zero. */
	at(index: number): number {
		return this.data[index] ?? 0;
	}

	/** Writes a word, growing the storage with zero words if the index is past the end. */
	set(index: number, word: number): void {
		this.assertWord(word);
		while (this.data.length <= index) this.data.push(0);
		this.data[index] = word;
	}

	push(word: number): void {
		this.assertWord(word);
		this.data.push(word);
	}

	pop(): number | undefined {
		return this.data.pop();
	}

	clear(): void {
		this.data.length = 0;
	}

	/** Grows (filling with `fill`) or truncates the storage to exactly `size` words. */
	resize(size: number, fill: number = 0): void {
		this.assertWord(fill);
		if (size < this.data.length) this.data.length = size;
		while (this.data.length < size) this.data.push(fill);
	}

	/** Removes zero words from the most significant end, keeping at least one word. */
	trimTrailingZeros(): void {
		while (this.data.length > 1 && this.data[this.data.length - 1] === 0) this.data.pop();
		if (this.data.length === 0) this.data.push(0);
	}

	/** The position of the highest set bit plus one. Zero when the magnitude is zero. */
	bitLength(): number {
		for (let i = this.data.length - 1; i >= 0; i--) {
			const word = this.at(i);
			if (word !== 0) return i * this.wordBits + 32 - Math.clz32(word);
		}
		return 0;
	}

	/** Tests the bit at an absolute position of the magnitude. */
	testBit(position: number): boolean {
		const word = this.at(Math.floor(position / this.wordBits));
		return ((word >>> (position % this.wordBits)) & 1) === 1;
	}

	/** Sets the bit at an absolute position of the magnitude, growing the storage if needed. */
	setBit(position: number): void {
		const wordIndex = Math.floor(position / this.wordBits);
		const word = this.at(wordIndex);
		this.set(wordIndex, (word | (1 << (position % this.wordBits))) >>> 0);
	}

	/**
	 * Returns a new non-negative storage holding this magnitude shifted left.
	 * @param shift - The number of bits to shift by.
	 */
	shiftLeft(shift: number): WordStorage {
		const result = new WordStorage(this.wordBits);
		if (this.data.length === 0) return result;

		const wordShift = Math.floor(shift / this.wordBits);
		const bitShift = shift % this.wordBits;
		result.resize(this.data.length + wordShift);
		// Shift by whole words
		for (let i = 0; i < this.data.length; i++) result.set(i + wordShift, this.at(i));
		if (bitShift === 0) return result;

		// Shift the remaining bits, carrying the high bits of each word into the next
		const lowSize = 2 ** (this.wordBits - bitShift);
		const scale = 2 ** bitShift;
		let carry = 0;
		for (let i = wordShift; i < result.size; i++) {
			const current = result.at(i);
			result.set(i, (current % lowSize) * scale + carry);
			carry = Math.floor(current / lowSize);
		}
		if (carry !== 0) result.push(carry);
		return result;
	}

	/** Returns a deep copy, sign included. */
	clone(): WordStorage {
		const copy = new WordStorage(this.wordBits, this.data, this.sign);
		copy.state.setValue(this.state.value);
		return copy;
	}

	private assertWord(word: number): void {
		if (!Number.isInteger(word) || word < 0 || word > this.maxWordValue) throw new RangeError(`Word ${word} is outside of valid range [0, ${this.maxWordValue}]`);
	}
}


// DigitStorage =================================================


/**
 * Word storage for the factorial engine. The packed auxiliary value caches
 * the highest occupied digit index, so comparisons and stringification
 * don't need to rescan the words.
 */
class DigitStorage extends WordStorage {
	/** The highest digit index written since the last trim. */
	get highestIndex(): number {
		return Number(this.state.value);
	}

	setHighestIndex(index: number): void {
		this.state.setValue(BigInt(index));
	}

	override clone(): DigitStorage {
		const copy = new DigitStorage(this.wordBits, this.words, this.sign);
		copy.setHighestIndex(this.highestIndex);
		return copy;
	}
}


export type { WordBits };

export { WordStorage, DigitStorage };
