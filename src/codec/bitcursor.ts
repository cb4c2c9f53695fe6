// src/codec/bitcursor.ts

import type { WordStorage } from '../storage/wordstorage.js';

/**
 * Reads and writes bit fields at an absolute bit position of a word storage.
 * Bit 0 is the lowest bit of word 0; field bits are ordered least significant first.
 *
 * A field is split into word-aligned chunks, two at most when the field
 * is no wider than a word. Fields may be up to 53 bits wide, so every chunk
 * is combined with multiplication rather than 32-bit shifts.
 */
export class BitCursor {
	private readonly storage: WordStorage;
	private cursor: number;

	constructor(storage: WordStorage, position: number) {
		this.storage = storage;
		this.cursor = position;
	}

	/** The absolute bit position the next read or write starts at. */
	get position(): number {
		return this.cursor;
	}

	/** Reads a field and advances past it. Bits past the end of the storage read as zero. */
	read(width: number): number {
		let result = 0;
		let processed = 0;
		while (processed < width) {
			const { wordIndex, bitInWord, step } = this.nextChunk(width - processed);
			const chunk = Math.floor(this.storage.at(wordIndex) / 2 ** bitInWord) % 2 ** step;
			result += chunk * 2 ** processed;
			processed += step;
			this.cursor += step;
		}
		return result;
	}

	/**
	 * Writes the low `width` bits of a value and advances past them.
	 * Every bit of the storage outside the field is left as it was.
	 * The storage must already be large enough to hold the field.
	 */
	write(width: number, value: number): void {
		let processed = 0;
		while (processed < width) {
			const { wordIndex, bitInWord, step } = this.nextChunk(width - processed);
			const chunk = Math.floor(value / 2 ** processed) % 2 ** step;
			const word = this.storage.at(wordIndex);
			const previous = Math.floor(word / 2 ** bitInWord) % 2 ** step;
			this.storage.set(wordIndex, word + (chunk - previous) * 2 ** bitInWord);
			processed += step;
			this.cursor += step;
		}
	}

	/** Locates the chunk of a field that starts at the cursor and stays inside one word. */
	private nextChunk(remaining: number): { wordIndex: number, bitInWord: number, step: number } {
		const wordBits = this.storage.wordBits;
		const wordIndex = Math.floor(this.cursor / wordBits);
		const bitInWord = this.cursor % wordBits;
		const step = Math.min(remaining, wordBits - bitInWord);
		return { wordIndex, bitInWord, step };
	}
}
