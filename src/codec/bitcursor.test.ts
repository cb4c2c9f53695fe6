// src/codec/bitcursor.test.ts

import { describe, it, expect } from 'vitest';

import { BitCursor } from './bitcursor.js';
import { WordStorage } from '../storage/wordstorage.js';

describe('BitCursor', () => {
	it('should write and read a field spanning several 8-bit words', () => {
		const storage = new WordStorage(8, [0, 0, 0]);
		const writer = new BitCursor(storage, 4);
		writer.write(20, 0xABCDE);
		expect(writer.position).toBe(24);
		expect(new BitCursor(storage, 4).read(20)).toBe(0xABCDE);
	});

	it('should only replace the bits of the field', () => {
		const storage = new WordStorage(8, [0xFF, 0xFF]);
		new BitCursor(storage, 4).write(8, 0);
		expect(storage.words).toEqual([0x0F, 0xF0]);
	});

	it('should handle fields up to 53 bits wide', () => {
		const storage = new WordStorage(8, new Array<number>(8).fill(0));
		new BitCursor(storage, 3).write(53, Number.MAX_SAFE_INTEGER);
		expect(new BitCursor(storage, 3).read(53)).toBe(Number.MAX_SAFE_INTEGER);
		expect(new BitCursor(storage, 0).read(3)).toBe(0);
	});

	it('should read bits past the end of the storage as zero', () => {
		const storage = new WordStorage(16, [0xFFFF]);
		expect(new BitCursor(storage, 12).read(8)).toBe(0x0F);
	});

	it('should advance across consecutive reads', () => {
		const storage = new WordStorage(32, [0b1101]);
		const cursor = new BitCursor(storage, 0);
		expect(cursor.read(1)).toBe(1);
		expect(cursor.read(2)).toBe(0b10);
		expect(cursor.read(1)).toBe(1);
		expect(cursor.position).toBe(4);
	});
});
