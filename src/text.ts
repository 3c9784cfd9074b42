/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ByteBuffer } from './byte_buffer.js';

/**
 * Turns raw bytes into character-addressable text and back.
 * The engine never looks at bytes directly when it has to respect
 * character boundaries, it always goes through the text's encoding.
 */
export interface Encoding {
	/** Short name used in error messages and debug output. */
	readonly name: string;
	/**
	 * Wraps a byte buffer as text of this encoding without copying it.
	 */
	wrap(buffer: ByteBuffer): Text;
	/**
	 * Encodes a JavaScript string.
	 */
	text(value: string): Text;
	/**
	 * Decodes the bytes back into a JavaScript string.
	 */
	decode(buffer: ByteBuffer): string;
}

/**
 * Character-addressable view over a {@link ByteBuffer}.
 * All positions and sizes are in characters; `buffer()` and `bytes()`
 * expose the underlying byte representation.
 */
export interface Text extends Iterable<number> {
	readonly encoding: Encoding;
	characters(): number;
	bytes(): number;
	/**
	 * Borrowed bytes of the characters in `[start, start + size)`, clamped.
	 * Without arguments: all bytes.
	 */
	buffer(start?: number, size?: number): ByteBuffer;
	/** Character code at `index`; -1 when out of range. */
	at(index: number): number;
	/** Substring in characters, clamped to the available range. */
	substr(start: number, size?: number): Text;
	/** Character position of `needle` at or after `from`, or -1. */
	find(needle: Text, from?: number): number;
	equals(that: Text): boolean;
	/** Iterates the character codes from last to first. */
	reversed(): IterableIterator<number>;
}

/**
 * Text whose characters all occupy `width` bytes (big endian).
 */
class FixedWidthText implements Text {
	public readonly encoding: FixedWidthEncoding;
	private readonly _buffer: ByteBuffer;
	private readonly _width: number;

	constructor(encoding: FixedWidthEncoding, buffer: ByteBuffer) {
		if (buffer.bytes() % encoding.width !== 0) {
			throw new Error(`[Text] buffer length ${buffer.bytes()} is not a multiple of the character width ${encoding.width}`);
		}
		this.encoding = encoding;
		this._buffer = buffer;
		this._width = encoding.width;
	}

	public characters(): number {
		return this._buffer.bytes() / this._width;
	}

	public bytes(): number {
		return this._buffer.bytes();
	}

	public buffer(start: number = 0, size?: number): ByteBuffer {
		const width = this._width;
		return this._buffer.part(start * width, size === undefined ? undefined : size * width);
	}

	public at(index: number): number {
		if (index < 0 || index >= this.characters()) return -1;
		const width = this._width;
		const base = index * width;
		let code = 0;
		for (let i = 0; i < width; i++) {
			// bytes from a valid index are always defined
			code = code * 256 + (this._buffer.at(base + i) ?? 0);
		}
		return code;
	}

	public substr(start: number, size?: number): Text {
		return new FixedWidthText(this.encoding, this.buffer(start, size));
	}

	public find(needle: Text, from: number = 0): number {
		const width = this._width;
		const target = needle.buffer();
		let position = this._buffer.find(target, Math.max(from, 0) * width);

		// a byte match that straddles two characters is not a character match
		while (position !== -1 && position % width !== 0) {
			position = this._buffer.find(target, position + 1);
		}
		return position === -1 ? -1 : position / width;
	}

	public equals(that: Text): boolean {
		return this.encoding === that.encoding && this._buffer.equals(that.buffer());
	}

	public *[Symbol.iterator](): IterableIterator<number> {
		const count = this.characters();
		for (let i = 0; i < count; i++) yield this.at(i);
	}

	public *reversed(): IterableIterator<number> {
		for (let i = this.characters() - 1; i >= 0; i--) yield this.at(i);
	}
}

/**
 * Encoding in which every character has the same byte width.
 */
export class FixedWidthEncoding implements Encoding {
	public readonly name: string;
	public readonly width: number;
	private readonly _max: number;

	constructor(name: string, width: number) {
		this.name = name;
		this.width = width;
		this._max = 2 ** (8 * width) - 1;
	}

	public wrap(buffer: ByteBuffer): Text {
		return new FixedWidthText(this, buffer);
	}

	/**
	 * Builds text from character codes.
	 */
	public fromCodes(codes: ArrayLike<number>): Text {
		const width = this.width;
		const bytes = new Uint8Array(codes.length * width);
		for (let i = 0; i < codes.length; i++) {
			let code = codes[i];
			if (!Number.isInteger(code) || code < 0 || code > this._max) {
				throw new Error(`[${this.name}] character code ${code} does not fit in ${width} byte(s)`);
			}
			for (let b = width - 1; b >= 0; b--) {
				bytes[i * width + b] = code & 0xff;
				code = Math.floor(code / 256);
			}
		}
		return this.wrap(ByteBuffer.borrow(bytes));
	}

	public text(value: string): Text {
		const codes: number[] = [];
		for (const char of value) {
			const code = char.codePointAt(0) ?? 0;
			if (code > this._max) {
				const hex = code.toString(16).toUpperCase().padStart(4, '0');
				throw new Error(`[${this.name}] character U+${hex} cannot be encoded in ${this.width === 1 ? 'a single byte' : `${this.width} bytes`}`);
			}
			codes.push(code);
		}
		return this.fromCodes(codes);
	}

	public decode(buffer: ByteBuffer): string {
		let result = '';
		for (const code of this.wrap(buffer)) result += String.fromCodePoint(code);
		return result;
	}
}

/** One byte per character. */
export const ascii = new FixedWidthEncoding('ascii', 1);

/** Four bytes per character; also carries line tokens in line-mode. */
export const ucs4 = new FixedWidthEncoding('ucs4', 4);
