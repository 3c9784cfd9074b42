/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

const EMPTY = new Uint8Array(0);

/**
 * A contiguous run of bytes that either owns its storage or borrows a view
 * of someone else's.
 *
 * - **Borrowed** buffers (`ByteBuffer.borrow`, `part`) never write into the
 * storage they point at. The first mutation copies the bytes into fresh,
 * owned storage (copy-on-write).
 * - **Owned** buffers grow in place while nobody else holds a view of their
 * storage. Handing out a view (`part`, `data`) marks the storage as shared,
 * after which the next growing mutation reallocates.
 *
 * Narrowing mutations (`shrink`, `skip`, `clear`) only move the window and
 * never touch the bytes, so they are allowed on every buffer.
 *
 * @example
 * ```typescript
 * const source = new Uint8Array([104, 105]);
 * const view = ByteBuffer.borrow(source);
 * view.append(ByteBuffer.copy(new Uint8Array([33])));
 * // source is untouched, view now owns "hi!"
 * ```
 */
export class ByteBuffer {
	private _storage: Uint8Array;
	private _offset: number;
	private _length: number;
	private _owned: boolean;
	private _shared = false;

	private constructor(storage: Uint8Array, offset: number, length: number, owned: boolean) {
		this._storage = storage;
		this._offset = offset;
		this._length = length;
		this._owned = owned;
	}

	/**
	 * Wraps existing bytes without copying them.
	 */
	public static borrow(data: Uint8Array): ByteBuffer {
		return new ByteBuffer(data, 0, data.length, false);
	}

	/**
	 * Copies the bytes into storage owned by the new buffer.
	 */
	public static copy(data: Uint8Array): ByteBuffer {
		return new ByteBuffer(data.slice(), 0, data.length, true);
	}

	/**
	 * Creates an empty, owned buffer.
	 */
	public static alloc(capacity: number = 0): ByteBuffer {
		return new ByteBuffer(capacity > 0 ? new Uint8Array(capacity) : EMPTY, 0, 0, true);
	}

	/**
	 * Joins several buffers into one owned buffer, sized up front.
	 */
	public static concat(buffers: Iterable<ByteBuffer>): ByteBuffer {
		const list = Array.from(buffers);
		let total = 0;
		for (const buffer of list) total += buffer._length;

		const storage = new Uint8Array(total);
		let position = 0;
		for (const buffer of list) {
			storage.set(buffer._view(), position);
			position += buffer._length;
		}
		return new ByteBuffer(storage, 0, total, true);
	}

	/** Whether the buffer exclusively owns its backing storage. */
	public get owned(): boolean {
		return this._owned;
	}

	/**
	 * Number of bytes in the buffer.
	 */
	public bytes(): number {
		return this._length;
	}

	/**
	 * Read-only view of the bytes. The view stays valid until the next
	 * mutation of this buffer.
	 */
	public data(): Uint8Array {
		this._shared = true;
		return this._view();
	}

	/**
	 * Byte at `index`, or `undefined` when out of range.
	 */
	public at(index: number): number | undefined {
		if (index < 0 || index >= this._length) return undefined;
		return this._storage[this._offset + index];
	}

	/**
	 * Borrowed view of `size` bytes starting at `start`. Requests beyond the
	 * end are clamped, so the result may be shorter or empty.
	 */
	public part(start: number, size?: number): ByteBuffer {
		const from = Math.min(Math.max(start, 0), this._length);
		const available = this._length - from;
		const length = size === undefined ? available : Math.min(Math.max(size, 0), available);
		this._shared = true;
		return new ByteBuffer(this._storage, this._offset + from, length, false);
	}

	/**
	 * Owned copy of the current bytes.
	 */
	public clone(): ByteBuffer {
		return new ByteBuffer(this._view().slice(), 0, this._length, true);
	}

	/**
	 * Adds bytes at the end.
	 */
	public append(that: ByteBuffer): this {
		if (that._length === 0) return this;
		const extra = that._view();
		const required = this._offset + this._length + extra.length;

		if (this._writable() && required <= this._storage.length) {
			this._storage.set(extra, this._offset + this._length);
			this._length += extra.length;
			return this;
		}

		// double the capacity so repeated appends stay amortised O(1)
		const length = this._length + extra.length;
		const storage = new Uint8Array(Math.max(length, this._length * 2));
		storage.set(this._view(), 0);
		storage.set(extra, this._length);
		this._reset(storage, 0, length);
		return this;
	}

	/**
	 * Adds bytes at the front.
	 */
	public prepend(that: ByteBuffer): this {
		if (that._length === 0) return this;
		const extra = that._view();

		if (this._writable() && extra.length <= this._offset) {
			this._offset -= extra.length;
			this._storage.set(extra, this._offset);
			this._length += extra.length;
			return this;
		}

		const length = this._length + extra.length;
		const storage = new Uint8Array(length);
		storage.set(extra, 0);
		storage.set(this._view(), extra.length);
		this._reset(storage, 0, length);
		return this;
	}

	/**
	 * Drops `size` bytes from the end.
	 */
	public shrink(size: number): this {
		this._length -= Math.min(Math.max(size, 0), this._length);
		return this;
	}

	/**
	 * Drops `size` bytes from the front.
	 */
	public skip(size: number): this {
		const count = Math.min(Math.max(size, 0), this._length);
		this._offset += count;
		this._length -= count;
		return this;
	}

	/**
	 * Empties the buffer.
	 */
	public clear(): this {
		this._length = 0;
		return this;
	}

	/**
	 * Lexicographic comparison: negative, zero or positive.
	 */
	public compare(that: ByteBuffer): number {
		return this._compareRange(0, this._length, that);
	}

	/**
	 * Compares the `size` bytes at `start` (clamped) with all of `that`.
	 */
	public compareAt(start: number, size: number, that: ByteBuffer): number {
		const from = Math.min(Math.max(start, 0), this._length);
		return this._compareRange(from, Math.min(Math.max(size, 0), this._length - from), that);
	}

	public equals(that: ByteBuffer): boolean {
		return this._length === that._length && this.compare(that) === 0;
	}

	public startsWith(that: ByteBuffer): boolean {
		return that._length <= this._length && this.compareAt(0, that._length, that) === 0;
	}

	public endsWith(that: ByteBuffer): boolean {
		return that._length <= this._length && this.compareAt(this._length - that._length, that._length, that) === 0;
	}

	/**
	 * Byte offset of the first occurrence of `that` at or after `from`,
	 * or -1.
	 */
	public find(that: ByteBuffer, from: number = 0): number {
		const haystack = this._view();
		const needle = that._view();
		const start = Math.max(from, 0);
		if (needle.length === 0) return start <= haystack.length ? start : -1;

		const first = needle[0];
		const last = haystack.length - needle.length;
		let position = haystack.indexOf(first, start);
		while (position !== -1 && position <= last) {
			let i = 1;
			while (i < needle.length && haystack[position + i] === needle[i]) i++;
			if (i === needle.length) return position;
			position = haystack.indexOf(first, position + 1);
		}
		return -1;
	}

	private _compareRange(start: number, length: number, that: ByteBuffer): number {
		const min = Math.min(length, that._length);
		const a = this._storage;
		const b = that._storage;
		const base = this._offset + start;
		for (let i = 0; i < min; i++) {
			const diff = a[base + i] - b[that._offset + i];
			if (diff !== 0) return diff < 0 ? -1 : 1;
		}
		if (length === that._length) return 0;
		return length < that._length ? -1 : 1;
	}

	private _view(): Uint8Array {
		return this._storage.subarray(this._offset, this._offset + this._length);
	}

	private _writable(): boolean {
		return this._owned && !this._shared;
	}

	private _reset(storage: Uint8Array, offset: number, length: number): void {
		this._storage = storage;
		this._offset = offset;
		this._length = length;
		this._owned = true;
		this._shared = false;
	}
}
