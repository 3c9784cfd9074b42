/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { ByteBuffer } from './byte_buffer.js';
import type { Text } from './text.js';

/**
 * The longest run of characters two texts start with.
 *
 * @example
 * ```typescript
 * const prefix = new CommonPrefix(ascii.text('hallo daar'), ascii.text('hallo hier'));
 * prefix.characters(); // 6
 * ```
 */
export class CommonPrefix {
	private readonly _input: Text;
	private readonly _size: number;

	constructor(input1: Text, input2: Text) {
		this._input = input1;

		const max = Math.min(input1.characters(), input2.characters());
		const iter1 = input1[Symbol.iterator]();
		const iter2 = input2[Symbol.iterator]();

		let size = 0;
		while (size < max && iter1.next().value === iter2.next().value) size++;
		this._size = size;
	}

	/** Number of characters the texts have in common. */
	public characters(): number {
		return this._size;
	}

	/** Size of the common part in bytes. */
	public bytes(): number {
		return this.buffer().bytes();
	}

	/** The common part, borrowed from the first text. */
	public buffer(): ByteBuffer {
		return this._input.buffer(0, this._size);
	}

	public text(): Text {
		return this._input.substr(0, this._size);
	}

	/** Whether there is a common part at all. */
	public valid(): boolean {
		return this._size > 0;
	}
}
