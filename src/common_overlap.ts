/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { ByteBuffer } from './byte_buffer.js';
import { Operation } from './diff.js';
import type { Text } from './text.js';

/**
 * Detects that the shorter of two texts occurs, as one contiguous run,
 * inside the longer one. When it does, going from text1 to text2 only
 * needs the parts of the long text around that run to be deleted
 * (text1 is longer) or inserted (text2 is longer).
 */
export class CommonOverlap {
	private readonly _short: Text;
	private readonly _long: Text;
	private readonly _skip: number;
	private readonly _text1long: boolean;

	constructor(text1: Text, text2: Text) {
		this._text1long = text1.characters() > text2.characters();
		this._short = this._text1long ? text2 : text1;
		this._long = this._text1long ? text1 : text2;
		this._skip = this._long.find(this._short);
	}

	/** Whether the short text was found inside the long text. */
	public valid(): boolean {
		return this._skip >= 0;
	}

	/** Character offset of the overlap inside the long text, -1 if none. */
	public skip(): number {
		return this._skip;
	}

	/** The part of the long text in front of the overlap. */
	public prefix(): ByteBuffer {
		return this._long.buffer(0, Math.max(this._skip, 0));
	}

	/** The part of the long text behind the overlap. */
	public suffix(): ByteBuffer {
		return this._long.buffer(this._skip + this._short.characters());
	}

	/** The overlapping middle, i.e. the short text. */
	public buffer(): ByteBuffer {
		return this._short.buffer();
	}

	/** Operation that turns text1 into text2 for the prefix and suffix. */
	public operation(): Operation {
		return this._text1long ? Operation.DELETE : Operation.INSERT;
	}
}
