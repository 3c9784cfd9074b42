/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { CommonPrefix } from './common_prefix.js';
import { CommonSuffix } from './common_suffix.js';
import type { Text } from './text.js';

/**
 * Looks for a substring shared by both texts that is at least half as long
 * as the long text, grown from a quarter-length seed of the long text.
 *
 * For every occurrence of the seed in the short text the match is extended
 * forwards (common prefix from the seed start) and backwards (common suffix
 * in front of it); the occurrence with the longest total wins, the earliest
 * one on ties.
 */
export class CommonHalf {
	private readonly _long: Text;
	private readonly _short: Text;
	/** Seed position in the long text. */
	private readonly _start: number;
	/** Seed position in the short text of the best occurrence. */
	private _substr = 0;
	private _prefix = 0;
	private _suffix = 0;

	/**
	 * @param longtext - The longer text.
	 * @param shorttext - The shorter text.
	 * @param index - Start of the seed in the long text (2nd or 3rd quarter).
	 */
	constructor(longtext: Text, shorttext: Text, index: number) {
		this._long = longtext;
		this._short = shorttext;
		this._start = index;

		const seed = longtext.substr(index, Math.floor(longtext.characters() / 4));
		const tail = longtext.substr(index);
		const head = longtext.substr(0, index);

		let pos = shorttext.find(seed);
		while (pos !== -1) {
			const prefix = new CommonPrefix(tail, shorttext.substr(pos)).characters();
			const suffix = new CommonSuffix(head, shorttext.substr(0, pos)).characters();
			if (prefix + suffix > this.characters()) {
				this._substr = pos;
				this._prefix = prefix;
				this._suffix = suffix;
			}
			pos = shorttext.find(seed, pos + 1);
		}
	}

	/** Whether the match covers at least half of the long text. */
	public valid(): boolean {
		return this.characters() * 2 >= this._long.characters();
	}

	/** Number of matching characters. */
	public characters(): number {
		return this._prefix + this._suffix;
	}

	public longPrefix(): Text {
		return this._long.substr(0, this._start - this._suffix);
	}

	public longSuffix(): Text {
		return this._long.substr(this._start + this._prefix);
	}

	public shortPrefix(): Text {
		return this._short.substr(0, this._substr - this._suffix);
	}

	public shortSuffix(): Text {
		return this._short.substr(this._substr + this._prefix);
	}

	/** The shared middle part. */
	public common(): Text {
		return this._short.substr(this._substr - this._suffix, this.characters());
	}
}
