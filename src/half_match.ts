/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { CommonHalf } from './common_half.js';
import type { Text } from './text.js';

/**
 * Checks whether the two texts share a substring at least half as long as
 * the longer text, seeding the search from the long text's 2nd and 3rd
 * quarter. This speedup can produce non-minimal diffs.
 */
export class HalfMatch {
	private readonly _winner: CommonHalf | undefined;

	constructor(longtext: Text, shorttext: Text) {
		const length = longtext.characters();

		// not worth the search: the result could never be valid
		if (length < 4 || shorttext.characters() * 2 < length) {
			this._winner = undefined;
			return;
		}

		const q2 = new CommonHalf(longtext, shorttext, Math.ceil(length / 4));
		const q3 = new CommonHalf(longtext, shorttext, Math.ceil(length / 2));

		if (q2.valid() && q3.valid()) {
			this._winner = q2.characters() >= q3.characters() ? q2 : q3;
		} else if (q2.valid()) {
			this._winner = q2;
		} else if (q3.valid()) {
			this._winner = q3;
		} else {
			this._winner = undefined;
		}
	}

	public valid(): boolean {
		return this._winner !== undefined;
	}

	/**
	 * The winning match.
	 * @throws Error when there is no valid match.
	 */
	public result(): CommonHalf {
		if (!this._winner) {
			throw new Error('[HalfMatch] no half match was found');
		}
		return this._winner;
	}

	public longPrefix(): Text { return this.result().longPrefix(); }
	public longSuffix(): Text { return this.result().longSuffix(); }
	public shortPrefix(): Text { return this.result().shortPrefix(); }
	public shortSuffix(): Text { return this.result().shortSuffix(); }
	public common(): Text { return this.result().common(); }
}
