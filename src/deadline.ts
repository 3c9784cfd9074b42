/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { performance } from 'perf_hooks';

/**
 * Millisecond clock used to measure the time budget.
 */
export type Clock = () => number;

const monotonic: Clock = () => performance.now();

/**
 * Absolute point in time after which a diff stops looking for an optimal
 * result. Created once per top-level request and shared, read-only, by
 * every recursive step.
 */
export class Deadline {
	private readonly _clock: Clock;
	private readonly _expiration: number;

	/**
	 * @param seconds - Time budget; 0 means the deadline is never reached.
	 * @param clock - Millisecond clock, `performance.now()` by default.
	 */
	constructor(seconds: number, clock: Clock = monotonic) {
		this._clock = clock;
		this._expiration = seconds > 0 ? clock() + seconds * 1000 : Infinity;
	}

	/**
	 * Whether there is a finite time budget at all.
	 */
	public isSet(): boolean {
		return this._expiration !== Infinity;
	}

	/** Clock value at which the deadline is reached (`Infinity` when unset). */
	public expiration(): number {
		return this._expiration;
	}

	/**
	 * Whether the time budget has been used up.
	 */
	public reached(): boolean {
		if (!this.isSet()) return false;
		return this._clock() >= this._expiration;
	}
}
