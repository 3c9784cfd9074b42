/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ByteBuffer } from './byte_buffer.js';
import { optimize } from './cleanup.js';
import { CommonOverlap } from './common_overlap.js';
import { CommonPrefix } from './common_prefix.js';
import { CommonSuffix } from './common_suffix.js';
import { Deadline } from './deadline.js';
import { __DEV__ } from './dev.js';
import { createDiff, Operation, operationName, type Diff } from './diff.js';
import { HalfMatch } from './half_match.js';
import { defaultLimits, resolveLimits, type Limits, type ResolvedLimits } from './limits.js';
import { ascii, ucs4, type Text } from './text.js';

/**
 * Texts longer than this (in characters, both of them) are first diffed
 * line by line when `checklines` is on.
 */
const LINE_MODE_THRESHOLD = 100;

/**
 * Line tokens of one line-mode request.
 * @internal
 */
interface LineTokens {
	/** text1 as a `ucs4` text, one character per line. */
	tokens1: Text;
	/** text2 as a `ucs4` text, one character per line. */
	tokens2: Text;
	/** Bytes of every distinct line, indexed by token. */
	lines: ByteBuffer[];
}

/**
 * The diff engine: computes the edit script that turns one text into another.
 *
 * The `diff()` method strips the common prefix and suffix, computes the
 * middle part recursively and then brings the result into canonical form
 * (see {@link optimize}). Every recursive step tries, in order:
 *
 * - **Empty text**: one INSERT or one DELETE.
 * - **Overlap**: the shorter text occurs inside the longer one, so the edit
 * script is the long text's prefix and suffix around one EQUAL.
 * - **Single character**: after the overlap check the two texts have nothing
 * in common, so the result is a full replace.
 * - **Half-match** (only with a timeout): a shared substring covering at
 * least half of the long text splits the problem in two.
 * - **Line-mode** (`checklines` and both texts over 100 characters): a
 * line-level diff first, then replaced blocks are re-diffed per character.
 * - **Bisection**: Myers' O(ND) algorithm, splitting on the middle snake.
 *
 * The timeout only makes the result less minimal, never invalid: when the
 * deadline passes, bisection gives up and replaces the fragment as a whole.
 *
 * @example
 * ```typescript
 * const patch = new Patch({ timeout: 0 });
 * const diffs = patch.diff(ascii.text('hallo daar'), ascii.text('hallo hier'));
 * ```
 */
export class Patch {
	public static readonly defaultLimits: ResolvedLimits = defaultLimits;

	public readonly limits: ResolvedLimits;
	private readonly _debug: boolean;

	/**
	 * @param limits - Time budget and thresholds; missing fields use {@link defaultLimits}.
	 * @param debug - (Internal) Enables verbose logging for debugging purposes.
	 * @throws Error when the limits are invalid.
	 */
	constructor(limits: Limits = {}, debug: boolean = false) {
		this.limits = resolveLimits(limits);
		this._debug = debug;
	}

	/**
	 * Computes the canonical edit script from `text1` to `text2`.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param checklines - Whether long texts may be diffed line by line first.
	 * @returns The ordered list of diffs.
	 * @throws Error when the texts use different encodings.
	 */
	public diff(text1: Text, text2: Text, checklines: boolean = true): Diff[] {
		if (text1.encoding !== text2.encoding) {
			throw new Error(`[Patch] texts use different encodings (${text1.encoding.name}, ${text2.encoding.name})`);
		}

		const deadline = new Deadline(this.limits.timeout);

		if (__DEV__ && this._debug) {
			console.group(`[diff] START ${text1.characters()} vs ${text2.characters()} chars (${text1.encoding.name})`);
			console.log(`Limits:`, this.limits);
		}

		const raw = this._main(text1, text2, checklines, deadline);
		const result = optimize(raw, text1.encoding, this._debug);

		if (__DEV__ && this._debug) {
			console.log(`[diff] FINISH. ${raw.length} raw diffs, ${result.length} after cleanup`);
			console.groupEnd();
		}

		return result;
	}

	/**
	 * [TOOLBOX] Diffs two texts without the final cleanup: identical texts,
	 * then common prefix and suffix, then {@link _compute} on the rest.
	 * Every recursive sub-diff goes through here.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param checklines - Whether line-mode may be used.
	 * @param deadline - Shared time budget of the request.
	 * @returns Raw (not yet canonical) diffs.
	 */
	public _main(text1: Text, text2: Text, checklines: boolean, deadline: Deadline): Diff[] {
		if (text1.equals(text2)) {
			return text1.bytes() === 0 ? [] : [createDiff(Operation.EQUAL, text1.buffer())];
		}

		const prefix = new CommonPrefix(text1, text2);
		const rest1 = text1.substr(prefix.characters());
		const rest2 = text2.substr(prefix.characters());

		const suffix = new CommonSuffix(rest1, rest2);
		const middle1 = rest1.substr(0, rest1.characters() - suffix.characters());
		const middle2 = rest2.substr(0, rest2.characters() - suffix.characters());

		const result: Diff[] = [];
		if (prefix.valid()) result.push(createDiff(Operation.EQUAL, prefix.buffer()));

		const body = this._compute(middle1, middle2, checklines, deadline);
		for (let i = 0; i < body.length; i++) {
			result.push(body[i]);
		}

		if (suffix.valid()) result.push(createDiff(Operation.EQUAL, suffix.buffer()));
		return result;
	}

	/**
	 * [TOOLBOX] Diffs two texts that share no common prefix or suffix by
	 * trying the speedups in order and falling back to bisection.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param checklines - Whether line-mode may be used.
	 * @param deadline - Shared time budget of the request.
	 * @returns Raw diffs.
	 */
	public _compute(text1: Text, text2: Text, checklines: boolean, deadline: Deadline): Diff[] {
		if (text1.characters() === 0) return [createDiff(Operation.INSERT, text2.buffer())];
		if (text2.characters() === 0) return [createDiff(Operation.DELETE, text1.buffer())];

		const overlap = this._overlap(text1, text2);
		if (overlap) return overlap;

		if (text1.characters() === 1 || text2.characters() === 1) {
			// the overlap check already ruled out a common character
			return [createDiff(Operation.DELETE, text1.buffer()), createDiff(Operation.INSERT, text2.buffer())];
		}

		if (deadline.isSet()) {
			const halves = this._halfMatch(text1, text2, checklines, deadline);
			if (halves) return halves;
		}

		if (checklines && text1.characters() > LINE_MODE_THRESHOLD && text2.characters() > LINE_MODE_THRESHOLD) {
			return this._lineMode(text1, text2, deadline);
		}

		return this._bisect(text1, text2, deadline);
	}

	/**
	 * [TOOLBOX] Handles the case where the shorter text is part of the longer one.
	 *
	 * @returns Three diffs (prefix edit, EQUAL, suffix edit), or `undefined` when there is no overlap.
	 */
	public _overlap(text1: Text, text2: Text): Diff[] | undefined {
		const overlap = new CommonOverlap(text1, text2);
		if (!overlap.valid()) return undefined;

		if (__DEV__ && this._debug) {
			console.log(`[overlap] ${operationName(overlap.operation())} around ${overlap.buffer().bytes()} common bytes at ${overlap.skip()}`);
		}

		return [
			createDiff(overlap.operation(), overlap.prefix()),
			createDiff(Operation.EQUAL, overlap.buffer()),
			createDiff(overlap.operation(), overlap.suffix()),
		];
	}

	/**
	 * [TOOLBOX] Splits the problem in two around a substring that covers at
	 * least half of the longer text. This speedup can produce non-minimal diffs.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param checklines - Passed on to the recursive diffs.
	 * @param deadline - Shared time budget of the request.
	 * @returns The joined diffs of both halves, or `undefined` when there is no half match.
	 */
	public _halfMatch(text1: Text, text2: Text, checklines: boolean, deadline: Deadline): Diff[] | undefined {
		const text1long = text1.characters() > text2.characters();
		const longtext = text1long ? text1 : text2;
		const shorttext = text1long ? text2 : text1;

		const match = new HalfMatch(longtext, shorttext);
		if (!match.valid()) return undefined;

		const common = match.common();
		if (__DEV__ && this._debug) {
			console.log(`[halfMatch] ${common.characters()} common chars in ${longtext.characters()}/${shorttext.characters()}`);
		}

		// the first argument of every sub-diff is always the text1 side
		const before = text1long
			? this._main(match.longPrefix(), match.shortPrefix(), checklines, deadline)
			: this._main(match.shortPrefix(), match.longPrefix(), checklines, deadline);
		const after = text1long
			? this._main(match.longSuffix(), match.shortSuffix(), checklines, deadline)
			: this._main(match.shortSuffix(), match.longSuffix(), checklines, deadline);

		return before.concat([createDiff(Operation.EQUAL, common.buffer())], after);
	}

	/**
	 * [TOOLBOX] Diffs line by line first, then re-diffs every replaced block
	 * character by character. This speedup can produce non-minimal diffs.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param deadline - Shared time budget of the request.
	 * @returns Raw diffs at the texts' own granularity.
	 */
	public _lineMode(text1: Text, text2: Text, deadline: Deadline): Diff[] {
		const encoding = text1.encoding;
		const { tokens1, tokens2, lines } = this._linesToTokens(text1, text2);

		if (__DEV__ && this._debug) {
			console.group(`[lineMode] ${tokens1.characters()} vs ${tokens2.characters()} lines, ${lines.length} distinct`);
		}

		const coarse = this._main(tokens1, tokens2, false, deadline);

		const result: Diff[] = [];
		let pending: Diff[] = [];
		let deleted = ByteBuffer.alloc();
		let inserted = ByteBuffer.alloc();
		let countDelete = 0;
		let countInsert = 0;

		const flush = (): void => {
			if (countDelete > 0 && countInsert > 0) {
				// a replaced block: look for the changes inside the lines
				const fine = this._main(encoding.wrap(deleted), encoding.wrap(inserted), false, deadline);
				for (let i = 0; i < fine.length; i++) {
					result.push(fine[i]);
				}
			} else {
				for (let i = 0; i < pending.length; i++) {
					result.push(pending[i]);
				}
			}
			pending = [];
			deleted = ByteBuffer.alloc();
			inserted = ByteBuffer.alloc();
			countDelete = 0;
			countInsert = 0;
		};

		for (const [operation, tokens] of coarse) {
			const entry: Diff = [operation, this._tokensToBytes(tokens, lines)];
			switch (operation) {
				case Operation.DELETE:
					countDelete++;
					deleted.append(entry[1]);
					pending.push(entry);
					break;
				case Operation.INSERT:
					countInsert++;
					inserted.append(entry[1]);
					pending.push(entry);
					break;
				case Operation.EQUAL:
					flush();
					result.push(entry);
					break;
			}
		}
		flush();

		if (__DEV__ && this._debug) {
			console.log(`[lineMode] ${coarse.length} line diffs refined into ${result.length} diffs`);
			console.groupEnd();
		}

		return result;
	}

	/**
	 * Splits both texts into lines (each keeping its `\n`) and replaces every
	 * distinct line by an integer token, shared by both texts.
	 */
	private _linesToTokens(text1: Text, text2: Text): LineTokens {
		const lineIds = new Map<string, number>();
		const lines: ByteBuffer[] = [];
		const newline = text1.encoding.text('\n');

		const tokenize = (text: Text): Text => {
			const ids: number[] = [];
			const count = text.characters();
			let start = 0;

			while (start < count) {
				const found = text.find(newline, start);
				const end = found === -1 ? count : found + 1;
				const line = text.buffer(start, end - start);
				// the raw bytes, one char per byte, identify the line
				const key = ascii.decode(line);

				let id = lineIds.get(key);
				if (id === undefined) {
					id = lines.length;
					lineIds.set(key, id);
					lines.push(line);
				}
				ids.push(id);
				start = end;
			}
			return ucs4.fromCodes(ids);
		};

		const tokens1 = tokenize(text1);
		const tokens2 = tokenize(text2);
		return { tokens1, tokens2, lines };
	}

	/**
	 * Turns a run of line tokens back into the bytes of those lines.
	 */
	private _tokensToBytes(tokens: ByteBuffer, lines: ByteBuffer[]): ByteBuffer {
		return ByteBuffer.concat(Array.from(ucs4.wrap(tokens), (id) => lines[id]));
	}

	/**
	 * [TOOLBOX] Finds the 'middle snake' of a diff, splits the problem in two
	 * and returns the recursively constructed diff.
	 * See Myers 1986 paper: An O(ND) Difference Algorithm and Its Variations.
	 *
	 * Falls back to a full replace when the deadline passes or the texts have
	 * nothing in common. Expects texts without a common prefix or suffix, as
	 * {@link _main} leaves them.
	 *
	 * @param text1 - The original text.
	 * @param text2 - The new text.
	 * @param deadline - Shared time budget of the request.
	 * @returns Raw diffs.
	 */
	public _bisect(text1: Text, text2: Text, deadline: Deadline): Diff[] {
		const chars1 = Uint32Array.from(text1);
		const chars2 = Uint32Array.from(text2);
		const length1 = chars1.length;
		const length2 = chars2.length;

		const maxD = Math.ceil((length1 + length2) / 2);
		const vOffset = maxD;
		const vLength = 2 * maxD;
		// furthest x reached on every diagonal, -1 for not reached yet
		const v1 = new Int32Array(vLength).fill(-1);
		const v2 = new Int32Array(vLength).fill(-1);
		v1[vOffset + 1] = 0;
		v2[vOffset + 1] = 0;

		const delta = length1 - length2;
		// with an odd delta the forward path collides with the reverse path
		const front = delta % 2 !== 0;

		// k-range trimming, keeps the search inside the grid
		let k1start = 0;
		let k1end = 0;
		let k2start = 0;
		let k2end = 0;

		for (let d = 0; d < maxD; d++) {
			if (deadline.reached()) {
				if (__DEV__ && this._debug) {
					console.log(`[bisect] deadline reached at d=${d}, falling back to a full replace`);
				}
				break;
			}

			// forward path
			for (let k1 = -d + k1start; k1 <= d - k1end; k1 += 2) {
				const k1Offset = vOffset + k1;
				let x1: number;
				if (k1 === -d || (k1 !== d && v1[k1Offset - 1] < v1[k1Offset + 1])) {
					x1 = v1[k1Offset + 1];
				} else {
					x1 = v1[k1Offset - 1] + 1;
				}
				let y1 = x1 - k1;
				while (x1 < length1 && y1 < length2 && chars1[x1] === chars2[y1]) {
					x1++;
					y1++;
				}
				v1[k1Offset] = x1;

				if (x1 > length1) {
					// ran off the right of the graph
					k1end += 2;
				} else if (y1 > length2) {
					// ran off the bottom of the graph
					k1start += 2;
				} else if (front) {
					const k2Offset = vOffset + delta - k1;
					if (k2Offset >= 0 && k2Offset < vLength && v2[k2Offset] !== -1) {
						// mirror x2 onto the top-left coordinate system
						const x2 = length1 - v2[k2Offset];
						if (x1 >= x2) {
							return this._bisectSplit(text1, text2, x1, y1, d, deadline);
						}
					}
				}
			}

			// reverse path
			for (let k2 = -d + k2start; k2 <= d - k2end; k2 += 2) {
				const k2Offset = vOffset + k2;
				let x2: number;
				if (k2 === -d || (k2 !== d && v2[k2Offset - 1] < v2[k2Offset + 1])) {
					x2 = v2[k2Offset + 1];
				} else {
					x2 = v2[k2Offset - 1] + 1;
				}
				let y2 = x2 - k2;
				while (x2 < length1 && y2 < length2 && chars1[length1 - x2 - 1] === chars2[length2 - y2 - 1]) {
					x2++;
					y2++;
				}
				v2[k2Offset] = x2;

				if (x2 > length1) {
					// ran off the left of the graph
					k2end += 2;
				} else if (y2 > length2) {
					// ran off the top of the graph
					k2start += 2;
				} else if (!front) {
					const k1Offset = vOffset + delta - k2;
					if (k1Offset >= 0 && k1Offset < vLength && v1[k1Offset] !== -1) {
						const x1 = v1[k1Offset];
						const y1 = vOffset + x1 - k1Offset;
						if (x1 >= length1 - x2) {
							return this._bisectSplit(text1, text2, x1, y1, d, deadline);
						}
					}
				}
			}
		}

		return [createDiff(Operation.DELETE, text1.buffer()), createDiff(Operation.INSERT, text2.buffer())];
	}

	/**
	 * Splits both texts at the middle snake and diffs both halves.
	 */
	private _bisectSplit(text1: Text, text2: Text, x: number, y: number, d: number, deadline: Deadline): Diff[] {
		if (__DEV__ && this._debug) {
			console.log(`[bisect] middle snake at (${x}, ${y}) after d=${d}`);
		}

		const diffs = this._main(text1.substr(0, x), text2.substr(0, y), false, deadline);
		const diffsb = this._main(text1.substr(x), text2.substr(y), false, deadline);
		return diffs.concat(diffsb);
	}
}

/**
 * Computes the canonical edit script that turns `text1` into `text2`.
 *
 * @param limits - Time budget and thresholds.
 * @param text1 - The original text.
 * @param text2 - The new text.
 * @param checklines - Whether long texts may be diffed line by line first.
 * @returns The ordered list of diffs.
 */
export function diff(limits: Limits, text1: Text, text2: Text, checklines: boolean = true): Diff[] {
	return new Patch(limits).diff(text1, text2, checklines);
}
