/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ByteBuffer } from './byte_buffer.js';
import { CommonPrefix } from './common_prefix.js';
import { CommonSuffix } from './common_suffix.js';
import { __DEV__ } from './dev.js';
import { Operation, type Diff } from './diff.js';
import type { Encoding } from './text.js';

/**
 * Result of a {@link shift} pass.
 */
export interface ShiftResult {
	diffs: Diff[];
	/** Number of edits that were slid over a neighbouring equality. */
	changes: number;
}

/**
 * Brings an edit script into canonical form: no empty diffs, no two
 * neighbours with the same operation, and single edits slid to the position
 * where they merge with their surroundings.
 *
 * The passes are repeated until `shift` no longer changes anything, since a
 * shift can expose new merge opportunities.
 *
 * @param diffs - The edit script; left untouched, a new list is returned.
 * @param encoding - Encoding of the texts, so common parts respect character boundaries.
 * @param debug - A flag to enable verbose logging.
 * @returns The canonical edit script.
 */
export function optimize(diffs: readonly Diff[], encoding: Encoding, debug: boolean = false): Diff[] {
	let result = diffs.slice();
	let round = 0;
	let changes: number;

	do {
		result = mergeUpdates(result, encoding);
		result = mergeEquals(result);
		({ diffs: result, changes } = shift(result));

		if (__DEV__ && debug) {
			console.log(`[optimize] round ${round++}: ${result.length} diffs, ${changes} shift(s)`);
		}
	} while (changes > 0);

	return result;
}

/**
 * Merges every run of INSERT and DELETE diffs between two equalities into at
 * most one DELETE followed by one INSERT. A prefix or suffix that the
 * inserted and deleted bytes share is factored out into an EQUAL in front of
 * (resp. behind) the merged edits. Empty equalities are dropped.
 */
export function mergeUpdates(diffs: readonly Diff[], encoding: Encoding): Diff[] {
	const result: Diff[] = [];
	let inserted: ByteBuffer[] = [];
	let deleted: ByteBuffer[] = [];

	const flush = (): void => {
		if (inserted.length === 0 && deleted.length === 0) return;

		const insert = ByteBuffer.concat(inserted);
		const remove = ByteBuffer.concat(deleted);
		inserted = [];
		deleted = [];

		const prefix = new CommonPrefix(encoding.wrap(insert), encoding.wrap(remove));
		if (prefix.valid()) {
			result.push([Operation.EQUAL, prefix.buffer()]);
			const size = prefix.bytes();
			insert.skip(size);
			remove.skip(size);
		}

		const suffix = new CommonSuffix(encoding.wrap(insert), encoding.wrap(remove));
		let closing: Diff | undefined;
		if (suffix.valid()) {
			closing = [Operation.EQUAL, suffix.buffer()];
			const size = suffix.bytes();
			insert.shrink(size);
			remove.shrink(size);
		}

		if (remove.bytes() > 0) result.push([Operation.DELETE, remove]);
		if (insert.bytes() > 0) result.push([Operation.INSERT, insert]);
		if (closing) result.push(closing);
	};

	for (const diff of diffs) {
		switch (diff[0]) {
			case Operation.INSERT:
				inserted.push(diff[1]);
				break;
			case Operation.DELETE:
				deleted.push(diff[1]);
				break;
			case Operation.EQUAL:
				// an empty equality separates nothing
				if (diff[1].bytes() === 0) break;
				flush();
				result.push(diff);
				break;
		}
	}
	flush();

	return result;
}

/**
 * Collapses every run of two or more EQUAL diffs into one and drops empty
 * equalities.
 */
export function mergeEquals(diffs: readonly Diff[]): Diff[] {
	const result: Diff[] = [];
	let run: Diff[] = [];

	const flush = (): void => {
		if (run.length === 1) {
			result.push(run[0]);
		} else if (run.length > 1) {
			result.push([Operation.EQUAL, ByteBuffer.concat(run.map(([, buffer]) => buffer))]);
		}
		run = [];
	};

	for (const diff of diffs) {
		if (diff[0] !== Operation.EQUAL) {
			flush();
			result.push(diff);
		} else if (diff[1].bytes() > 0) {
			run.push(diff);
		}
	}
	flush();

	return result;
}

/**
 * Slides single edits that are surrounded by equalities over one of them,
 * e.g. `A<ins>BA</ins>C` becomes `<ins>AB</ins>AC`, so that the equalities
 * can be merged afterwards.
 *
 * After a slide the scan resumes behind the modified window: the equality
 * that received the moved bytes may open the next window, the edit itself
 * is not looked at again in this pass.
 */
export function shift(diffs: readonly Diff[]): ShiftResult {
	const result: Diff[] = [];
	let changes = 0;
	// first index in result that may open a window
	let lock = 0;

	for (const incoming of diffs) {
		result.push(incoming);

		const size = result.length;
		if (size < 3 || size - 3 < lock) continue;

		const [prevOp, prev] = result[size - 3];
		const [operation, current] = result[size - 2];
		const [nextOp, next] = result[size - 1];
		if (prevOp !== Operation.EQUAL || nextOp !== Operation.EQUAL || operation === Operation.EQUAL) continue;

		if (current.endsWith(prev)) {
			// slide the edit to the left, over the previous equality
			const moved = ByteBuffer.concat([prev, current.part(0, current.bytes() - prev.bytes())]);
			const following = ByteBuffer.concat([prev, next]);
			result.length = size - 3;
			result.push([operation, moved], [Operation.EQUAL, following]);
			lock = result.length - 1;
			changes++;
		} else if (current.startsWith(next)) {
			// slide the edit to the right, over the next equality
			const preceding = ByteBuffer.concat([prev, next]);
			const moved = ByteBuffer.concat([current.part(next.bytes()), next]);
			result.length = size - 3;
			result.push([Operation.EQUAL, preceding], [operation, moved]);
			lock = result.length - 1;
			changes++;
		}
	}

	return { diffs: result, changes };
}
