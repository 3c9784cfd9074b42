/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ByteBuffer } from './byte_buffer.js';
import type { Encoding } from './text.js';

/**
 * Enumerates the types of operations in a diff result.
 */
export enum Operation {
	/** Bytes common to both texts at this position. */
	EQUAL,
	/** Bytes present only in the second text. */
	INSERT,
	/** Bytes present only in the first text. */
	DELETE,
}

/**
 * A single operation of an edit script: the operation and the bytes it
 * applies to. The buffer is owned by the diff; borrowed views are copied
 * on the first mutation.
 * @example [Operation.EQUAL, ascii.text('some text').buffer()]
 */
export type Diff = [Operation, ByteBuffer];

/**
 * Creates a diff holding its own buffer object, so that cleanup can mutate
 * it without reaching the caller's text.
 */
export function createDiff(operation: Operation, buffer: ByteBuffer): Diff {
	return [operation, buffer.part(0)];
}

/**
 * Rebuilds the first text (EQUAL and DELETE runs) from an edit script.
 */
export function sourceText(diffs: readonly Diff[]): ByteBuffer {
	return ByteBuffer.concat(diffs.filter(([operation]) => operation !== Operation.INSERT).map(([, buffer]) => buffer));
}

/**
 * Rebuilds the second text (EQUAL and INSERT runs) from an edit script.
 */
export function targetText(diffs: readonly Diff[]): ByteBuffer {
	return ByteBuffer.concat(diffs.filter(([operation]) => operation !== Operation.DELETE).map(([, buffer]) => buffer));
}

/**
 * Decodes every diff's bytes, e.g. for display or assertions.
 */
export function toTuples(diffs: readonly Diff[], encoding: Encoding): [Operation, string][] {
	return diffs.map(([operation, buffer]) => [operation, encoding.decode(buffer)]);
}

/**
 * Label of an operation as used in debug output.
 */
export function operationName(operation: Operation): string {
	switch (operation) {
		case Operation.EQUAL: return 'EQUAL';
		case Operation.INSERT: return 'INSERT';
		case Operation.DELETE: return 'DELETE';
		default: {
			const unreachable: never = operation;
			return unreachable;
		}
	}
}
