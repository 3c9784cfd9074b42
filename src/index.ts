// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Core Engine and Types
export { Patch, diff } from './patch.js';
export {
	Operation,
	createDiff,
	operationName,
	sourceText,
	targetText,
	toTuples,
	type Diff
} from './diff.js';
export { defaultLimits, resolveLimits, type Limits, type ResolvedLimits } from './limits.js';
export { Deadline, type Clock } from './deadline.js';

// Bytes and Text
export { ByteBuffer } from './byte_buffer.js';
export { FixedWidthEncoding, ascii, ucs4, type Encoding, type Text } from './text.js';

// Building Blocks
export { CommonPrefix } from './common_prefix.js';
export { CommonSuffix } from './common_suffix.js';
export { CommonOverlap } from './common_overlap.js';
export { CommonHalf } from './common_half.js';
export { HalfMatch } from './half_match.js';
export { optimize, mergeUpdates, mergeEquals, shift, type ShiftResult } from './cleanup.js';
