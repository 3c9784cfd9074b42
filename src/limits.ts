/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Configuration options for a diff request.
 */
export interface Limits {
	/** Number of seconds a diff may take before falling back to a coarser result (0 for no limit). */
	timeout?: number;
	/** Cost of an empty edit operation in terms of edit characters. Reserved; not used by the diff itself. */
	editCost?: number;
	/** (Reserved) At what point no match is declared (0.0 = perfection, 1.0 = very loose). */
	matchThreshold?: number;
	/** (Reserved) How far from the expected location a match may be found. */
	matchDistance?: number;
	/** (Reserved) How closely the contents of a large deleted block must match. */
	deleteThreshold?: number;
	/** (Reserved) Context length around a patch hunk. */
	patchMargin?: number;
	/** (Reserved) Number of bits in a match bitmask. */
	maxBits?: number;
}

export type ResolvedLimits = Readonly<Required<Limits>>;

export const defaultLimits: ResolvedLimits = Object.freeze({
	timeout: 1.0,
	editCost: 4,
	matchThreshold: 0.5,
	matchDistance: 1000,
	deleteThreshold: 0.5,
	patchMargin: 4,
	maxBits: 32,
});

/**
 * Merges user supplied limits over the defaults and validates them.
 * @throws Error when a field is not a finite number or the timeout is negative.
 */
export function resolveLimits(limits: Limits = {}): ResolvedLimits {
	const resolved: Required<Limits> = {
		timeout: limits.timeout ?? defaultLimits.timeout,
		editCost: limits.editCost ?? defaultLimits.editCost,
		matchThreshold: limits.matchThreshold ?? defaultLimits.matchThreshold,
		matchDistance: limits.matchDistance ?? defaultLimits.matchDistance,
		deleteThreshold: limits.deleteThreshold ?? defaultLimits.deleteThreshold,
		patchMargin: limits.patchMargin ?? defaultLimits.patchMargin,
		maxBits: limits.maxBits ?? defaultLimits.maxBits,
	};

	for (const [key, value] of Object.entries(resolved)) {
		if (typeof value !== 'number' || !Number.isFinite(value)) {
			throw new Error(`[Limits] ${key} must be a finite number, got ${String(value)}`);
		}
	}
	if (resolved.timeout < 0) {
		throw new Error(`[Limits] timeout must be a finite number >= 0, got ${resolved.timeout}`);
	}

	return Object.freeze(resolved);
}
