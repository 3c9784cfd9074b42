/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Enables the verbose tracing paths (`__DEV__ && debug`) everywhere except
 * in production builds.
 */
export const __DEV__: boolean = typeof process === 'undefined' || process.env.NODE_ENV !== 'production';
