/**
 * @fileoverview natterm version information.
 *
 * @module version
 */

/** Base natterm version number */
const BASE_VERSION = '0.1.0';

/**
 * natterm version number.
 * Outside production a `-dev` suffix marks unreleased builds (e.g. "0.1.0-dev").
 */
export const VERSION = process.env.NODE_ENV === 'production' ? BASE_VERSION : `${BASE_VERSION}-dev`;

/** Full version string */
export const VERSION_STRING = `natterm v${VERSION}`;
