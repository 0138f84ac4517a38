/**
 * @fileoverview vfsh version information.
 *
 * Central location for version information used throughout the application.
 *
 * @module version
 */

/** vfsh version number */
export const VERSION = '0.3.0';

/** Full version string */
export const VERSION_STRING = `vfsh v${VERSION}`;
