/***
 *
 *  Sysunit Version Detection
 *
 */

const envVersion = process.env.SYSUNIT_VERSION?.trim()

// Default to the package version when no build-time override is provided
export const SYSUNIT_VERSION = envVersion && envVersion.length > 0 ? envVersion : "0.1.0"
