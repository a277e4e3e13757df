import semver from 'semver'
import { getPackageInfo } from './package-info.js'
import { logger } from './logger.js'

export interface HostCompatibility {
	hostVersion: string
	/** Range from `engines.node`, or null when the package declares none */
	supportedRange: string | null
	compatible: boolean
}

/**
 * Check if the version is within the range
 *
 * @param version - Version to check, e.g. "20.11.1" or "v20.11.1"
 * @param range - Range expression, e.g. ">=20.0.0" or "^20 || ^22"
 * @returns false when either argument cannot be parsed
 */
export function isCompatible(version: string, range: string): boolean {
	const cleaned = semver.clean(version) ?? semver.coerce(version)?.version
	if (!cleaned || semver.validRange(range) === null) {
		logger.debug(`isCompatible: cannot compare version "${version}" with range "${range}"`)
		return false
	}
	return semver.satisfies(cleaned, range)
}

export function getHostVersion(): string {
	return process.versions.node
}

/**
 * Supported Node.js range declared in the package's `engines.node`
 */
export function getSupportedRange(): string | null {
	return getPackageInfo().engines?.node ?? null
}

/**
 * Compare the running Node.js against the supported range.
 * A package that declares no range accepts every version.
 */
export function checkHostCompatibility(
	hostVersion: string = getHostVersion(),
	supportedRange: string | null = getSupportedRange()
): HostCompatibility {
	const compatible = supportedRange === null ? true : isCompatible(hostVersion, supportedRange)
	return { hostVersion, supportedRange, compatible }
}
