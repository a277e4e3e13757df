import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'

/**
 * Package information from package.json
 */
export interface PackageInfo {
	name: string
	version: string
	description: string
	engines?: Record<string, string>
	[key: string]: unknown
}

/**
 * Get package.json information
 *
 * Both src/utils/ and the compiled dist/utils/ sit two levels below the package root.
 *
 * @param scriptPath - Optional path of a module two levels below the package root
 *   (defaults to this file)
 * @throws Error if package.json cannot be read or parsed
 */
export function getPackageInfo(scriptPath?: string): PackageInfo {
	try {
		const basePath = scriptPath ?? fileURLToPath(import.meta.url)
		const packageJsonPath = join(dirname(basePath), '..', '..', 'package.json')

		const packageJsonContent = readFileSync(packageJsonPath, 'utf8')
		return JSON.parse(packageJsonContent) as PackageInfo
	} catch (error) {
		throw new Error(
			`Failed to read package.json: ${error instanceof Error ? error.message : 'Unknown error'}`
		)
	}
}
