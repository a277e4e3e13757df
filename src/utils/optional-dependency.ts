import { logger } from './logger.js'

/**
 * Picker integrations the preview can use when they are installed
 */
export const DEFAULT_PICKERS: readonly string[] = ['@inquirer/search', 'fzf']

export type DependencyChecker = (moduleName: string) => Promise<boolean>

/**
 * Detect if an optional module can be loaded from this package
 */
export const isModuleInstalled: DependencyChecker = async (moduleName: string): Promise<boolean> => {
	try {
		await import(/* @vite-ignore */ moduleName)
		return true
	} catch (error) {
		logger.debug(`Optional module ${moduleName} could not be loaded`, { error })
		return false
	}
}
