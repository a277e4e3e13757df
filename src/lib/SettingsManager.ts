import { readFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import deepmerge from 'deepmerge'
import { logger } from '../utils/logger.js'
import { MAX_PORT, MIN_PORT } from '../utils/port.js'

/**
 * Zod schema for live-preview settings
 */
export const LivePreviewSettingsSchema = z.object({
	port: z
		.number()
		.int('Port must be an integer')
		.min(MIN_PORT, `Port must be >= ${MIN_PORT}`)
		.max(MAX_PORT, `Port must be <= ${MAX_PORT}`)
		.optional()
		.describe('Port the preview server listens on'),
	address: z
		.string()
		.min(1, "Settings 'address' cannot be empty")
		.optional()
		.describe('Address the preview server binds to'),
	browser: z
		.string()
		.optional()
		.describe('Browser command used to open previews ("default" uses the system browser)'),
	dynamicRoot: z
		.boolean()
		.optional()
		.describe("Serve from the previewed file's directory instead of the project root"),
	syncScroll: z
		.boolean()
		.optional()
		.describe('Keep the browser scrolled to the cursor position'),
	picker: z
		.string()
		.optional()
		.describe('Preferred picker module for choosing a file to preview'),
	pickers: z
		.array(z.string())
		.optional()
		.describe('Optional picker modules checked by the health check'),
})

/**
 * TypeScript type for live-preview settings derived from Zod schema
 */
export type LivePreviewSettings = z.infer<typeof LivePreviewSettingsSchema>

export const KNOWN_SETTINGS_KEYS: readonly string[] = Object.keys(LivePreviewSettingsSchema.shape)

/**
 * Settings together with what validation found wrong without rejecting them
 */
export interface LoadedSettings {
	/** Valid values only; a key whose value failed validation is left out */
	settings: LivePreviewSettings
	/** Keys that are not settings, in the order they were found */
	unknownKeys: string[]
	/** One message per problem that kept a file or a value from loading */
	errors?: string[]
}

export const SETTINGS_DIR = '.livepreview'

const JsonObjectSchema = z.record(z.unknown())

/**
 * Manages project-level settings from .livepreview/settings.json
 */
export class SettingsManager {
	/**
	 * Load settings from <PROJECT_ROOT>/.livepreview/settings.json and settings.local.json
	 * Merges settings.local.json over settings.json, CLI overrides over both.
	 * Missing files are not an error. Unknown keys are reported, not rejected.
	 * A file that cannot be read or parsed, or a value of the wrong type, is
	 * reported in `errors` and the remaining valid values are kept.
	 */
	async loadSettings(
		projectRoot?: string,
		cliOverrides?: Partial<LivePreviewSettings>,
	): Promise<LoadedSettings> {
		const root = projectRoot ?? process.cwd()

		const base = await this.loadSettingsFile(root, 'settings.json')
		const local = await this.loadSettingsFile(root, 'settings.local.json')

		let merged = this.mergeSettings(base.settings, local.settings)
		if (cliOverrides && Object.keys(cliOverrides).length > 0) {
			logger.debug('CLI overrides to apply:', cliOverrides)
			merged = this.mergeSettings(merged, cliOverrides)
		}

		const final = this.validateConfiguration(merged, '<merged settings>')
		logger.debug('Final merged configuration:', final.settings)

		return {
			settings: final.settings,
			unknownKeys: [...new Set([...base.unknownKeys, ...local.unknownKeys, ...final.unknownKeys])],
			errors: [...(base.errors ?? []), ...(local.errors ?? []), ...(final.errors ?? [])],
		}
	}

	/**
	 * Validate a configuration object key by key. Never throws: invalid values
	 * are dropped and reported in `errors`, unknown keys in `unknownKeys`.
	 */
	validateConfiguration(raw: unknown, source = '<configuration>'): LoadedSettings {
		const object = JsonObjectSchema.safeParse(raw)
		if (!object.success) {
			return {
				settings: {},
				unknownKeys: [],
				errors: formatZodIssues(object.error, source),
			}
		}

		const unknownKeys = this.findUnknownKeys(object.data)
		const result = LivePreviewSettingsSchema.safeParse(object.data)
		if (result.success) {
			return { settings: result.data, unknownKeys, errors: [] }
		}

		const errors = formatZodIssues(result.error, source)
		const invalidKeys = new Set(result.error.issues.map(issue => String(issue.path[0] ?? '')))
		const validEntries = Object.entries(object.data).filter(([key]) => !invalidKeys.has(key))
		const retry = LivePreviewSettingsSchema.safeParse(Object.fromEntries(validEntries))

		return { settings: retry.success ? retry.data : {}, unknownKeys, errors }
	}

	/**
	 * Load and validate a single settings file.
	 * Returns empty settings if the file doesn't exist.
	 */
	private async loadSettingsFile(projectRoot: string, filename: string): Promise<LoadedSettings> {
		const settingsPath = path.join(projectRoot, SETTINGS_DIR, filename)

		let content: string
		try {
			content = await readFile(settingsPath, 'utf-8')
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
				logger.debug(`No settings file found at ${settingsPath}, using defaults`)
				return { settings: {}, unknownKeys: [], errors: [] }
			}
			return {
				settings: {},
				unknownKeys: [],
				errors: [
					`Failed to read settings file at ${settingsPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
				],
			}
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(content)
		} catch (error) {
			return {
				settings: {},
				unknownKeys: [],
				errors: [
					`Failed to parse settings file at ${settingsPath}: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
				],
			}
		}

		logger.debug(`Settings from ${settingsPath}:`, parsed)
		return this.validateConfiguration(parsed, filename)
	}

	/**
	 * Keys the schema does not know, taken from zod's strict-mode issues
	 */
	private findUnknownKeys(raw: Record<string, unknown>): string[] {
		const result = LivePreviewSettingsSchema.strict().safeParse(raw)
		if (result.success) {
			return []
		}

		const keys: string[] = []
		for (const issue of result.error.issues) {
			if (issue.code === z.ZodIssueCode.unrecognized_keys && issue.path.length === 0) {
				keys.push(...issue.keys)
			}
		}
		return keys
	}

	/**
	 * Deep merge two settings objects with priority to override.
	 * Arrays are replaced, not concatenated.
	 */
	private mergeSettings(
		base: Partial<LivePreviewSettings>,
		override: Partial<LivePreviewSettings>,
	): LivePreviewSettings {
		return deepmerge<LivePreviewSettings>(base, override, {
			arrayMerge: (_destinationArray, sourceArray) => sourceArray,
		})
	}
}

/**
 * One message per zod issue, e.g. "Invalid setting at settings.json: port: Port must be <= 65535"
 */
function formatZodIssues(error: z.ZodError, source: string): string[] {
	return error.issues.map(issue => {
		const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root'
		return `Invalid setting at ${source}: ${issuePath}: ${issue.message}`
	})
}
