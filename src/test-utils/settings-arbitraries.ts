import fc from 'fast-check'
import { KNOWN_SETTINGS_KEYS } from '../lib/SettingsManager.js'

const VALID_VALUES: Record<string, unknown> = {
	port: 3000,
	address: '127.0.0.1',
	browser: 'firefox',
	dynamicRoot: true,
	syncScroll: false,
	picker: 'fzf',
	pickers: ['fzf'],
}

export function isKnownKey(key: string): boolean {
	return KNOWN_SETTINGS_KEYS.includes(key)
}

/**
 * A value that passes validation for a known key; unknown keys get `true`
 */
export function validValueFor(key: string): unknown {
	return isKnownKey(key) ? VALID_VALUES[key] : true
}

/**
 * Mix of real setting names and arbitrary identifiers
 */
export const settingsKeyArbitrary: fc.Arbitrary<string> = fc.oneof(
	fc.constantFrom(...KNOWN_SETTINGS_KEYS),
	fc.stringMatching(/^[a-z][a-zA-Z0-9]{0,11}$/)
)
