import { describe, it, expect, vi } from 'vitest'
import { isModuleInstalled, DEFAULT_PICKERS } from './optional-dependency.js'

vi.mock('./logger.js', () => ({
	logger: {
		debug: vi.fn(),
	},
}))

describe('isModuleInstalled', () => {
	it('should return true for a module that can be loaded', async () => {
		await expect(isModuleInstalled('semver')).resolves.toBe(true)
	})

	it('should return false for a module that is not installed', async () => {
		await expect(isModuleInstalled('livepreview-picker-that-does-not-exist')).resolves.toBe(false)
	})
})

describe('DEFAULT_PICKERS', () => {
	it('should list the picker integrations checked by default', () => {
		expect(DEFAULT_PICKERS).toEqual(['@inquirer/search', 'fzf'])
	})
})
