import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { CheckhealthCommand } from './checkhealth.js'
import { SettingsManager } from '../lib/SettingsManager.js'
import { HealthCheckRunner, type HealthCheckDependencies } from '../lib/HealthCheckRunner.js'
import { logger } from '../utils/logger.js'
import { readFile } from 'fs/promises'
import type { ListenerRecord } from '../types/process.js'

vi.mock('fs/promises')

// Mock the logger to prevent console output during tests
vi.mock('../utils/logger.js', () => ({
	logger: {
		info: vi.fn(),
		error: vi.fn(),
		warn: vi.fn(),
		debug: vi.fn(),
		success: vi.fn(),
	},
}))

function runnerFactory(records: ListenerRecord[]) {
	return (dependencies: HealthCheckDependencies): HealthCheckRunner =>
		new HealthCheckRunner({
			processManager: { listListenersOnPort: async () => records },
			hostCompatibility: () => ({ hostVersion: '20.11.1', supportedRange: '>=20', compatible: true }),
			shellChecker: { detect: () => 'sh', isAvailable: async () => true },
			dependencyChecker: async () => true,
			...dependencies,
		})
}

describe('CheckhealthCommand', () => {
	let settingsManager: SettingsManager
	let consoleSpy: MockInstance

	beforeEach(() => {
		settingsManager = new SettingsManager()
		consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
	})

	afterEach(() => {
		consoleSpy.mockRestore()
		vi.clearAllMocks()
	})

	it('should load settings from the given root with the port override', async () => {
		const loadSpy = vi
			.spyOn(settingsManager, 'loadSettings')
			.mockResolvedValue({ settings: { port: 8080, pickers: [] }, unknownKeys: [] })
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		await command.execute({ options: { root: '/tmp/project', port: 8080, json: true } })

		expect(loadSpy).toHaveBeenCalledWith('/tmp/project', { port: 8080 })
	})

	it('should print the report as JSON', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockResolvedValue({ settings: { pickers: [] }, unknownKeys: [] })
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		const report = await command.execute({ options: { json: true } })

		expect(consoleSpy).toHaveBeenCalledWith(JSON.stringify(report, null, 2))
	})

	it('should print the report as Markdown', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockResolvedValue({ settings: { pickers: [] }, unknownKeys: [] })
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		await command.execute({ options: { markdown: true } })

		expect(consoleSpy).toHaveBeenCalledOnce()
		expect(consoleSpy.mock.calls[0]?.[0]).toContain('## livepreview health report')
	})

	it('should render the report through the logger by default', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockResolvedValue({
			settings: { pickers: [] },
			unknownKeys: ['bogusKey'],
		})
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		await command.execute({ options: {} })

		expect(logger.info).toHaveBeenCalledWith('Check your livepreview config:')
		expect(logger.warn).toHaveBeenCalledWith('  `bogusKey` is not a config option')
		expect(consoleSpy).not.toHaveBeenCalled()
	})

	it('should report settings that fail to load instead of aborting', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockRejectedValue(
			new Error('settings directory is not readable')
		)
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		const report = await command.execute({ options: { json: true } })

		expect(report.entries.at(-1)).toEqual({
			category: 'config',
			severity: 'error',
			message: 'settings directory is not readable',
			hint: 'Fix the settings file, then run the health check again',
		})
	})

	it('should compare listeners against the PID given with --pid', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockResolvedValue({
			settings: { port: 3000, pickers: [] },
			unknownKeys: [],
		})
		const command = new CheckhealthCommand(
			settingsManager,
			runnerFactory([{ processId: 777, processName: 'node', port: 3000 }])
		)

		const report = await command.execute({ options: { pid: 777, json: true } })
		const serverMessages = report.entries.filter(entry => entry.category === 'server').map(entry => entry.message)

		expect(serverMessages).toEqual([
			"This process's PID is 777",
			'port 3000 is held by this process (PID: 777), but no server state is available',
		])
	})

	it('should still check the port and warn about unknown keys when a value has the wrong type', async () => {
		vi.mocked(readFile)
			.mockResolvedValueOnce(JSON.stringify({ port: 3000, browser: 5, bogusKey: true }))
			.mockRejectedValueOnce(Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }))
		const command = new CheckhealthCommand(settingsManager, runnerFactory([]))

		const report = await command.execute({ options: { root: '/tmp/project', json: true } })

		expect(report.entries.filter(entry => entry.category === 'server').map(entry => entry.message)).toEqual([
			'server is not listening on configured port 3000',
		])
		expect(report.entries.filter(entry => entry.category === 'config').map(entry => entry.message)).toEqual([
			'Invalid setting at settings.json: browser: Expected string, received number',
			'`bogusKey` is not a config option',
		])
		expect(report.settings).toEqual({ port: 3000 })
	})

	it('should not suggest killing a listener when no --pid is given', async () => {
		vi.spyOn(settingsManager, 'loadSettings').mockResolvedValue({
			settings: { port: 3000, pickers: [] },
			unknownKeys: [],
		})
		const command = new CheckhealthCommand(
			settingsManager,
			runnerFactory([{ processId: 777, processName: 'node', port: 3000 }])
		)

		const report = await command.execute({ options: { json: true } })
		const serverEntries = report.entries.filter(entry => entry.category === 'server')

		expect(serverEntries).toHaveLength(1)
		expect(serverEntries[0]?.message).toBe(
			'port 3000 is held by `node` (PID: 777), but the expected owner is not known'
		)
		expect(serverEntries[0]?.hint).toBe(
			'Run `livepreview checkhealth --pid <server pid>` to check whether it is the preview server'
		)
	})
})
