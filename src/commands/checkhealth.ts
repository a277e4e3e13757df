import { logger } from '../utils/logger.js'
import { SettingsManager, type LivePreviewSettings, type LoadedSettings } from '../lib/SettingsManager.js'
import { HealthCheckRunner, type HealthCheckDependencies } from '../lib/HealthCheckRunner.js'
import { formatReportAsMarkdown, gatherDiagnosticInfo, renderReport } from '../utils/diagnostics.js'
import type { DiagnosticReport } from '../types/health.js'
import type { CheckhealthOptions } from '../types/index.js'

export interface CheckhealthCommandInput {
	options: CheckhealthOptions
}

export type HealthCheckRunnerFactory = (dependencies: HealthCheckDependencies) => HealthCheckRunner

/**
 * Command that runs the health check and prints the report.
 * Settings that fail to load are reported in the config section instead of aborting.
 */
export class CheckhealthCommand {
	private readonly settingsManager: SettingsManager
	private readonly createRunner: HealthCheckRunnerFactory

	constructor(settingsManager?: SettingsManager, createRunner?: HealthCheckRunnerFactory) {
		this.settingsManager = settingsManager ?? new SettingsManager()
		this.createRunner = createRunner ?? (dependencies => new HealthCheckRunner(dependencies))
	}

	public async execute(input: CheckhealthCommandInput): Promise<DiagnosticReport> {
		const { options } = input

		const configuration = await this.loadConfiguration(options)
		const runner = this.createRunner(options.pid !== undefined ? { identity: { pid: options.pid } } : {})
		const report = await runner.runDiagnostics(configuration)

		/* eslint-disable no-console */
		if (options.json) {
			console.log(JSON.stringify(report, null, 2))
		} else if (options.markdown) {
			console.log(formatReportAsMarkdown(report, gatherDiagnosticInfo()))
		} else {
			renderReport(report)
		}
		/* eslint-enable no-console */

		return report
	}

	private async loadConfiguration(options: CheckhealthOptions): Promise<LoadedSettings> {
		const overrides: Partial<LivePreviewSettings> = options.port !== undefined ? { port: options.port } : {}

		try {
			return await this.settingsManager.loadSettings(options.root, overrides)
		} catch (error) {
			const message = error instanceof Error ? error.message : 'Unknown error'
			logger.debug(`Failed to load settings: ${message}`)
			return { settings: overrides, unknownKeys: [], errors: [message] }
		}
	}
}
