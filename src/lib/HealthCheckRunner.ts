import { logger } from '../utils/logger.js'
import { checkHostCompatibility, type HostCompatibility } from '../utils/version.js'
import { detectShell, isShellAvailable, type ShellName } from '../utils/shell.js'
import { DEFAULT_PICKERS, isModuleInstalled, type DependencyChecker } from '../utils/optional-dependency.js'
import { ProcessManager } from './process/ProcessManager.js'
import { classifyListeners } from './health/classify-listeners.js'
import { reportPortHealth, verdictSeverity } from './health/port-health-reporter.js'
import { KNOWN_SETTINGS_KEYS, type LoadedSettings } from './SettingsManager.js'
import { LookupError, LookupErrorCode } from '../types/process.js'
import type { CurrentProcessIdentity, ListenerRecord } from '../types/process.js'
import type {
	CheckCategory,
	DiagnosticReport,
	PreviewServer,
	ReportEntry,
} from '../types/health.js'

export type ListenerSource = Pick<ProcessManager, 'listListenersOnPort'>

export interface ShellChecker {
	detect: () => ShellName
	isAvailable: (shell: ShellName) => Promise<boolean>
}

/**
 * Collaborators of the health check. Anything omitted uses the real implementation.
 */
export interface HealthCheckDependencies {
	processManager?: ListenerSource
	/** The plugin's server; omitted when the caller does not run one */
	server?: PreviewServer
	/**
	 * Process expected to own the port. Defaults to the current process when a
	 * server is given; without either, listeners are reported without attribution.
	 */
	identity?: CurrentProcessIdentity
	hostCompatibility?: () => HostCompatibility
	shellChecker?: ShellChecker
	dependencyChecker?: DependencyChecker
}

const defaultShellChecker: ShellChecker = {
	detect: () => detectShell(),
	isAvailable: shell => isShellAvailable(shell),
}

/**
 * Runs every health check in order and collects the results into one report.
 * Each check is isolated: a failing check adds an error entry and the run continues.
 */
export class HealthCheckRunner {
	private readonly processManager: ListenerSource
	private readonly server: PreviewServer | undefined
	private readonly identity: CurrentProcessIdentity | undefined
	private readonly hostCompatibility: () => HostCompatibility
	private readonly shellChecker: ShellChecker
	private readonly dependencyChecker: DependencyChecker

	constructor(dependencies: HealthCheckDependencies = {}) {
		this.processManager = dependencies.processManager ?? new ProcessManager()
		this.server = dependencies.server
		this.identity = dependencies.identity
		this.hostCompatibility = dependencies.hostCompatibility ?? (() => checkHostCompatibility())
		this.shellChecker = dependencies.shellChecker ?? defaultShellChecker
		this.dependencyChecker = dependencies.dependencyChecker ?? isModuleInstalled
	}

	/**
	 * Run all checks: compatibility → shell → dependencies → server → config.
	 * The server check only runs when a port is configured.
	 */
	async runDiagnostics(configuration: LoadedSettings): Promise<DiagnosticReport> {
		const entries: ReportEntry[] = []
		const { settings } = configuration

		await this.runCheck(entries, 'compatibility', () => this.checkCompatibility())
		await this.runCheck(entries, 'shell', () => this.checkShell())
		await this.runCheck(entries, 'dependencies', () => this.checkDependencies(settings.pickers ?? DEFAULT_PICKERS))

		const port = settings.port
		if (port !== undefined) {
			await this.runCheck(entries, 'server', () => this.checkServerPort(port))
		} else {
			logger.debug('runDiagnostics: no port configured, skipping server check')
		}

		await this.runCheck(entries, 'config', () => this.checkConfiguration(configuration))

		return Object.freeze({
			entries: Object.freeze(entries),
			settings: Object.freeze({ ...settings }),
			generatedAt: new Date().toISOString(),
		})
	}

	/**
	 * Run one check, turning anything it throws into an error entry
	 */
	private async runCheck(
		entries: ReportEntry[],
		category: CheckCategory,
		check: () => ReportEntry[] | Promise<ReportEntry[]>
	): Promise<void> {
		try {
			entries.push(...(await check()))
		} catch (error) {
			logger.debug(`runCheck: ${category} check threw`, { error })
			entries.push({
				category,
				severity: 'error',
				message: `The ${category} check failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
			})
		}
	}

	private checkCompatibility(): ReportEntry[] {
		const { hostVersion, supportedRange, compatible } = this.hostCompatibility()

		if (!compatible) {
			return [
				{
					category: 'compatibility',
					severity: 'error',
					message: `livepreview requires Node.js ${supportedRange}, but you are using ${hostVersion}`,
					hint: 'Please upgrade Node.js',
				},
			]
		}

		return [
			{
				category: 'compatibility',
				severity: 'ok',
				message: `Node.js ${hostVersion} is compatible with livepreview`,
			},
		]
	}

	private async checkShell(): Promise<ReportEntry[]> {
		const shell = this.shellChecker.detect()

		if (!(await this.shellChecker.isAvailable(shell))) {
			return [
				{
					category: 'shell',
					severity: 'error',
					message: `\`${shell}\` is not available`,
					hint: 'Please make sure it is installed and available in your PATH',
				},
			]
		}

		return [{ category: 'shell', severity: 'ok', message: `\`${shell}\` is available` }]
	}

	private async checkDependencies(pickers: readonly string[]): Promise<ReportEntry[]> {
		const names = pickers.map(name => name.trim()).filter(name => name !== '')
		if (names.length === 0) {
			return [{ category: 'dependencies', severity: 'ok', message: 'No optional dependencies configured' }]
		}

		const entries: ReportEntry[] = []
		for (const name of names) {
			if (await this.dependencyChecker(name)) {
				entries.push({ category: 'dependencies', severity: 'ok', message: `\`${name}\` is installed` })
			} else {
				entries.push({
					category: 'dependencies',
					severity: 'warn',
					message: `\`${name}\` (optional) is not installed`,
				})
			}
		}
		return entries
	}

	/**
	 * PID expected to own the port: the injected identity, or this process when it
	 * runs the server itself. Null when neither is known.
	 */
	private expectedOwnerPid(): number | null {
		if (this.identity) {
			return this.identity.pid
		}
		return this.server ? process.pid : null
	}

	/**
	 * Process Lister → Ownership Classifier → Health Reporter
	 */
	private async checkServerPort(port: number): Promise<ReportEntry[]> {
		const pid = this.expectedOwnerPid()
		const entries: ReportEntry[] =
			pid === null
				? []
				: [{ category: 'server', severity: 'ok', message: `This process's PID is ${pid}` }]

		let records: ListenerRecord[]
		try {
			records = await this.processManager.listListenersOnPort(port)
		} catch (error) {
			if (!(error instanceof LookupError)) {
				throw error
			}
			entries.push({
				category: 'server',
				severity: 'error',
				message: `Could not check which process is listening on port ${port}: ${error.message}`,
				hint: lookupHint(error),
			})
			return entries
		}

		const classified = classifyListeners(records, pid)
		for (const verdict of reportPortHealth(classified, { port, server: this.server, ownerKnown: pid !== null })) {
			entries.push({
				category: 'server',
				severity: verdictSeverity(verdict),
				message: verdict.message,
				...(verdict.hint ? { hint: verdict.hint } : {}),
				verdict,
			})
		}
		return entries
	}

	private checkConfiguration({ unknownKeys, errors = [] }: LoadedSettings): ReportEntry[] {
		const entries: ReportEntry[] = []

		for (const message of errors) {
			entries.push({
				category: 'config',
				severity: 'error',
				message,
				hint: 'Fix the settings file, then run the health check again',
			})
		}

		for (const key of unknownKeys) {
			entries.push({
				category: 'config',
				severity: 'warn',
				message: `\`${key}\` is not a config option`,
				hint: `Known options: ${KNOWN_SETTINGS_KEYS.join(', ')}`,
			})
		}

		if (entries.length === 0) {
			entries.push({ category: 'config', severity: 'ok', message: 'Configuration is valid' })
		}
		return entries
	}
}

function lookupHint(error: LookupError): string {
	switch (error.code) {
		case LookupErrorCode.COMMAND_NOT_FOUND:
			return 'Install `ss` or `lsof` (netstat on Windows) and make sure it is in your PATH'
		case LookupErrorCode.PERMISSION_DENIED:
			return 'Run the health check with enough privileges to list sockets'
		case LookupErrorCode.TIMEOUT:
			return 'The system was too slow to answer; run the health check again'
		case LookupErrorCode.UNSUPPORTED_PLATFORM:
			return 'Port ownership cannot be checked on this platform'
		default:
			return 'Run the health check with --debug for details'
	}
}
