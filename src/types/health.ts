import type { ListenerRecord } from './process.js'
import type { LivePreviewSettings } from '../lib/SettingsManager.js'

export type Severity = 'ok' | 'warn' | 'error'

/**
 * Categories in the order the health check runs them
 */
export type CheckCategory = 'compatibility' | 'shell' | 'dependencies' | 'server' | 'config'

export const CHECK_CATEGORIES: readonly CheckCategory[] = [
	'compatibility',
	'shell',
	'dependencies',
	'server',
	'config',
]

interface VerdictBase {
	port: number
	message: string
	hint?: string
}

export interface HealthyVerdict extends VerdictBase {
	kind: 'healthy'
	webroot?: string
}

export interface NotRunningVerdict extends VerdictBase {
	kind: 'not-running'
}

/**
 * The configured port is held by something other than this plugin's running server.
 * `owner` keeps socket ownership apart from the server's logical state:
 * 'same-process' means this process holds the socket but its server is not running.
 */
export interface PortStolenVerdict extends VerdictBase {
	kind: 'port-stolen'
	by: ListenerRecord
	owner: 'same-process' | 'foreign-process'
}

export interface UnknownVerdict extends VerdictBase {
	kind: 'unknown'
	record?: ListenerRecord
}

export type HealthVerdict = HealthyVerdict | NotRunningVerdict | PortStolenVerdict | UnknownVerdict

export interface ReportEntry {
	category: CheckCategory
	severity: Severity
	message: string
	/** Remediation guidance shown under the message */
	hint?: string
	/** Present for entries produced by the server port check */
	verdict?: HealthVerdict
}

export interface DiagnosticReport {
	readonly entries: readonly ReportEntry[]
	/** Effective configuration the checks ran with, after merging and validation */
	readonly settings: Readonly<LivePreviewSettings>
	readonly generatedAt: string
}

/**
 * The live-preview server as seen by the diagnostics.
 * Only queried, never constructed or owned by the health check.
 */
export interface PreviewServer {
	isRunning(): boolean
	readonly webroot?: string | undefined
}
