import { platform, release, arch } from 'os'
import { logger as defaultLogger, type Logger } from './logger.js'
import { getPackageInfo } from './package-info.js'
import { CHECK_CATEGORIES } from '../types/health.js'
import type { CheckCategory, DiagnosticReport, ReportEntry, Severity } from '../types/health.js'
import type { LivePreviewSettings } from '../lib/SettingsManager.js'

/**
 * Environment information attached to Markdown reports
 */
export interface DiagnosticInfo {
	cliVersion: string
	nodeVersion: string
	osType: string
	osVersion: string
	architecture: string
}

const CATEGORY_TITLES: Record<CheckCategory, string> = {
	compatibility: 'Check host compatibility',
	shell: 'Check shell',
	dependencies: 'Check dependencies',
	server: 'Check server and process',
	config: 'Check your livepreview config',
}

const SEVERITY_LABELS: Record<Severity, string> = {
	ok: 'OK',
	warn: 'WARNING',
	error: 'ERROR',
}

/**
 * Gathers information about the environment the health check ran in.
 * Values that cannot be read fall back to a descriptive placeholder.
 */
export function gatherDiagnosticInfo(): DiagnosticInfo {
	return {
		cliVersion: getCliVersion(),
		nodeVersion: process.version,
		osType: platform(),
		osVersion: release(),
		architecture: arch(),
	}
}

function getCliVersion(): string {
	try {
		return getPackageInfo().version
	} catch (error) {
		defaultLogger.debug('Failed to read CLI version from package.json: ', error)
		return 'unknown (failed to read package.json)'
	}
}

export function reportHasErrors(report: DiagnosticReport): boolean {
	return report.entries.some(entry => entry.severity === 'error')
}

/**
 * Group entries by category, keeping the order the checks ran in
 */
export function groupEntriesByCategory(report: DiagnosticReport): Array<[CheckCategory, ReportEntry[]]> {
	const groups: Array<[CheckCategory, ReportEntry[]]> = []
	for (const category of CHECK_CATEGORIES) {
		const entries = report.entries.filter(entry => entry.category === category)
		if (entries.length > 0) {
			groups.push([category, entries])
		}
	}
	return groups
}

/**
 * Print a report through the logger: ok → success, warn → warn, error → error, hints → info
 */
export function renderReport(report: DiagnosticReport, log: Logger = defaultLogger): void {
	for (const [category, entries] of groupEntriesByCategory(report)) {
		log.info(`${CATEGORY_TITLES[category]}:`)
		for (const entry of entries) {
			const line = `  ${entry.message}`
			if (entry.severity === 'ok') {
				log.success(line)
			} else if (entry.severity === 'warn') {
				log.warn(line)
			} else {
				log.error(line)
			}
			if (entry.hint) {
				log.info(`    ${entry.hint}`)
			}
		}
		if (category === 'config') {
			log.info('  Your configuration:')
			for (const line of settingsLines(report.settings)) {
				log.info(`    ${line}`)
			}
		}
	}
}

function settingsLines(settings: Readonly<LivePreviewSettings>): string[] {
	const entries = Object.entries(settings)
	if (entries.length === 0) {
		return ['(defaults)']
	}
	return entries.map(([key, value]) => `${key} = ${JSON.stringify(value)}`)
}

function settingsTable(settings: Readonly<LivePreviewSettings>): string {
	const rows = Object.entries(settings).map(
		([key, value]) => `| \`${key}\` | \`${JSON.stringify(value).replace(/\|/g, '\\|')}\` |`
	)
	if (rows.length === 0) {
		return 'Your configuration: defaults'
	}
	return `Your configuration:\n\n| Option | Value |\n|--------|-------|\n${rows.join('\n')}`
}

/**
 * Formats a report as Markdown, e.g. for pasting into a bug report
 */
export function formatReportAsMarkdown(report: DiagnosticReport, info: DiagnosticInfo): string {
	const sections = groupEntriesByCategory(report).map(([category, entries]) => {
		const lines = entries.map(entry => {
			const hint = entry.hint ? `\n  - ${entry.hint}` : ''
			return `- **${SEVERITY_LABELS[entry.severity]}** ${entry.message}${hint}`
		})
		const table = category === 'config' ? `\n\n${settingsTable(report.settings)}` : ''
		return `### ${CATEGORY_TITLES[category]}\n\n${lines.join('\n')}${table}`
	})

	return `## livepreview health report

${sections.join('\n\n')}

<details>
<summary>Environment</summary>

| Property | Value |
|----------|-------|
| livepreview Version | ${info.cliVersion} |
| Node.js Version | ${info.nodeVersion} |
| OS | ${info.osType} |
| OS Version | ${info.osVersion} |
| Architecture | ${info.architecture} |

</details>
`
}
