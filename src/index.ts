export { HealthCheckRunner } from './lib/HealthCheckRunner.js'
export type { HealthCheckDependencies, ListenerSource, ShellChecker } from './lib/HealthCheckRunner.js'
export { ProcessManager, LOOKUP_TIMEOUT_MS } from './lib/process/ProcessManager.js'
export { classifyListeners } from './lib/health/classify-listeners.js'
export { reportPortHealth, verdictSeverity } from './lib/health/port-health-reporter.js'
export type { PortHealthContext } from './lib/health/port-health-reporter.js'
export {
	SettingsManager,
	LivePreviewSettingsSchema,
	KNOWN_SETTINGS_KEYS,
} from './lib/SettingsManager.js'
export type { LivePreviewSettings, LoadedSettings } from './lib/SettingsManager.js'
export { isCompatible, checkHostCompatibility } from './utils/version.js'
export { formatReportAsMarkdown, renderReport, reportHasErrors } from './utils/diagnostics.js'
export { createLogger, logger } from './utils/logger.js'
export type { Logger, LoggerOptions } from './utils/logger.js'
export * from './types/index.js'
