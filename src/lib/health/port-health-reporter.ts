import type { ClassifiedListener, ListenerRecord } from '../../types/process.js'
import type { HealthVerdict, PreviewServer, Severity } from '../../types/health.js'

export interface PortHealthContext {
	/** Port the server is configured to use */
	port: number
	/** The plugin's own server, when the caller has one */
	server?: PreviewServer | undefined
	/**
	 * False when no expected owner PID is known, e.g. a standalone CLI run
	 * without `--pid`. Listeners are then never attributed to another process.
	 */
	ownerKnown?: boolean
}

/**
 * Turn classified listeners into health verdicts: one per listener,
 * or a single `not-running` verdict when nothing listens on the port.
 * Never throws; missing or ambiguous data yields an `unknown` verdict.
 */
export function reportPortHealth(
	classified: readonly ClassifiedListener[],
	context: PortHealthContext
): HealthVerdict[] {
	const { port } = context

	if (classified.length === 0) {
		return [
			{
				kind: 'not-running',
				port,
				message: `server is not listening on configured port ${port}`,
			},
		]
	}

	return classified.map(({ record, isSelf }) =>
		isSelf ? selfOwnedVerdict(record, context) : foreignVerdict(record, port, context.ownerKnown ?? true)
	)
}

export function verdictSeverity(verdict: HealthVerdict): Severity {
	return verdict.kind === 'healthy' ? 'ok' : 'warn'
}

/**
 * This process holds the socket; whether that is our server depends on its logical state
 */
function selfOwnedVerdict(record: ListenerRecord, { port, server }: PortHealthContext): HealthVerdict {
	if (!server) {
		return {
			kind: 'unknown',
			port,
			record,
			message: `port ${port} is held by this process (PID: ${record.processId}), but no server state is available`,
		}
	}

	let running: boolean
	let webroot: string | undefined
	try {
		running = server.isRunning()
		webroot = server.webroot
	} catch (error) {
		return {
			kind: 'unknown',
			port,
			record,
			message: `could not query the server state: ${error instanceof Error ? error.message : 'Unknown error'}`,
		}
	}

	if (!running) {
		return {
			kind: 'port-stolen',
			port,
			by: record,
			owner: 'same-process',
			message: `another component is using the port ${port}`,
			hint: 'Stop the component holding the port or configure a different `port`',
		}
	}

	if (webroot) {
		return { kind: 'healthy', port, webroot, message: `server is healthy on port ${port} (root: ${webroot})` }
	}
	return { kind: 'healthy', port, message: `server is healthy on port ${port}` }
}

function foreignVerdict(record: ListenerRecord, port: number, ownerKnown: boolean): HealthVerdict {
	if (!ownerKnown) {
		const pid = record.processId === null ? '' : ` (PID: ${record.processId})`
		return {
			kind: 'unknown',
			port,
			record,
			message: `port ${port} is held by \`${record.processName}\`${pid}, but the expected owner is not known`,
			hint: 'Run `livepreview checkhealth --pid <server pid>` to check whether it is the preview server',
		}
	}

	if (record.processId === null) {
		return {
			kind: 'unknown',
			port,
			record,
			message: `port ${port} is held by \`${record.processName}\`, but its PID could not be resolved`,
			hint: 'Run the health check with elevated privileges to identify the owning process',
		}
	}

	const pid = record.processId
	return {
		kind: 'port-stolen',
		port,
		by: record,
		owner: 'foreign-process',
		message: `port ${port} is being used by another process \`${record.processName}\` (PID: ${pid})`,
		hint: `You can run \`livepreview kill ${pid}\` to terminate process ${pid}`,
	}
}
