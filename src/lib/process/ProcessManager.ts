import { execa, type ExecaError } from 'execa'
import { setTimeout } from 'timers/promises'
import { logger } from '../../utils/logger.js'
import { isValidPort } from '../../utils/port.js'
import { LookupError, LookupErrorCode } from '../../types/process.js'
import type { ListenerRecord, Platform } from '../../types/process.js'

/** Upper bound for a single OS query; a hung query must not stall the host */
export const LOOKUP_TIMEOUT_MS = 5000

export const UNKNOWN_PROCESS_NAME = 'unknown'

interface QueryOptions {
	/** Exit code 1 with empty stdout means "nothing matched" (lsof) */
	emptyOnExitCodeOne?: boolean
}

/**
 * Discovers which processes listen on a TCP port, and terminates them on request.
 *
 * Linux uses `ss` (falling back to `lsof`), macOS and other POSIX systems use
 * `lsof`, Windows uses `netstat` + `tasklist`.
 */
export class ProcessManager {
	private readonly hostPlatform: NodeJS.Platform
	private readonly platform: Platform

	constructor(hostPlatform: NodeJS.Platform = process.platform) {
		this.hostPlatform = hostPlatform
		this.platform = this.detectPlatform(hostPlatform)
	}

	/**
	 * Map the Node.js platform to a lookup strategy
	 */
	private detectPlatform(hostPlatform: NodeJS.Platform): Platform {
		switch (hostPlatform) {
			case 'linux':
			case 'android':
				return 'linux'
			case 'darwin':
				return 'darwin'
			case 'win32':
				return 'win32'
			case 'freebsd':
			case 'openbsd':
			case 'netbsd':
			case 'sunos':
			case 'aix':
				return 'posix'
			default:
				return 'unsupported'
		}
	}

	/**
	 * List the processes with a TCP socket in LISTEN state on the given port.
	 * Invalid ports yield an empty list.
	 *
	 * @throws LookupError if the OS could not be queried
	 */
	async listListenersOnPort(port: number): Promise<ListenerRecord[]> {
		if (!isValidPort(port)) {
			logger.debug(`listListenersOnPort: ${port} is not a valid TCP port, nothing to look up`)
			return []
		}

		let records: ListenerRecord[]
		switch (this.platform) {
			case 'linux':
				records = await this.listOnLinux(port)
				break
			case 'darwin':
			case 'posix':
				records = await this.listWithLsof(port)
				break
			case 'win32':
				records = await this.listOnWindows(port)
				break
			default:
				throw new LookupError(
					LookupErrorCode.UNSUPPORTED_PLATFORM,
					`Listing processes by port is not supported on ${this.hostPlatform}`
				)
		}

		const listeners = dedupeListeners(records)
		logger.debug(`listListenersOnPort: ${listeners.length} listener(s) on port ${port}`, listeners)
		return listeners
	}

	/**
	 * Linux implementation using ss, with lsof as fallback when ss is missing
	 */
	private async listOnLinux(port: number): Promise<ListenerRecord[]> {
		try {
			const stdout = await this.runQuery('ss', ['-H', '-ltnp', `sport = :${port}`])
			return parseSsOutput(stdout, port)
		} catch (error) {
			if (error instanceof LookupError && error.code === LookupErrorCode.COMMAND_NOT_FOUND) {
				logger.debug('listOnLinux: ss is not installed, falling back to lsof')
				return await this.listWithLsof(port)
			}
			throw error
		}
	}

	/**
	 * macOS / POSIX implementation using lsof field output
	 */
	private async listWithLsof(port: number): Promise<ListenerRecord[]> {
		const stdout = await this.runQuery('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-F', 'pc'], {
			emptyOnExitCodeOne: true,
		})
		return parseLsofFieldOutput(stdout, port)
	}

	/**
	 * Windows implementation using netstat for PIDs and tasklist for names
	 */
	private async listOnWindows(port: number): Promise<ListenerRecord[]> {
		const stdout = await this.runQuery('netstat', ['-ano', '-p', 'tcp'])
		const pids = parseNetstatListeningPids(stdout, port)

		const records: ListenerRecord[] = []
		for (const pid of pids) {
			const processName = pid === null ? UNKNOWN_PROCESS_NAME : await this.resolveWindowsProcessName(pid)
			records.push({ processId: pid, processName, port })
		}
		return records
	}

	private async resolveWindowsProcessName(pid: number): Promise<string> {
		try {
			const stdout = await this.runQuery('tasklist', ['/FI', `PID eq ${pid}`, '/FO', 'CSV', '/NH'])
			return parseTasklistImageName(stdout) ?? UNKNOWN_PROCESS_NAME
		} catch (error) {
			// The PID is what the ownership check needs; a missing name only degrades the message
			logger.debug(`resolveWindowsProcessName: could not resolve name of PID ${pid}`, { error })
			return UNKNOWN_PROCESS_NAME
		}
	}

	/**
	 * Run a read-only OS query bounded by LOOKUP_TIMEOUT_MS
	 */
	private async runQuery(command: string, args: string[], options: QueryOptions = {}): Promise<string> {
		logger.debug(`runQuery: ${command} ${args.join(' ')}`)
		try {
			const result = await execa(command, args, { timeout: LOOKUP_TIMEOUT_MS })
			return result.stdout
		} catch (error) {
			if (
				options.emptyOnExitCodeOne &&
				isExecaError(error) &&
				error.exitCode === 1 &&
				error.stdout.trim() === ''
			) {
				return ''
			}
			throw toLookupError(command, error)
		}
	}

	/**
	 * Terminate a process by PID
	 */
	async terminateProcess(pid: number): Promise<boolean> {
		if (!Number.isSafeInteger(pid) || pid <= 0) {
			throw new Error(`Invalid PID ${pid}: expected a positive integer`)
		}

		try {
			if (this.platform === 'win32') {
				await execa('taskkill', ['/PID', pid.toString(), '/F'], { timeout: LOOKUP_TIMEOUT_MS })
			} else {
				process.kill(pid, 'SIGKILL')
			}

			// Give the OS a moment to release the socket
			await setTimeout(1000)

			return true
		} catch (error) {
			throw new Error(
				`Failed to terminate process ${pid}: ${error instanceof Error ? error.message : 'Unknown error'}`
			)
		}
	}
}

function isExecaError(error: unknown): error is ExecaError {
	return error instanceof Error && 'exitCode' in error && 'timedOut' in error
}

function toLookupError(command: string, error: unknown): LookupError {
	if (error instanceof Error && 'code' in error) {
		if (error.code === 'ENOENT') {
			return new LookupError(
				LookupErrorCode.COMMAND_NOT_FOUND,
				`\`${command}\` is not available, cannot list processes listening on ports`,
				error
			)
		}
		if (error.code === 'EACCES' || error.code === 'EPERM') {
			return new LookupError(
				LookupErrorCode.PERMISSION_DENIED,
				`Permission denied while running \`${command}\``,
				error
			)
		}
	}

	if (isExecaError(error) && error.timedOut) {
		return new LookupError(
			LookupErrorCode.TIMEOUT,
			`\`${command}\` did not respond within ${LOOKUP_TIMEOUT_MS}ms`,
			error
		)
	}

	return new LookupError(
		LookupErrorCode.QUERY_FAILED,
		`\`${command}\` failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
		error
	)
}

/**
 * PIDs of 0 or below are placeholders some platforms report when the owner is unknown
 */
function toProcessId(pid: number): number | null {
	return pid > 0 ? pid : null
}

/**
 * Parse `ss -H -ltnp` output.
 *
 * Example row:
 *   LISTEN 0 511 0.0.0.0:3000 0.0.0.0:* users:(("node",pid=4242,fd=21))
 * The process column is missing when the socket belongs to another user.
 */
export function parseSsOutput(stdout: string, port: number): ListenerRecord[] {
	const records: ListenerRecord[] = []

	for (const rawLine of stdout.split(/\r?\n/)) {
		const line = rawLine.trim()
		if (!line) continue

		const parts = line.split(/\s+/)
		const localAddress = parts[3]
		const localPort = localAddress?.match(/:(\d+)$/)?.[1]
		if (parts.length < 5 || localPort === undefined) {
			throw new LookupError(LookupErrorCode.UNPARSEABLE_OUTPUT, `Unexpected ss output: ${line}`)
		}
		if (parseInt(localPort, 10) !== port) continue

		const processColumn = parts.slice(5).join(' ')
		const owners = [...processColumn.matchAll(/\("([^"]*)",pid=(\d+)/g)]
		if (owners.length === 0) {
			records.push({ processId: null, processName: UNKNOWN_PROCESS_NAME, port })
			continue
		}

		for (const [, name, pid] of owners) {
			records.push({
				processId: toProcessId(parseInt(pid ?? '', 10)),
				processName: name || UNKNOWN_PROCESS_NAME,
				port,
			})
		}
	}

	return records
}

/**
 * Parse `lsof -F pc` output: one `p<pid>` line per process followed by its `c<command>` line.
 * Other field lines (e.g. `f<fd>`) are ignored.
 */
export function parseLsofFieldOutput(stdout: string, port: number): ListenerRecord[] {
	const records: ListenerRecord[] = []
	let current: ListenerRecord | null = null

	for (const rawLine of stdout.split(/\r?\n/)) {
		const line = rawLine.trim()
		if (!line) continue

		const field = line.charAt(0)
		const value = line.slice(1)

		if (field === 'p') {
			if (!/^\d+$/.test(value)) {
				throw new LookupError(LookupErrorCode.UNPARSEABLE_OUTPUT, `Unexpected lsof output: ${line}`)
			}
			current = { processId: toProcessId(parseInt(value, 10)), processName: UNKNOWN_PROCESS_NAME, port }
			records.push(current)
		} else if (field === 'c' && current) {
			current.processName = value || UNKNOWN_PROCESS_NAME
		}
	}

	return records
}

/**
 * Parse `netstat -ano -p tcp` output and return the PIDs listening on the port.
 *
 * Example row:
 *   TCP    0.0.0.0:3000    0.0.0.0:0    LISTENING    4242
 */
export function parseNetstatListeningPids(stdout: string, port: number): Array<number | null> {
	const pids = new Set<number | null>()

	for (const rawLine of stdout.split(/\r?\n/)) {
		const parts = rawLine.trim().split(/\s+/)
		if (parts.length < 5) continue
		if (parts[0]?.toUpperCase() !== 'TCP' || parts[3]?.toUpperCase() !== 'LISTENING') continue

		const localPort = parts[1]?.match(/:(\d+)$/)?.[1]
		if (localPort === undefined || parseInt(localPort, 10) !== port) continue

		const pidColumn = parts[4] ?? ''
		if (!/^\d+$/.test(pidColumn)) {
			throw new LookupError(LookupErrorCode.UNPARSEABLE_OUTPUT, `Unexpected netstat output: ${rawLine.trim()}`)
		}
		pids.add(toProcessId(parseInt(pidColumn, 10)))
	}

	return [...pids]
}

/**
 * Parse the image name from `tasklist /FO CSV /NH` output, e.g. `"node.exe","4242",...`
 */
export function parseTasklistImageName(stdout: string): string | null {
	const firstLine = stdout.trim().split(/\r?\n/)[0] ?? ''
	return firstLine.match(/^"([^"]+)"/)?.[1] ?? null
}

/**
 * Collapse duplicate rows, e.g. the IPv4 and IPv6 sockets of one process
 */
export function dedupeListeners(records: ListenerRecord[]): ListenerRecord[] {
	const seen = new Map<string, ListenerRecord>()
	for (const record of records) {
		const key = `${record.processId ?? '?'}:${record.processName}:${record.port}`
		if (!seen.has(key)) {
			seen.set(key, record)
		}
	}
	return [...seen.values()]
}
