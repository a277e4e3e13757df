export const MIN_PORT = 1
export const MAX_PORT = 65535

/**
 * Check whether a value is a usable TCP port number (integer in 1-65535)
 */
export function isValidPort(port: number): boolean {
	return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT
}

/**
 * Parse a port given on the command line
 *
 * @param value - Raw option value, e.g. "3000"
 * @returns The port number
 * @throws Error if the value is not an integer in 1-65535
 */
export function parsePort(value: string): number {
	const trimmed = value.trim()
	if (!/^\d+$/.test(trimmed)) {
		throw new Error(`Invalid port "${value}": expected an integer between ${MIN_PORT} and ${MAX_PORT}`)
	}

	const port = parseInt(trimmed, 10)
	if (!isValidPort(port)) {
		throw new Error(`Invalid port ${port}: must be between ${MIN_PORT} and ${MAX_PORT}`)
	}

	return port
}

/**
 * Parse a process ID given on the command line
 *
 * @throws Error if the value is not a positive integer
 */
export function parsePid(value: string): number {
	const trimmed = value.trim()
	const pid = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN
	if (!Number.isSafeInteger(pid) || pid <= 0) {
		throw new Error(`Invalid PID "${value}": expected a positive integer`)
	}
	return pid
}
