/**
 * A process holding a TCP socket in the LISTEN state on a port
 */
export interface ListenerRecord {
	/** Owning process ID, or null when the platform could not resolve it */
	processId: number | null
	/** Executable or command name (e.g., "node", "python"); "unknown" when unresolved */
	processName: string
	/** Port the socket is bound to */
	port: number
}

/**
 * A listener labelled with whether it belongs to the current host process
 */
export interface ClassifiedListener {
	record: ListenerRecord
	isSelf: boolean
}

/**
 * Identity of the process the diagnostics compare listeners against
 */
export interface CurrentProcessIdentity {
	pid: number
}

/**
 * Supported platform types
 */
export type Platform = 'darwin' | 'linux' | 'win32' | 'posix' | 'unsupported'

export enum LookupErrorCode {
	COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
	PERMISSION_DENIED = 'PERMISSION_DENIED',
	TIMEOUT = 'TIMEOUT',
	QUERY_FAILED = 'QUERY_FAILED',
	UNPARSEABLE_OUTPUT = 'UNPARSEABLE_OUTPUT',
	UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
}

/**
 * The OS-level port/process enumeration could not be performed.
 * Distinguishes "could not check" from "nothing is listening".
 */
export class LookupError extends Error {
	constructor(
		public code: LookupErrorCode,
		message: string,
		public details?: unknown
	) {
		super(message)
		this.name = 'LookupError'
	}
}
