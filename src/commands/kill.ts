import { logger } from '../utils/logger.js'
import { ProcessManager } from '../lib/process/ProcessManager.js'

export interface KillCommandInput {
	pid: number
}

/**
 * Command to terminate the process holding the preview port,
 * as suggested by the health check's remediation hint.
 */
export class KillCommand {
	private readonly processManager: ProcessManager

	constructor(processManager?: ProcessManager) {
		this.processManager = processManager ?? new ProcessManager()
	}

	public async execute(input: KillCommandInput): Promise<void> {
		const { pid } = input

		if (!Number.isSafeInteger(pid) || pid <= 0) {
			throw new Error('PID must be a positive integer')
		}
		if (pid === process.pid) {
			throw new Error('Refusing to terminate the livepreview process itself')
		}

		logger.info(`Terminating process ${pid}...`)
		await this.processManager.terminateProcess(pid)
		logger.success(`Process ${pid} terminated`)
	}
}
