import { execa } from 'execa'
import { logger } from './logger.js'

export type ShellName = 'sh' | 'powershell'

/**
 * Shell the preview plugin spawns its helper commands through
 */
export function detectShell(hostPlatform: NodeJS.Platform = process.platform): ShellName {
	return hostPlatform === 'win32' ? 'powershell' : 'sh'
}

/**
 * Detect if a shell executable is on the PATH
 */
export async function isShellAvailable(
	shell: ShellName,
	hostPlatform: NodeJS.Platform = process.platform
): Promise<boolean> {
	try {
		if (hostPlatform === 'win32') {
			await execa('where', [shell], { timeout: 5000 })
		} else {
			// 'command -v' is a shell builtin, so it needs a shell to run in
			await execa('command', ['-v', shell], { shell: true, timeout: 5000 })
		}
		return true
	} catch (error) {
		logger.debug(`${shell} not available`, { error })
		return false
	}
}
