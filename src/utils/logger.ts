import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface LoggerOptions {
	prefix?: string
	timestamp?: boolean
	silent?: boolean
	forceColor?: boolean | undefined | null
	debug?: boolean
}

export interface Logger {
	info: (message: string, ...args: unknown[]) => void
	success: (message: string, ...args: unknown[]) => void
	warn: (message: string, ...args: unknown[]) => void
	error: (message: string, ...args: unknown[]) => void
	debug: (message: string, ...args: unknown[]) => void
	setDebug: (enabled: boolean) => void
	isDebugEnabled: () => boolean
}

type Level = 'info' | 'success' | 'warn' | 'error' | 'debug'

interface LevelStyle {
	symbol: string
	stream: 'stdout' | 'stderr'
	color: (palette: ChalkInstance) => (text: string) => string
}

const LEVELS: Record<Level, LevelStyle> = {
	info: { symbol: 'ℹ', stream: 'stdout', color: palette => palette.blue },
	success: { symbol: '✔', stream: 'stdout', color: palette => palette.green },
	warn: { symbol: '⚠', stream: 'stderr', color: palette => palette.yellow },
	error: { symbol: '✖', stream: 'stderr', color: palette => palette.red },
	debug: { symbol: '•', stream: 'stdout', color: palette => palette.gray },
}

const defaultChalk = new Chalk({ level: chalk.level })

function formatMessage(message: string, ...args: unknown[]): string {
	const formattedArgs = args.map(arg =>
		typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
	)
	return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

let globalDebugEnabled = false

const noop = (): void => {}

/**
 * Create a logger. Without a local `debug` option the logger follows the
 * global debug flag set through `logger.setDebug`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const { prefix = '', timestamp = false, silent = false, forceColor, debug } = options

	if (silent) {
		return {
			info: noop,
			success: noop,
			warn: noop,
			error: noop,
			debug: noop,
			setDebug: noop,
			isDebugEnabled: (): boolean => false,
		}
	}

	let localDebug: boolean | undefined = debug
	const isDebugEnabled = (): boolean => localDebug ?? globalDebugEnabled

	const palette = forceColor !== undefined && forceColor !== null
		? new Chalk({ level: forceColor ? 3 : 0 })
		: defaultChalk
	const prefixStr = prefix ? `[${prefix}] ` : ''

	const write = (level: Level, message: string, args: unknown[]): void => {
		const text = `${timestamp ? `[${new Date().toISOString()}] ` : ''}${prefixStr}${formatMessage(message, ...args)}`
		if (!text.trim()) return

		const style = LEVELS[level]
		const output = style.color(palette)(`${style.symbol} ${text}`)
		/* eslint-disable no-console */
		if (style.stream === 'stderr') {
			console.error(output)
		} else {
			console.log(output)
		}
		/* eslint-enable no-console */
	}

	return {
		info: (message, ...args) => write('info', message, args),
		success: (message, ...args) => write('success', message, args),
		warn: (message, ...args) => write('warn', message, args),
		error: (message, ...args) => write('error', message, args),
		debug: (message, ...args) => {
			if (isDebugEnabled()) write('debug', message, args)
		},
		setDebug: (enabled: boolean): void => {
			if (localDebug === undefined) {
				globalDebugEnabled = enabled
			} else {
				localDebug = enabled
			}
		},
		isDebugEnabled,
	}
}

export const logger: Logger = createLogger()

export default logger
