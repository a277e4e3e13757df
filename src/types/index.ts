export * from './process.js'
export * from './health.js'

// Command option types
export interface CheckhealthOptions {
	/** Overrides the configured port */
	port?: number
	/** PID expected to own the port; defaults to the current process */
	pid?: number
	/** Directory containing .livepreview/ (defaults to the working directory) */
	root?: string
	json?: boolean
	markdown?: boolean
}
