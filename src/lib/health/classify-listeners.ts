import type { ClassifiedListener, ListenerRecord } from '../../types/process.js'

/**
 * Label each listener with whether it is owned by the given process.
 *
 * Listeners whose PID could not be resolved are kept and labelled foreign,
 * so unknown ownership is never reported as healthy. With no `selfPid`
 * every listener is foreign.
 *
 * Ownership is decided by PID equality alone. A PID released and reused
 * between the OS query and this comparison would be misattributed; that
 * window is accepted rather than guarded against.
 */
export function classifyListeners(records: readonly ListenerRecord[], selfPid: number | null): ClassifiedListener[] {
	return records.map(record => ({
		record: { ...record },
		isSelf: selfPid !== null && record.processId === selfPid,
	}))
}
