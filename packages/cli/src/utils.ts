import {
	formatDiagnostic,
	HCLI001,
	HCLI002,
	HCLI003,
	HCLI004,
	HCLI005,
	HCLI006,
} from '@hoist/diagnostics'
import { ConfigError, ScanError } from '@hoist/transducer'

/**
 * A file could not be read or written. Stops the whole run.
 */
export class IoError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'IoError'
	}
}

/**
 * A single target cannot be processed, but the rest of a batch can be.
 */
export class TargetError extends Error {
	readonly path: string

	constructor(message: string, path: string) {
		super(message)
		this.name = 'TargetError'
		this.path = path
	}
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(HCLI001, { path: filePath })
	}
	return formatDiagnostic(HCLI002, { path: filePath, reason: getErrorMessage(error) })
}

export function formatWriteError(filePath: string, error: unknown): string {
	return formatDiagnostic(HCLI003, { path: filePath, reason: getErrorMessage(error) })
}

export function formatOutsideRootError(filePath: string, root: string): string {
	return formatDiagnostic(HCLI004, { path: filePath, root })
}

export function formatTargetError(filePath: string): string {
	return formatDiagnostic(HCLI005, { path: filePath })
}

/**
 * Errors the tool raises carry a finished message; anything else is wrapped.
 */
export function formatProcessError(error: unknown): string {
	if (
		error instanceof ScanError ||
		error instanceof ConfigError ||
		error instanceof IoError ||
		error instanceof TargetError
	) {
		return error.message
	}
	return formatDiagnostic(HCLI006, { reason: getErrorMessage(error) })
}

/**
 * Errors confined to one target. Everything else ends the run.
 */
export function isTargetFailure(error: unknown): boolean {
	return error instanceof ScanError || error instanceof TargetError
}
