import {
	type ConfigDiagnosticCode,
	type DiagnosticArgs,
	getDiagnostic,
	interpolateMessage,
	type SyntaxDiagnosticCode,
} from '@hoist/diagnostics'
import type { Position } from './types.ts'

/**
 * Error thrown when annotation syntax is malformed. Processing of the file
 * stops at the first one.
 */
export class ScanError extends Error {
	readonly code: SyntaxDiagnosticCode
	readonly filename: string
	readonly line: number
	readonly column: number

	constructor(
		message: string,
		code: SyntaxDiagnosticCode,
		filename: string,
		line: number,
		column: number
	) {
		super(message)
		this.name = 'ScanError'
		this.code = code
		this.filename = filename
		this.line = line
		this.column = column
	}
}

/**
 * Error thrown for invalid options, before any input is read.
 */
export class ConfigError extends Error {
	readonly code: ConfigDiagnosticCode

	constructor(message: string, code: ConfigDiagnosticCode) {
		super(message)
		this.name = 'ConfigError'
		this.code = code
	}
}

/**
 * Builds the `path:line:column syntax error [CODE] message` text.
 */
export function formatScanMessage(
	filename: string,
	position: Position,
	code: SyntaxDiagnosticCode,
	args?: DiagnosticArgs
): string {
	const message = interpolateMessage(getDiagnostic(code).message, args)
	return `${filename}:${position.line}:${position.column} syntax error [${code}] ${message}`
}

export function throwScanError(
	filename: string,
	position: Position,
	code: SyntaxDiagnosticCode,
	args?: DiagnosticArgs
): never {
	throw new ScanError(
		formatScanMessage(filename, position, code, args),
		code,
		filename,
		position.line,
		position.column
	)
}

export function throwConfigError(code: ConfigDiagnosticCode, args?: DiagnosticArgs): never {
	const message = interpolateMessage(getDiagnostic(code).message, args)
	throw new ConfigError(`[${code}] ${message}`, code)
}
