/**
 * @hoist/diagnostics
 *
 * Shared diagnostic types and definitions for hoist packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	HCLI001,
	HCLI002,
	HCLI003,
	HCLI004,
	HCLI005,
	HCLI006,
} from './cli.ts'
export {
	CONFIG_DIAGNOSTICS,
	type ConfigDiagnosticCode,
	HCFG001,
	HCFG002,
	HCFG003,
	HCFG004,
	HCFG005,
} from './config.ts'
export { formatDiagnostic, interpolateMessage } from './interpolate.ts'
export {
	HSYN001,
	HSYN002,
	HSYN003,
	HSYN004,
	HSYN005,
	HSYN006,
	HSYN007,
	HSYN008,
	HSYN009,
	SYNTAX_DIAGNOSTICS,
	type SyntaxDiagnosticCode,
} from './syntax.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	type DiagnosticPhase,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { CONFIG_DIAGNOSTICS } from './config.ts'
import { SYNTAX_DIAGNOSTICS } from './syntax.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...SYNTAX_DIAGNOSTICS,
	...CONFIG_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
