/**
 * CLI diagnostic definitions.
 *
 * Error code format: HCLI<NUMBER>
 * - HCLI: file system and dispatch errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (HCLI001-099)
// =============================================================================

export const HCLI001: DiagnosticDef = {
	code: 'HCLI001',
	description: "hoist couldn't find a file at this path.",
	message: 'file not found: {path}',
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const HCLI002: DiagnosticDef = {
	code: 'HCLI002',
	description: "The file exists but hoist can't open it.",
	message: "cannot read file '{path}': {reason}",
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const HCLI003: DiagnosticDef = {
	code: 'HCLI003',
	description: "hoist couldn't save the output file.",
	message: "cannot write file '{path}': {reason}",
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const HCLI004: DiagnosticDef = {
	code: 'HCLI004',
	description: 'Directory mirroring only works for sources inside the root directory.',
	message: "target '{path}' is not a member of the root directory '{root}'",
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the file under the root directory, or drop `--root-dir`.',
}

export const HCLI005: DiagnosticDef = {
	code: 'HCLI005',
	description: 'One of the targets could not be processed.',
	message: "failed to process target: '{path}'",
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
}

export const HCLI006: DiagnosticDef = {
	code: 'HCLI006',
	description: 'Something unexpected went wrong while processing.',
	message: 'processing failed: {reason}',
	phase: 'cli',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	HCLI001,
	HCLI002,
	HCLI003,
	HCLI004,
	HCLI005,
	HCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
