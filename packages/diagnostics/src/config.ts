/**
 * Configuration diagnostics. All of them are checked before any file is opened.
 *
 * Error code format: HCFG<NUMBER> (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const HCFG001: DiagnosticDef = {
	code: 'HCFG001',
	description: 'The annotation token marks where hoist starts reading, so it needs at least one character.',
	message: 'token must not be empty',
	phase: 'config',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a token with `--token`, or leave it out to use "@".',
}

export const HCFG002: DiagnosticDef = {
	code: 'HCFG002',
	description: 'The tab indent size is the number of columns a tab occupies in a header block.',
	message: 'invalid tab indent size "{value}"',
	phase: 'config',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a whole number of 0 or more; 0 copies blocks verbatim.',
}

export const HCFG003: DiagnosticDef = {
	code: 'HCFG003',
	description: 'Output goes to one place per run: stdout, a single file, or a directory.',
	message: 'the {first} and {second} output modes cannot be used together',
	phase: 'config',
	severity: DiagnosticSeverity.Error,
	suggestion:
		'Pick one of `--stdout`, `--single-output`, or the directory flags (`--header-dir`, `--root-dir`, `--root-dir-recursive`).',
}

export const HCFG004: DiagnosticDef = {
	code: 'HCFG004',
	description: 'Mirroring a source tree needs somewhere to mirror it to.',
	message: 'a header directory must be given with the root source directory',
	phase: 'config',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `--header-dir <path>`.',
}

export const HCFG005: DiagnosticDef = {
	code: 'HCFG005',
	description: 'There is nothing to process.',
	message: 'no source files provided',
	phase: 'config',
	severity: DiagnosticSeverity.Error,
	suggestion: 'List the source files, or use `--root-dir-recursive` to process a whole tree.',
}

export const CONFIG_DIAGNOSTICS = {
	HCFG001,
	HCFG002,
	HCFG003,
	HCFG004,
	HCFG005,
} as const

export type ConfigDiagnosticCode = keyof typeof CONFIG_DIAGNOSTICS
