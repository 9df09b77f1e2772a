/**
 * Syntax diagnostics raised while scanning annotated sources.
 *
 * Error code format: HSYN<NUMBER> (001-099). Every syntax error aborts
 * processing of the file it was found in.
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const HSYN001: DiagnosticDef = {
	code: 'HSYN001',
	description: 'A token must be followed by a block, a prefix group or the start of a declaration.',
	message: "expected '{', '[', '(' or start of member after '{token}' token, found '{found}'",
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the stray terminator or write the declaration after the token.',
}

export const HSYN002: DiagnosticDef = {
	code: 'HSYN002',
	description: 'Prefix groups have to open and close on the same line as their token.',
	message: 'unexpected newline while parsing prefix',
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: "Close the group with '{closer}' before the end of the line.",
}

export const HSYN003: DiagnosticDef = {
	code: 'HSYN003',
	description: 'Prefix groups hold at most {max} characters.',
	message: 'prefix content too large [max: {max} characters]',
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Shorten the prefix, or move the text into a macro and use the macro name.',
}

export const HSYN004: DiagnosticDef = {
	code: 'HSYN004',
	description: "Square-bracket prefixes don't nest.",
	message: "unexpected '[' while parsing prefix",
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use the parenthesized form, which allows nested brackets: @(...)',
}

export const HSYN005: DiagnosticDef = {
	code: 'HSYN005',
	description: 'A token takes a header prefix and a source prefix, nothing more.',
	message: 'too many prefix groups after token',
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Merge the extra group into the header or source prefix.',
}

export const HSYN006: DiagnosticDef = {
	code: 'HSYN006',
	description: "An attribute list in a header prefix opens and closes with ':'.",
	message: "unterminated attribute list in header prefix '{prefix}'",
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: "Close the list with a trailing ':', as in 'name:attr1,attr2:'.",
}

export const HSYN007: DiagnosticDef = {
	code: 'HSYN007',
	description: "Nothing may follow the ':' that closes an attribute list.",
	message: "unexpected text '{text}' after attribute list",
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: "Move the text before the first ':' or into the attribute list.",
}

export const HSYN008: DiagnosticDef = {
	code: 'HSYN008',
	description: 'Declarations exposed to the header hold at most {max} characters.',
	message: 'member declaration too large [max: {max} characters]',
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: "Check for a missing ';', '{' or '=' that should end the declaration.",
}

export const HSYN009: DiagnosticDef = {
	code: 'HSYN009',
	description: 'The file ended before an annotation was complete.',
	message: 'unexpected end of input while parsing {what}',
	phase: 'syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the {what} before the end of the file.',
}

export const SYNTAX_DIAGNOSTICS = {
	HSYN001,
	HSYN002,
	HSYN003,
	HSYN004,
	HSYN005,
	HSYN006,
	HSYN007,
	HSYN008,
	HSYN009,
} as const

export type SyntaxDiagnosticCode = keyof typeof SYNTAX_DIAGNOSTICS
