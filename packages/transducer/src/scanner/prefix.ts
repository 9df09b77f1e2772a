import type { DiagnosticArgs } from '@hoist/diagnostics'
import { LBRACKET, LF, LPAREN, RBRACKET, RPAREN } from './chars.ts'
import { throwScanError } from './errors.ts'
import { PREFIX_LIMIT, position, type ScannerState, trace } from './state.ts'
import type { HeaderPrefix, StepResult } from './types.ts'

export type HeaderPrefixResult =
	| { kind: 'prefix'; prefix: HeaderPrefix }
	| { kind: 'error'; code: 'HSYN006' | 'HSYN007'; detail: string }

/**
 * Splits header prefix content into the prefix text and its attribute list.
 *
 * `API:hot,cold:` gives the text `API` and the attributes `hot`, `cold`.
 * The list runs from the first ':' to the last one; a list that never closes,
 * or text after the closing ':', is an error.
 */
export function parseHeaderPrefix(content: string): HeaderPrefixResult {
	const open = content.indexOf(':')
	if (open === -1) {
		return { kind: 'prefix', prefix: { attributes: [], text: content } }
	}

	const close = content.lastIndexOf(':')
	if (close === open) {
		return { code: 'HSYN006', detail: content, kind: 'error' }
	}

	const trailing = content.slice(close + 1)
	if (trailing.trim().length > 0) {
		return { code: 'HSYN007', detail: trailing, kind: 'error' }
	}

	const attributes = content
		.slice(open + 1, close)
		.split(',')
		.map((name) => name.trim())
		.filter((name) => name.length > 0)
	return { kind: 'prefix', prefix: { attributes, text: content.slice(0, open) } }
}

/**
 * Starts a prefix group on '[' or '('. The first group after a token is the
 * header prefix, the second the source prefix.
 */
export function openPrefixGroup(scanner: ScannerState, byte: number): StepResult {
	if (scanner.groups === 2) {
		throwScanError(scanner.options.filename, position(scanner), 'HSYN005')
	}
	scanner.groups++
	scanner.group = { closer: byte === LBRACKET ? RBRACKET : RPAREN, depth: 0 }
	scanner.prefixBuffer.clear()
	return { emit: '', next: scanner.groups === 1 ? 'header-prefix' : 'source-prefix' }
}

/**
 * Reads prefix group content. '[...]' does not nest; '(...)' tracks nested
 * parentheses and copies brackets verbatim.
 */
export function scanPrefix(scanner: ScannerState, byte: number): StepResult {
	const { filename } = scanner.options
	const group = scanner.group

	if (byte === LF) {
		throwScanError(filename, position(scanner), 'HSYN002', { closer: String.fromCharCode(group.closer) })
	}

	if (byte === group.closer && group.depth === 0) {
		closePrefixGroup(scanner)
		return { emit: '', next: 'unknown' }
	}

	if (group.closer === RBRACKET && byte === LBRACKET) {
		throwScanError(filename, position(scanner), 'HSYN004')
	}

	if (group.closer === RPAREN) {
		if (byte === LPAREN) group.depth++
		else if (byte === RPAREN) group.depth--
	}

	if (!scanner.prefixBuffer.push(byte)) {
		throwScanError(filename, position(scanner), 'HSYN003', { max: PREFIX_LIMIT })
	}
	return { emit: '', next: scanner.state }
}

/**
 * Stores the content of the group just closed. Attribute lists only matter
 * for headers; stripping keeps the header prefix as written.
 */
function closePrefixGroup(scanner: ScannerState): void {
	const content = scanner.prefixBuffer.toString()
	if (scanner.state === 'source-prefix') {
		scanner.sourcePrefix = content
		return
	}
	if (scanner.options.mode === 'strip') {
		scanner.headerPrefix = { attributes: [], text: content }
		return
	}

	const result = parseHeaderPrefix(content)
	if (result.kind === 'error') {
		const args: DiagnosticArgs = result.code === 'HSYN006' ? { prefix: result.detail } : { text: result.detail }
		throwScanError(scanner.options.filename, position(scanner), result.code, args)
	}
	scanner.headerPrefix = result.prefix
}

/**
 * Makes the prefixes given on a token line the session-wide defaults.
 * A group that was not written leaves its default unchanged.
 */
export function commitPrefixes(scanner: ScannerState): void {
	if (scanner.headerPrefix !== null) scanner.globalHeaderPrefix = scanner.headerPrefix
	if (scanner.sourcePrefix !== null) scanner.globalSourcePrefix = scanner.sourcePrefix
	const header = scanner.globalHeaderPrefix
	const attributes = header.attributes.length > 0 ? ` (${header.attributes.join(', ')})` : ''
	trace(
		scanner,
		`prefixes set at line ${scanner.line}: header "${header.text}"${attributes}, source "${scanner.globalSourcePrefix}"`
	)
}
