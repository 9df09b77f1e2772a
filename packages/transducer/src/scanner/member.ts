import { charOf, EQUALS, LBRACE, SEMICOLON } from './chars.ts'
import { formatAttribute, formatLineDirective } from './directive.ts'
import { throwScanError } from './errors.ts'
import {
	effectiveHeaderPrefix,
	effectiveSourcePrefix,
	MEMBER_LIMIT,
	position,
	type ScannerState,
	trace,
} from './state.ts'
import type { HeaderPrefix, StepResult } from './types.ts'

const TRAILING_WHITESPACE = /[ \t\r\n]+$/

function isTerminator(byte: number): boolean {
	return byte === SEMICOLON || byte === LBRACE || byte === EQUALS
}

/**
 * Builds the header line for a captured declaration. `raw` ends with its
 * terminator. For '{' and '=' the head is trimmed and closed with ';'.
 *
 * Attributes are not appended after the declaration as captured: they go
 * between the declarator and the ';', with whitespace before the ';'
 * trimmed, so `void f(void) ;` with `hot` becomes
 * `void f(void) __attribute__((__hot__));`.
 */
export function buildMemberLine(raw: string, prefix: HeaderPrefix): string {
	const terminator = raw.charAt(raw.length - 1)
	let head = raw.slice(0, -1)
	if (terminator !== ';') head = head.replace(TRAILING_WHITESPACE, '')

	let declaration = `${head};`
	if (prefix.attributes.length > 0) {
		const attributes = prefix.attributes.map(formatAttribute).join(' ')
		declaration = `${head.replace(TRAILING_WHITESPACE, '')} ${attributes};`
	}

	const lead = prefix.text.length > 0 ? `${prefix.text} ` : ''
	return `${lead}${declaration}\n`
}

/**
 * Handles the first byte of a declaration after a token.
 *
 * Extraction starts capturing. Stripping leaves the declaration in the echoed
 * source and only inserts the source prefix in front of it.
 */
export function startMember(scanner: ScannerState, byte: number): StepResult {
	if (scanner.options.mode === 'strip') {
		const prefix = effectiveSourcePrefix(scanner)
		const lead = prefix.length > 0 ? `${prefix} ` : ''
		return { emit: `${lead}${charOf(byte)}`, next: 'scanning' }
	}

	scanner.memberBuffer.clear()
	scanner.memberBuffer.push(byte)
	scanner.memberLine = scanner.line
	return { emit: '', next: 'member' }
}

/**
 * Captures a declaration up to ';', '{' or '='.
 */
export function scanMember(scanner: ScannerState, byte: number): StepResult {
	if (!scanner.memberBuffer.push(byte)) {
		throwScanError(scanner.options.filename, position(scanner), 'HSYN008', { max: MEMBER_LIMIT })
	}
	if (!isTerminator(byte)) return { emit: '', next: 'member' }

	const line = buildMemberLine(scanner.memberBuffer.toString(), effectiveHeaderPrefix(scanner))
	trace(scanner, `member at line ${scanner.memberLine}: ${line.trimEnd()}`)
	return {
		emit: formatLineDirective(scanner.memberLine, scanner.options.filename) + line,
		next: 'scanning',
	}
}
