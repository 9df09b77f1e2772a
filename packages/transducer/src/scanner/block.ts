import { isBlank, LBRACE, LF, RBRACE } from './chars.ts'
import { formatBlock } from './indent.ts'
import { type ScannerState, trace } from './state.ts'
import type { StepResult } from './types.ts'

/**
 * Starts a block on the '{' that follows a token.
 */
export function openBlock(scanner: ScannerState): StepResult {
	scanner.blockBuffer.clear()
	scanner.blockDepth = 0
	scanner.blockLeading = true
	scanner.blockLine = scanner.line
	scanner.blockNewlines = 0
	return { emit: '', next: 'block' }
}

/**
 * Captures block content up to the matching '}'. Whitespace directly after
 * the opening brace, up to and including the first newline, is dropped.
 */
export function scanBlock(scanner: ScannerState, byte: number): StepResult {
	if (byte === LF) scanner.blockNewlines++

	if (scanner.blockLeading) {
		if (isBlank(byte)) return { emit: '', next: 'block' }
		scanner.blockLeading = false
		if (byte === LF) {
			scanner.blockLine = scanner.line + 1
			return { emit: '', next: 'block' }
		}
	}

	if (byte === LBRACE) {
		scanner.blockDepth++
	} else if (byte === RBRACE) {
		if (scanner.blockDepth === 0) return { emit: closeBlock(scanner), next: 'scanning' }
		scanner.blockDepth--
	}

	if (scanner.options.mode === 'extract') scanner.blockBuffer.push(byte)
	return { emit: '', next: 'block' }
}

/**
 * Stripping replaces the block with the newlines it spanned, so line numbers
 * in the stripped source stay put.
 */
function closeBlock(scanner: ScannerState): string {
	const { filename, mode, tabSize } = scanner.options
	if (mode === 'strip') return '\n'.repeat(scanner.blockNewlines)

	const content = scanner.blockBuffer.toString()
	trace(scanner, `block at line ${scanner.blockLine}: ${content.length} bytes`)
	return formatBlock(content, tabSize, scanner.blockLine, filename)
}
