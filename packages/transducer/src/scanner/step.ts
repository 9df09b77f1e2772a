import { LF } from './chars.ts'
import { scanAnnotation } from './annotation.ts'
import { scanBlock } from './block.ts'
import { throwScanError } from './errors.ts'
import { scanMember } from './member.ts'
import { scanPrefix } from './prefix.ts'
import { echo, endAnnotation, type ScannerState } from './state.ts'
import { releasePartialToken, scanToken } from './token.ts'
import type { ParseState, StepResult } from './types.ts'

export type StateHandler = (scanner: ScannerState, byte: number) => StepResult

const HANDLERS: Record<ParseState, StateHandler> = {
	block: scanBlock,
	'header-prefix': scanPrefix,
	member: scanMember,
	scanning: scanToken,
	'source-prefix': scanPrefix,
	unknown: scanAnnotation,
}

/**
 * What an annotation left open at end of input was in the middle of.
 */
const UNFINISHED: Partial<Record<ParseState, string>> = {
	block: 'block',
	'header-prefix': 'header prefix',
	member: 'member declaration',
	'source-prefix': 'source prefix',
}

/**
 * Consumes one byte and returns the text it produces.
 * Throws ScanError on malformed annotation syntax.
 */
export function step(scanner: ScannerState, byte: number): string {
	const handler = HANDLERS[scanner.state]
	const result = handler(scanner, byte)

	if (result.next === 'scanning' && scanner.state !== 'scanning') {
		endAnnotation(scanner)
	}
	scanner.state = result.next

	if (byte === LF) {
		scanner.line++
		scanner.column = 1
	} else {
		scanner.column++
	}
	scanner.atLineStart = byte === LF
	return result.emit
}

/**
 * Ends the input. Returns any held-back token bytes (strip mode) and throws
 * ScanError when an annotation is left unfinished.
 */
export function finish(scanner: ScannerState): string {
	const what = UNFINISHED[scanner.state]
	if (what !== undefined) {
		throwScanError(
			scanner.options.filename,
			{ column: scanner.column, line: scanner.line },
			'HSYN009',
			{ what }
		)
	}
	return echo(scanner, releasePartialToken(scanner))
}
