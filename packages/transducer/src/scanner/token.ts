import { charOf } from './chars.ts'
import { echo, type ScannerState, trace } from './state.ts'
import type { StepResult } from './types.ts'

/**
 * Looks for the token. Matching starts only at the first byte of a line and
 * may continue across chunk boundaries. Bytes held back by a partial match
 * are released (in strip mode) as soon as the match fails.
 */
export function scanToken(scanner: ScannerState, byte: number): StepResult {
	const canMatch = scanner.matched > 0 || scanner.atLineStart
	if (canMatch && byte === scanner.token[scanner.matched]) {
		scanner.matched++
		if (scanner.matched < scanner.token.length) {
			return { emit: '', next: 'scanning' }
		}
		scanner.matched = 0
		trace(scanner, `token at ${scanner.line}:${scanner.column - scanner.token.length + 1}`)
		return { emit: '', next: 'unknown' }
	}

	const withheld = releasePartialToken(scanner)
	return { emit: echo(scanner, withheld + charOf(byte)), next: 'scanning' }
}

/**
 * Abandons a partial token match, returning the bytes it held back.
 */
export function releasePartialToken(scanner: ScannerState): string {
	if (scanner.matched === 0) return ''
	const withheld = Buffer.from(scanner.token.subarray(0, scanner.matched)).toString('latin1')
	scanner.matched = 0
	return withheld
}
