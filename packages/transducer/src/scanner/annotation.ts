import { charOf, EQUALS, isBlank, LBRACE, LBRACKET, LF, LPAREN, SEMICOLON } from './chars.ts'
import { openBlock } from './block.ts'
import { throwScanError } from './errors.ts'
import { startMember } from './member.ts'
import { commitPrefixes, openPrefixGroup } from './prefix.ts'
import { echo, position, type ScannerState } from './state.ts'
import type { StepResult } from './types.ts'

/**
 * Decides what a token introduces: a block, a prefix group, or a member.
 *
 * A newline right after prefix groups makes them the new defaults. A newline
 * with no groups keeps the token pending, so the annotated member or block
 * may start on a later line. Blanks are dropped on the token's line only;
 * stripping keeps the indentation of the lines after it.
 */
export function scanAnnotation(scanner: ScannerState, byte: number): StepResult {
	if (isBlank(byte)) {
		const emit = scanner.tokenLineEnded ? echo(scanner, charOf(byte)) : ''
		return { emit, next: 'unknown' }
	}

	switch (byte) {
		case LF:
			if (scanner.groups === 0) {
				scanner.tokenLineEnded = true
				return { emit: echo(scanner, '\n'), next: 'unknown' }
			}
			commitPrefixes(scanner)
			return { emit: echo(scanner, '\n'), next: 'scanning' }
		case LBRACE:
			return openBlock(scanner)
		case LBRACKET:
		case LPAREN:
			return openPrefixGroup(scanner, byte)
		case SEMICOLON:
		case EQUALS:
			return throwScanError(scanner.options.filename, position(scanner), 'HSYN001', {
				found: charOf(byte),
				token: scanner.options.token,
			})
		default:
			return startMember(scanner, byte)
	}
}
