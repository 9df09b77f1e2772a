import { formatLineDirective } from './directive.ts'
import { createScannerState, type ScannerState } from './state.ts'
import { finish, step } from './step.ts'
import type { ParseState, Position, ScanOptions } from './types.ts'

/**
 * Incremental scanner over one input. Feed it chunks in order with `write`,
 * then call `end` once. Output does not depend on where chunks are split.
 */
export class Scanner {
	private readonly scanner: ScannerState
	private started = false
	private ended = false

	constructor(options: ScanOptions = {}) {
		this.scanner = createScannerState(options)
	}

	get state(): ParseState {
		return this.scanner.state
	}

	get position(): Position {
		return { column: this.scanner.column, line: this.scanner.line }
	}

	/**
	 * Consumes a chunk and returns the text it produces.
	 * Throws ScanError on malformed annotation syntax.
	 */
	write(chunk: Uint8Array): string {
		if (this.ended) throw new Error('Scanner.write called after end')
		let output = this.preamble()
		for (const byte of chunk) {
			output += step(this.scanner, byte)
		}
		return output
	}

	/**
	 * Ends the input and returns the remaining text.
	 */
	end(): string {
		if (this.ended) throw new Error('Scanner.end called twice')
		const output = this.preamble() + finish(this.scanner)
		this.ended = true
		return output
	}

	/**
	 * Stripped output starts with a single directive; its lines map one to
	 * one onto the source after that.
	 */
	private preamble(): string {
		if (this.started) return ''
		this.started = true
		const { filename, mode } = this.scanner.options
		return mode === 'strip' ? formatLineDirective(1, filename) : ''
	}
}
