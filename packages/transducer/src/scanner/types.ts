/**
 * Output behaviour of a scan.
 * - 'extract': emit header content only (prefixes, members, blocks), each
 *   preceded by a `#line` directive
 * - 'strip': echo the source with annotation syntax removed
 */
export type ScanMode = 'extract' | 'strip'

/**
 * Parser states. 'scanning' looks for the token at line starts; every other
 * state is entered after a token match and falls back to 'scanning' when the
 * annotation is complete.
 */
export type ParseState =
	| 'scanning'
	| 'unknown'
	| 'header-prefix'
	| 'source-prefix'
	| 'block'
	| 'member'

/**
 * Options for a scan. All fields are optional; see `resolveScanOptions`.
 */
export interface ScanOptions {
	/** Name of the input, used in diagnostics and `#line` directives */
	filename?: string
	/** Annotation token, matched at the start of a line */
	token?: string
	/** Columns per tab when dedenting blocks; 0 copies blocks verbatim */
	tabSize?: number
	mode?: ScanMode
	/** Receives verbose trace messages */
	trace?: (message: string) => void
}

export interface ResolvedScanOptions {
	readonly filename: string
	readonly token: string
	readonly tabSize: number
	readonly mode: ScanMode
	readonly trace: ((message: string) => void) | null
}

/**
 * A 1-indexed position in the source.
 */
export interface Position {
	line: number
	column: number
}

/**
 * A parsed header prefix: the text written before a declaration, and the
 * attribute names attached to it.
 */
export interface HeaderPrefix {
	readonly text: string
	readonly attributes: readonly string[]
}

/**
 * What a state handler did with one byte.
 */
export interface StepResult {
	next: ParseState
	emit: string
}
