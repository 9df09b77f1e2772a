import { ByteBuffer } from './buffer.ts'
import { throwConfigError } from './errors.ts'
import type {
	HeaderPrefix,
	ParseState,
	Position,
	ResolvedScanOptions,
	ScanOptions,
} from './types.ts'

/** Maximum bytes between the delimiters of a prefix group. */
export const PREFIX_LIMIT = 126

/** Maximum bytes of a member declaration, terminator included. */
export const MEMBER_LIMIT = 512

export const DEFAULT_TOKEN = '@'
export const DEFAULT_TAB_SIZE = 4
export const DEFAULT_FILENAME = '<stdin>'

export const EMPTY_PREFIX: HeaderPrefix = { attributes: [], text: '' }

/**
 * The prefix group currently being read.
 */
export interface PrefixGroup {
	/** Byte that closes the group: ']' or ')' */
	closer: number
	/** Open parentheses inside a '(' group */
	depth: number
}

/**
 * State tracked while scanning one input. Nothing here outlives the input.
 */
export interface ScannerState {
	readonly options: ResolvedScanOptions
	readonly token: Uint8Array
	state: ParseState
	line: number
	column: number
	atLineStart: boolean
	/** Token bytes matched so far in 'scanning' */
	matched: number
	/** Prefix groups read since the last token */
	groups: number
	/** The token's line ended before the annotation started */
	tokenLineEnded: boolean
	group: PrefixGroup
	headerPrefix: HeaderPrefix | null
	sourcePrefix: string | null
	globalHeaderPrefix: HeaderPrefix
	globalSourcePrefix: string
	prefixBuffer: ByteBuffer
	memberBuffer: ByteBuffer
	memberLine: number
	blockBuffer: ByteBuffer
	blockDepth: number
	/** True until the first byte of block content that is kept */
	blockLeading: boolean
	blockLine: number
	blockNewlines: number
}

/**
 * Validates options and fills in defaults.
 * Throws ConfigError for an empty token or a tab size that is not a
 * non-negative integer.
 */
export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
	const {
		filename = DEFAULT_FILENAME,
		mode = 'extract',
		tabSize = DEFAULT_TAB_SIZE,
		token = DEFAULT_TOKEN,
		trace,
	} = options
	if (token.length === 0) throwConfigError('HCFG001')
	if (!Number.isInteger(tabSize) || tabSize < 0) throwConfigError('HCFG002', { value: tabSize })
	return { filename, mode, tabSize, token, trace: trace ?? null }
}

/**
 * Creates initial scanner state for the given options.
 */
export function createScannerState(options: ScanOptions = {}): ScannerState {
	const resolved = resolveScanOptions(options)
	return {
		atLineStart: true,
		blockBuffer: new ByteBuffer(),
		blockDepth: 0,
		blockLeading: true,
		blockLine: 0,
		blockNewlines: 0,
		column: 1,
		globalHeaderPrefix: EMPTY_PREFIX,
		globalSourcePrefix: '',
		group: { closer: 0, depth: 0 },
		groups: 0,
		headerPrefix: null,
		line: 1,
		matched: 0,
		memberBuffer: new ByteBuffer(MEMBER_LIMIT),
		memberLine: 0,
		options: resolved,
		prefixBuffer: new ByteBuffer(PREFIX_LIMIT),
		sourcePrefix: null,
		state: 'scanning',
		token: Buffer.from(resolved.token, 'latin1'),
		tokenLineEnded: false,
	}
}

/**
 * Drops the per-token prefixes once an annotation is complete.
 */
export function endAnnotation(scanner: ScannerState): void {
	scanner.groups = 0
	scanner.tokenLineEnded = false
	scanner.headerPrefix = null
	scanner.sourcePrefix = null
}

/**
 * Header prefix in effect for the current token.
 */
export function effectiveHeaderPrefix(scanner: ScannerState): HeaderPrefix {
	return scanner.headerPrefix ?? scanner.globalHeaderPrefix
}

/**
 * Source prefix in effect for the current token.
 */
export function effectiveSourcePrefix(scanner: ScannerState): string {
	return scanner.sourcePrefix ?? scanner.globalSourcePrefix
}

/**
 * Passes a message to the trace sink, tagged with the input name.
 */
export function trace(scanner: ScannerState, message: string): void {
	scanner.options.trace?.(`${scanner.options.filename}: ${message}`)
}

/**
 * Returns text when stripping, nothing when extracting.
 */
export function echo(scanner: ScannerState, text: string): string {
	return scanner.options.mode === 'strip' ? text : ''
}

/**
 * Position of the byte being consumed.
 */
export function position(scanner: ScannerState): Position {
	return { column: scanner.column, line: scanner.line }
}
