export { openBlock, scanBlock } from './block.ts'
export { ByteBuffer, INITIAL_CAPACITY } from './buffer.ts'
export { escapePath, formatAttribute, formatLineDirective } from './directive.ts'
export {
	ConfigError,
	formatScanMessage,
	ScanError,
	throwConfigError,
	throwScanError,
} from './errors.ts'
export {
	commonIndent,
	formatBlock,
	layoutBlock,
	measureIndent,
	splitBlockLines,
	stripIndent,
} from './indent.ts'
export { buildMemberLine, scanMember, startMember } from './member.ts'
export {
	commitPrefixes,
	type HeaderPrefixResult,
	openPrefixGroup,
	parseHeaderPrefix,
	scanPrefix,
} from './prefix.ts'
export { Scanner } from './scanner.ts'
export {
	createScannerState,
	DEFAULT_FILENAME,
	DEFAULT_TAB_SIZE,
	DEFAULT_TOKEN,
	MEMBER_LIMIT,
	PREFIX_LIMIT,
	type PrefixGroup,
	resolveScanOptions,
	type ScannerState,
} from './state.ts'
export { finish, type StateHandler, step } from './step.ts'
export { releasePartialToken, scanToken } from './token.ts'
export type {
	HeaderPrefix,
	ParseState,
	Position,
	ResolvedScanOptions,
	ScanMode,
	ScanOptions,
	StepResult,
} from './types.ts'
