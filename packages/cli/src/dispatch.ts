import type { Dirent } from 'node:fs'
import { readdir } from 'node:fs/promises'
import { basename, dirname, extname, isAbsolute, join, relative, sep } from 'node:path'
import { resolveScanOptions, type ScanMode, throwConfigError } from '@hoist/transducer'
import { formatOutsideRootError, formatReadError, IoError, TargetError } from './utils.ts'

/**
 * Where output goes:
 * - 'pipe': every source merged to standard output
 * - 'single': every source merged into one file
 * - 'directory': one file per source inside `headerDir`, mirroring the tree
 *   under `rootDir` when one is given
 * - 'beside': one file per source, next to it
 */
export type OutputSelection =
	| { kind: 'pipe' }
	| { kind: 'single'; path: string }
	| { kind: 'directory'; headerDir: string; rootDir: string | null }
	| { kind: 'beside' }

/**
 * Command-line flags as parsed, before validation.
 */
export interface DispatchFlags {
	token: string
	tabIndent: number
	headerDir?: string
	rootDir?: string
	rootDirRecursive?: string
	singleOutput?: string
	stdout: boolean
	timestampMode: boolean
	includeGuard: boolean
	keepGoing: boolean
}

export interface DispatchOptions {
	readonly mode: ScanMode
	readonly output: OutputSelection
	readonly token: string
	readonly tabSize: number
	/** Sources named on the command line */
	readonly files: readonly string[]
	/** Root to search for sources instead of `files` */
	readonly discoverRoot: string | null
	readonly timestamp: boolean
	readonly includeGuard: boolean
	readonly keepGoing: boolean
}

/**
 * Picks the output selection from the flags. Pipe, single-file and
 * directory output exclude each other.
 */
export function selectOutput(flags: DispatchFlags): OutputSelection {
	if (flags.rootDir !== undefined && flags.rootDirRecursive !== undefined) {
		throwConfigError('HCFG003', { first: '--root-dir', second: '--root-dir-recursive' })
	}

	const requested: string[] = []
	if (flags.stdout) requested.push('--stdout')
	if (flags.singleOutput !== undefined) requested.push('--single-output')
	const rootDir = flags.rootDir ?? flags.rootDirRecursive ?? null
	if (flags.headerDir !== undefined || rootDir !== null) requested.push('directory')

	const [first, second] = requested
	if (first !== undefined && second !== undefined) {
		throwConfigError('HCFG003', { first, second })
	}

	if (flags.stdout) return { kind: 'pipe' }
	if (flags.singleOutput !== undefined) return { kind: 'single', path: flags.singleOutput }
	if (flags.headerDir === undefined) {
		if (rootDir !== null) throwConfigError('HCFG004')
		return { kind: 'beside' }
	}
	return { headerDir: flags.headerDir, kind: 'directory', rootDir }
}

/**
 * Checks the flags as a whole and turns them into dispatch options.
 * Throws ConfigError before any file is touched.
 */
export function validateDispatchOptions(
	mode: ScanMode,
	files: readonly string[],
	flags: DispatchFlags
): DispatchOptions {
	const { tabSize, token } = resolveScanOptions({ tabSize: flags.tabIndent, token: flags.token })
	const output = selectOutput(flags)
	const discoverRoot = flags.rootDirRecursive ?? null
	if (discoverRoot === null && files.length === 0) throwConfigError('HCFG005')

	return {
		discoverRoot,
		files,
		includeGuard: flags.includeGuard,
		keepGoing: flags.keepGoing,
		mode,
		output,
		tabSize,
		timestamp: flags.timestampMode,
		token,
	}
}

/**
 * Name of the file produced for a source: `<name>.h` for headers;
 * stripped sources keep their extension and, when written next to the
 * source, gain a `.stripped` suffix.
 */
export function outputName(source: string, mode: ScanMode, beside: boolean): string {
	const extension = extname(source)
	const name = basename(source, extension)
	if (mode === 'extract') return `${name}.h`
	return beside ? `${name}.stripped${extension}` : `${name}${extension}`
}

/**
 * Path of the file produced for a source in per-file output.
 * Throws TargetError when mirroring and the source lies outside the root.
 */
export function resolveDestination(
	source: string,
	mode: ScanMode,
	output: Extract<OutputSelection, { kind: 'directory' | 'beside' }>
): string {
	if (output.kind === 'beside') {
		return join(dirname(source), outputName(source, mode, true))
	}

	const name = outputName(source, mode, false)
	if (output.rootDir === null) return join(output.headerDir, name)

	const path = relative(output.rootDir, source)
	if (path === '..' || path.startsWith(`..${sep}`) || isAbsolute(path)) {
		throw new TargetError(formatOutsideRootError(source, output.rootDir), source)
	}
	return join(output.headerDir, dirname(path), name)
}

/**
 * Include guard macro for a header file: `api.h` gives `API_H`.
 */
export function guardName(path: string): string {
	return basename(path)
		.toUpperCase()
		.replace(/[^A-Z0-9]/g, '_')
}

async function readDirectory(dir: string): Promise<Dirent[]> {
	try {
		return await readdir(dir, { withFileTypes: true })
	} catch (error: unknown) {
		throw new IoError(formatReadError(dir, error))
	}
}

/**
 * Every `.c` file below `root`, sorted. Hidden directories are skipped.
 */
export async function findSources(root: string): Promise<string[]> {
	const found: string[] = []
	for (const entry of await readDirectory(root)) {
		const path = join(root, entry.name)
		if (entry.isDirectory()) {
			if (!entry.name.startsWith('.')) found.push(...(await findSources(path)))
		} else if (entry.isFile() && extname(entry.name) === '.c') {
			found.push(path)
		}
	}
	return found.sort()
}
