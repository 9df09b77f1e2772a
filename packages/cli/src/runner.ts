import { once } from 'node:events'
import { createReadStream, createWriteStream, type ReadStream, type WriteStream } from 'node:fs'
import { mkdir, rm, stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { ConfigError, ScanError, type ScanOptions, transduce, writeText } from '@hoist/transducer'
import {
	type DispatchOptions,
	findSources,
	guardName,
	type OutputSelection,
	resolveDestination,
} from './dispatch.ts'
import {
	formatProcessError,
	formatReadError,
	formatWriteError,
	IoError,
	isNodeError,
	isTargetFailure,
} from './utils.ts'

/**
 * Hooks into a run: where merged output goes in pipe mode, a trace sink and
 * the clock used for timestamps.
 */
export interface RunContext {
	stdout?: Writable
	trace?: (message: string) => void
	now?: () => Date
}

export type TargetResult =
	| { status: 'written'; source: string; destination: string }
	| { status: 'skipped'; source: string; destination: string }
	| { status: 'failed'; source: string; message: string }

type SeparateOutput = Extract<OutputSelection, { kind: 'directory' | 'beside' }>

function trace(context: RunContext, message: string): void {
	context.trace?.(message)
}

function currentTime(context: RunContext): Date {
	return context.now?.() ?? new Date()
}

function scanOptions(options: DispatchOptions, source: string, context: RunContext): ScanOptions {
	return {
		filename: source,
		mode: options.mode,
		tabSize: options.tabSize,
		token: options.token,
		trace: context.trace,
	}
}

/**
 * Comment line naming the source a file was generated from, and when.
 */
export function stampLine(source: string, time: Date): string {
	return `/* generated by hoist from ${source} at ${time.toISOString()} */\n`
}

async function openSource(path: string): Promise<ReadStream> {
	const input = createReadStream(path)
	try {
		await once(input, 'open')
		return input
	} catch (error: unknown) {
		throw new IoError(formatReadError(path, error))
	}
}

async function openDestination(path: string, context: RunContext): Promise<WriteStream> {
	try {
		await mkdir(dirname(path), { recursive: true })
		const output = createWriteStream(path)
		await once(output, 'open')
		output.on('error', (error) => trace(context, `write to ${path} failed: ${error.message}`))
		return output
	} catch (error: unknown) {
		throw new IoError(formatWriteError(path, error))
	}
}

async function closeDestination(output: WriteStream, path: string): Promise<void> {
	output.end()
	try {
		await finished(output)
	} catch (error: unknown) {
		throw new IoError(formatWriteError(path, error))
	}
}

/**
 * Removes a partly written output file.
 */
async function discardDestination(output: WriteStream, path: string): Promise<void> {
	output.destroy()
	await rm(path, { force: true })
}

async function modifiedAt(path: string): Promise<number | null> {
	try {
		return (await stat(path)).mtimeMs
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === 'ENOENT') return null
		throw new IoError(formatReadError(path, error))
	}
}

/**
 * True when `destination` exists and is newer than every source.
 */
export async function isUpToDate(sources: readonly string[], destination: string): Promise<boolean> {
	const built = await modifiedAt(destination)
	if (built === null) return false
	for (const source of sources) {
		const changed = await modifiedAt(source)
		if (changed === null || changed >= built) return false
	}
	return true
}

/**
 * Transduces one source into an open output. Read and write failures of the
 * underlying streams are reported as IoError. Leaving the read loop early
 * aborts the input, so its `errored` only counts when it is the error thrown.
 */
async function transduceSource(
	source: string,
	output: Writable,
	destination: string,
	options: DispatchOptions,
	context: RunContext
): Promise<void> {
	const input = await openSource(source)
	try {
		await transduce(input, output, scanOptions(options, source, context))
	} catch (error: unknown) {
		input.destroy()
		if (error instanceof ScanError || error instanceof ConfigError) throw error
		if (output.errored !== null) throw new IoError(formatWriteError(destination, output.errored))
		if (error === input.errored) throw new IoError(formatReadError(source, error))
		throw error
	}
}

/**
 * Writes every source, in order, to one output. Stops at the first source
 * that fails; the output is left open.
 */
export async function runMerge(
	sources: readonly string[],
	output: Writable,
	destination: string,
	options: DispatchOptions,
	context: RunContext = {},
	stamp = false
): Promise<TargetResult[]> {
	const results: TargetResult[] = []
	for (const source of sources) {
		try {
			if (stamp) await writeText(output, stampLine(source, currentTime(context)))
			await transduceSource(source, output, destination, options, context)
			trace(context, `merged ${source} into ${destination}`)
			results.push({ destination, source, status: 'written' })
		} catch (error: unknown) {
			results.push({ message: formatProcessError(error), source, status: 'failed' })
			break
		}
	}
	return results
}

/**
 * Merges every source into one file. A failed source ends the sequence; the
 * output of the sources before it is kept.
 */
export async function runSingle(
	sources: readonly string[],
	path: string,
	options: DispatchOptions,
	context: RunContext = {}
): Promise<TargetResult[]> {
	if (options.timestamp && (await isUpToDate(sources, path))) {
		trace(context, `${path} is up to date`)
		return sources.map((source): TargetResult => ({ destination: path, source, status: 'skipped' }))
	}

	const output = await openDestination(path, context)
	const results = await runMerge(sources, output, path, options, context, options.timestamp)
	await closeDestination(output, path)
	return results
}

async function writeTarget(
	source: string,
	destination: string,
	options: DispatchOptions,
	context: RunContext
): Promise<void> {
	const guard = options.includeGuard && options.mode === 'extract' ? guardName(destination) : null
	const output = await openDestination(destination, context)
	try {
		if (guard !== null) await writeText(output, `#ifndef ${guard}\n#define ${guard}\n`)
		if (options.timestamp) {
			await writeText(output, stampLine(source, currentTime(context)))
		}
		await transduceSource(source, output, destination, options, context)
		if (guard !== null) await writeText(output, '#endif\n')
	} catch (error: unknown) {
		await discardDestination(output, destination)
		throw error
	}
	await closeDestination(output, destination)
}

/**
 * Writes one output file per source. Stops at the first failure unless
 * `keepGoing` is set; I/O failures always stop the run.
 */
export async function runSeparate(
	sources: readonly string[],
	output: SeparateOutput,
	options: DispatchOptions,
	context: RunContext = {}
): Promise<TargetResult[]> {
	const results: TargetResult[] = []
	for (const source of sources) {
		try {
			const destination = resolveDestination(source, options.mode, output)
			if (options.timestamp && (await isUpToDate([source], destination))) {
				trace(context, `${destination} is up to date`)
				results.push({ destination, source, status: 'skipped' })
				continue
			}
			await writeTarget(source, destination, options, context)
			trace(context, `wrote ${destination}`)
			results.push({ destination, source, status: 'written' })
		} catch (error: unknown) {
			results.push({ message: formatProcessError(error), source, status: 'failed' })
			if (!options.keepGoing || !isTargetFailure(error)) break
		}
	}
	return results
}

/**
 * Runs a validated command: gathers the sources, then merges or writes them
 * according to the output selection.
 */
export async function dispatch(
	options: DispatchOptions,
	context: RunContext = {}
): Promise<TargetResult[]> {
	const sources =
		options.discoverRoot === null ? options.files : await findSources(options.discoverRoot)
	const { output } = options
	switch (output.kind) {
		case 'pipe':
			return runMerge(sources, context.stdout ?? process.stdout, '<stdout>', options, context)
		case 'single':
			return runSingle(sources, output.path, options, context)
		default:
			return runSeparate(sources, output, options, context)
	}
}
