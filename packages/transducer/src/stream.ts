import { once } from 'node:events'
import type { Readable, Writable } from 'node:stream'
import { Scanner } from './scanner/scanner.ts'
import type { ScanOptions } from './scanner/types.ts'

/**
 * Converts a stream chunk to bytes. Strings are taken as single-byte text.
 */
function chunkToBytes(chunk: unknown): Uint8Array {
	if (typeof chunk === 'string') return Buffer.from(chunk, 'latin1')
	if (chunk instanceof Uint8Array) return chunk
	throw new TypeError(`Unsupported chunk type: ${typeof chunk}`)
}

/**
 * Writes text to a stream, waiting for 'drain' when the stream asks for it.
 * Rethrows the error of a stream that has already failed.
 */
export async function writeText(output: Writable, text: string): Promise<void> {
	if (text.length === 0) return
	if (output.errored !== null) throw output.errored
	if (!output.write(Buffer.from(text, 'latin1'))) {
		await once(output, 'drain')
	}
}

/**
 * Reads `input` to its end and writes the extracted header (or the stripped
 * source) to `output`, chunk by chunk. The output stream is left open so
 * several inputs can share it.
 *
 * @throws ScanError when annotation syntax is malformed; output produced by
 *   earlier chunks has already been written
 * @throws ConfigError when the options are invalid
 */
export async function transduce(
	input: Readable,
	output: Writable,
	options: ScanOptions = {}
): Promise<void> {
	const scanner = new Scanner(options)
	for await (const chunk of input) {
		await writeText(output, scanner.write(chunkToBytes(chunk)))
	}
	await writeText(output, scanner.end())
}
