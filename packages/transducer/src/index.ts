/**
 * hoist transducer public API
 *
 * Scans C sources for an annotation token and either extracts the header
 * content it marks or strips the annotations:
 * - `transduce` drives a scan from a Readable into a Writable
 * - `transduceText` runs a scan over an in-memory string
 * - `Scanner` exposes the incremental, chunk-by-chunk form
 */

import { Scanner } from './scanner/scanner.ts'
import type { ScanOptions } from './scanner/types.ts'

export * from './scanner/index.ts'
export { transduce, writeText } from './stream.ts'

/**
 * Scans a whole source held in memory and returns the output text.
 * The source is taken as single-byte text.
 */
export function transduceText(source: string, options: ScanOptions = {}): string {
	const scanner = new Scanner(options)
	return scanner.write(Buffer.from(source, 'latin1')) + scanner.end()
}
