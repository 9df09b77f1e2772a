import { createScannerState, type ScannerState } from '../../src/scanner/state.ts'
import { step } from '../../src/scanner/step.ts'
import type { ScanOptions } from '../../src/scanner/types.ts'

export function createScanner(options: ScanOptions = {}): ScannerState {
	return createScannerState({ filename: 'api.c', ...options })
}

/**
 * Steps through every byte of `text`, returning the concatenated output.
 */
export function feed(scanner: ScannerState, text: string): string {
	let output = ''
	for (const byte of Buffer.from(text, 'latin1')) {
		output += step(scanner, byte)
	}
	return output
}
