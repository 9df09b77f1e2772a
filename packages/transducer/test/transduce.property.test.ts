import { describe, it } from 'node:test'
import fc from 'fast-check'
import { ScanError, Scanner, type ScanOptions, transduceText } from '../src/index.ts'

type Outcome = { ok: true; text: string } | { ok: false; message: string }

function outcome(fn: () => string): Outcome {
	try {
		return { ok: true, text: fn() }
	} catch (error) {
		if (error instanceof ScanError) return { message: error.message, ok: false }
		throw error
	}
}

function sameOutcome(a: Outcome, b: Outcome): boolean {
	if (a.ok && b.ok) return a.text === b.text
	if (!a.ok && !b.ok) return a.message === b.message
	return false
}

function scanInChunks(source: string, cuts: readonly number[], options: ScanOptions): string {
	const bytes = Buffer.from(source, 'latin1')
	const points = [...new Set(cuts.map((cut) => cut % (bytes.length + 1)))].sort((a, b) => a - b)
	const scanner = new Scanner(options)
	let output = ''
	let start = 0
	for (const point of [...points, bytes.length]) {
		output += scanner.write(bytes.subarray(start, point))
		start = point
	}
	return output + scanner.end()
}

function countNewlines(text: string): number {
	return text.split('\n').length - 1
}

// Plain C-ish text with no token byte
const plainArb = fc.stringOf(fc.constantFrom('a', 'b', ' ', '\t', '\n', ';', '{', '}', '[', '(', ')', '='), {
	maxLength: 80,
})

// Text dense in annotation syntax, valid or not
const annotatedArb = fc.stringOf(
	fc.constantFrom('@', '@ ', '@[', '@(', 'x', ' ', '\n', ';', '=', '{', '}', '[', ']', '(', ')', ':', ','),
	{ maxLength: 60 }
)

const modeArb = fc.constantFrom<'extract' | 'strip'>('extract', 'strip')

describe('transduce property tests', () => {
	it('extracts nothing from text without tokens', () => {
		fc.assert(
			fc.property(plainArb, (source) => transduceText(source, { filename: 'api.c' }) === '')
		)
	})

	it('strips text without tokens to itself behind one directive', () => {
		fc.assert(
			fc.property(
				plainArb,
				(source) =>
					transduceText(source, { filename: 'api.c', mode: 'strip' }) === `#line 1 "api.c"\n${source}`
			)
		)
	})

	it('gives the same result however the input is split', () => {
		fc.assert(
			fc.property(
				annotatedArb,
				fc.array(fc.nat(), { maxLength: 6 }),
				modeArb,
				(source, cuts, mode) => {
					const options = { filename: 'api.c', mode }
					const whole = outcome(() => transduceText(source, options))
					const split = outcome(() => scanInChunks(source, cuts, options))
					return sameOutcome(whole, split)
				}
			)
		)
	})

	it('keeps every source line when stripping', () => {
		fc.assert(
			fc.property(annotatedArb, (source) => {
				const result = outcome(() => transduceText(source, { filename: 'api.c', mode: 'strip' }))
				return !result.ok || countNewlines(result.text) === countNewlines(source) + 1
			})
		)
	})

	it('starts every extracted entry with a directive', () => {
		fc.assert(
			fc.property(annotatedArb, (source) => {
				const result = outcome(() => transduceText(source, { filename: 'api.c' }))
				return !result.ok || result.text === '' || result.text.startsWith('#line ')
			})
		)
	})
})
