import assert from 'node:assert'
import { describe, it } from 'node:test'
import { finish } from '../../src/scanner/step.ts'
import { createScanner, feed } from './helpers.ts'

describe('block', () => {
	it('should anchor content on the line after the brace', () => {
		const scanner = createScanner()
		assert.strictEqual(
			feed(scanner, '@{\n  int a;\n    int b;\n}\n'),
			'#line 2 "api.c"\nint a;\n  int b;\n\n'
		)
	})

	it('should anchor content on the brace line when it starts there', () => {
		const scanner = createScanner()
		assert.strictEqual(feed(scanner, '@{ int x; }'), '#line 1 "api.c"\nint x; \n\n')
	})

	it('should copy lines verbatim with a tab size of 0', () => {
		const scanner = createScanner({ tabSize: 0 })
		assert.strictEqual(
			feed(scanner, '@{\n    int a;\n    int b;\n}\n'),
			'#line 2 "api.c"\n    int a;\n    int b;\n'
		)
	})

	it('should keep nested braces', () => {
		const scanner = createScanner()
		assert.strictEqual(
			feed(scanner, '@{\n  struct s { int a; };\n}'),
			'#line 2 "api.c"\nstruct s { int a; };\n\n'
		)
		assert.strictEqual(scanner.state, 'scanning')
	})

	it('should produce nothing for an empty block', () => {
		const scanner = createScanner()
		assert.strictEqual(feed(scanner, '@{}\n@{\n}\n'), '')
	})

	it('should start on a line after a pending token', () => {
		const scanner = createScanner()
		assert.strictEqual(feed(scanner, '@\n{\n  int a;\n}'), '#line 3 "api.c"\nint a;\n\n')
	})

	it('should replace the block with its newlines when stripping', () => {
		const scanner = createScanner({ mode: 'strip' })
		assert.strictEqual(feed(scanner, 'int x;\n@{\n  int a;\n}\nint y;\n'), 'int x;\n\n\n\nint y;\n')
	})

	it('should trace the block', () => {
		const messages: string[] = []
		const scanner = createScanner({ trace: (message) => messages.push(message) })
		feed(scanner, '@{ int x; }')
		assert.deepStrictEqual(messages, ['api.c: token at 1:1', 'api.c: block at line 1: 7 bytes'])
	})

	it('should fail at end of input inside a block', () => {
		const scanner = createScanner()
		feed(scanner, '@{ int a;')
		assert.throws(
			() => finish(scanner),
			{
				message: 'api.c:1:10 syntax error [HSYN009] unexpected end of input while parsing block',
				name: 'ScanError',
			}
		)
	})
})
