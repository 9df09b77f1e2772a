import assert from 'node:assert'
import { describe, it } from 'node:test'
import { escapePath, formatAttribute, formatLineDirective } from '../../src/scanner/directive.ts'

describe('directive', () => {
	describe('formatLineDirective', () => {
		it('should produce a compiler line marker', () => {
			assert.strictEqual(formatLineDirective(42, 'src/api.c'), '#line 42 "src/api.c"\n')
		})

		it('should escape quotes and backslashes in the path', () => {
			assert.strictEqual(formatLineDirective(1, 'C:\\src\\"q".c'), '#line 1 "C:\\\\src\\\\\\"q\\".c"\n')
		})
	})

	describe('escapePath', () => {
		it('should leave plain paths alone', () => {
			assert.strictEqual(escapePath('lib/util.c'), 'lib/util.c')
		})
	})

	describe('formatAttribute', () => {
		it('should wrap the name in a GNU attribute', () => {
			assert.strictEqual(formatAttribute('hot'), '__attribute__((__hot__))')
		})
	})
})
