import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ConfigError, ScanError } from '@hoist/transducer'
import {
	formatOutsideRootError,
	formatProcessError,
	formatReadError,
	formatTargetError,
	formatWriteError,
	getErrorMessage,
	IoError,
	isNodeError,
	isTargetFailure,
	TargetError,
} from '../src/utils.ts'

function systemError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(systemError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		const error = new Error('test')
		assert.strictEqual(isNodeError(error), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		const error = new Error('test message')
		assert.strictEqual(getErrorMessage(error), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const result = formatReadError('/path/to/api.c', systemError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[HCLI001] file not found: /path/to/api.c')
	})

	it('should format other errors with the reason', () => {
		const result = formatReadError('/path/to/api.c', systemError('permission denied', 'EACCES'))
		assert.strictEqual(result, "[HCLI002] cannot read file '/path/to/api.c': permission denied")
	})

	it('should handle plain Error', () => {
		const result = formatReadError('api.c', new Error('unknown error'))
		assert.strictEqual(result, "[HCLI002] cannot read file 'api.c': unknown error")
	})
})

describe('formatWriteError', () => {
	it('should include the path and reason', () => {
		const result = formatWriteError('out/api.h', new Error('disk full'))
		assert.strictEqual(result, "[HCLI003] cannot write file 'out/api.h': disk full")
	})
})

describe('formatOutsideRootError', () => {
	it('should name the target and the root', () => {
		assert.strictEqual(
			formatOutsideRootError('lib/x.c', 'src'),
			"[HCLI004] target 'lib/x.c' is not a member of the root directory 'src'"
		)
	})
})

describe('formatTargetError', () => {
	it('should name the target', () => {
		assert.strictEqual(formatTargetError('api.c'), "[HCLI005] failed to process target: 'api.c'")
	})
})

describe('formatProcessError', () => {
	it('should return messages of known errors directly', () => {
		const scan = new ScanError('api.c:1:2 syntax error [HSYN001] ...', 'HSYN001', 'api.c', 1, 2)
		assert.strictEqual(formatProcessError(scan), 'api.c:1:2 syntax error [HSYN001] ...')
		assert.strictEqual(formatProcessError(new ConfigError('[HCFG005] x', 'HCFG005')), '[HCFG005] x')
		assert.strictEqual(formatProcessError(new IoError('[HCLI001] y')), '[HCLI001] y')
		assert.strictEqual(formatProcessError(new TargetError('[HCLI004] z', 'a.c')), '[HCLI004] z')
	})

	it('should wrap other errors', () => {
		assert.strictEqual(
			formatProcessError(new Error('something went wrong')),
			'[HCLI006] processing failed: something went wrong'
		)
	})

	it('should handle non-Error values', () => {
		assert.strictEqual(formatProcessError('string error'), '[HCLI006] processing failed: string error')
	})
})

describe('isTargetFailure', () => {
	it('should confine syntax and target errors to their target', () => {
		assert.strictEqual(isTargetFailure(new ScanError('m', 'HSYN002', 'a.c', 1, 1)), true)
		assert.strictEqual(isTargetFailure(new TargetError('m', 'a.c')), true)
	})

	it('should treat I/O and unknown errors as fatal', () => {
		assert.strictEqual(isTargetFailure(new IoError('m')), false)
		assert.strictEqual(isTargetFailure(new Error('m')), false)
	})
})
