import assert from 'node:assert'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import {
	type DispatchFlags,
	findSources,
	guardName,
	outputName,
	resolveDestination,
	selectOutput,
	validateDispatchOptions,
} from '../src/dispatch.ts'

function flags(overrides: Partial<DispatchFlags> = {}): DispatchFlags {
	return {
		includeGuard: false,
		keepGoing: false,
		stdout: false,
		tabIndent: 4,
		timestampMode: false,
		token: '@',
		...overrides,
	}
}

describe('selectOutput', () => {
	it('should write beside the sources by default', () => {
		assert.deepStrictEqual(selectOutput(flags()), { kind: 'beside' })
	})

	it('should select pipe mode', () => {
		assert.deepStrictEqual(selectOutput(flags({ stdout: true })), { kind: 'pipe' })
	})

	it('should select a single output file', () => {
		assert.deepStrictEqual(selectOutput(flags({ singleOutput: 'all.h' })), {
			kind: 'single',
			path: 'all.h',
		})
	})

	it('should select a directory with or without a root', () => {
		assert.deepStrictEqual(selectOutput(flags({ headerDir: 'include' })), {
			headerDir: 'include',
			kind: 'directory',
			rootDir: null,
		})
		assert.deepStrictEqual(selectOutput(flags({ headerDir: 'include', rootDirRecursive: 'src' })), {
			headerDir: 'include',
			kind: 'directory',
			rootDir: 'src',
		})
	})

	it('should reject pipe and single output together', () => {
		assert.throws(() => selectOutput(flags({ singleOutput: 'all.h', stdout: true })), {
			message: '[HCFG003] the --stdout and --single-output output modes cannot be used together',
			name: 'ConfigError',
		})
	})

	it('should reject single output with a directory', () => {
		assert.throws(() => selectOutput(flags({ headerDir: 'include', singleOutput: 'all.h' })), {
			message: '[HCFG003] the --single-output and directory output modes cannot be used together',
		})
	})

	it('should reject both root flags', () => {
		assert.throws(
			() => selectOutput(flags({ headerDir: 'include', rootDir: 'a', rootDirRecursive: 'b' })),
			{ message: '[HCFG003] the --root-dir and --root-dir-recursive output modes cannot be used together' }
		)
	})

	it('should require a header directory with a root', () => {
		assert.throws(() => selectOutput(flags({ rootDir: 'src' })), {
			message: '[HCFG004] a header directory must be given with the root source directory',
		})
	})
})

describe('validateDispatchOptions', () => {
	it('should carry flags into options', () => {
		const options = validateDispatchOptions('strip', ['a.c'], flags({ keepGoing: true, tabIndent: 0 }))
		assert.deepStrictEqual(options, {
			discoverRoot: null,
			files: ['a.c'],
			includeGuard: false,
			keepGoing: true,
			mode: 'strip',
			output: { kind: 'beside' },
			tabSize: 0,
			timestamp: false,
			token: '@',
		})
	})

	it('should require files without a recursive root', () => {
		assert.throws(() => validateDispatchOptions('extract', [], flags()), {
			message: '[HCFG005] no source files provided',
		})
	})

	it('should discover sources under a recursive root', () => {
		const options = validateDispatchOptions(
			'extract',
			[],
			flags({ headerDir: 'include', rootDirRecursive: 'src' })
		)
		assert.strictEqual(options.discoverRoot, 'src')
	})

	it('should reject an empty token', () => {
		assert.throws(() => validateDispatchOptions('extract', ['a.c'], flags({ token: '' })), {
			message: '[HCFG001] token must not be empty',
		})
	})

	it('should reject a negative tab indent', () => {
		assert.throws(() => validateDispatchOptions('extract', ['a.c'], flags({ tabIndent: -1 })), {
			message: '[HCFG002] invalid tab indent size "-1"',
		})
	})
})

describe('outputName', () => {
	it('should name headers after the source', () => {
		assert.strictEqual(outputName('src/net/socket.c', 'extract', true), 'socket.h')
	})

	it('should mark stripped sources written beside the original', () => {
		assert.strictEqual(outputName('src/socket.c', 'strip', true), 'socket.stripped.c')
		assert.strictEqual(outputName('src/socket.c', 'strip', false), 'socket.c')
	})
})

describe('resolveDestination', () => {
	it('should write beside the source', () => {
		assert.strictEqual(resolveDestination('src/api.c', 'extract', { kind: 'beside' }), join('src', 'api.h'))
	})

	it('should flatten into the header directory without a root', () => {
		const output = { headerDir: 'include', kind: 'directory', rootDir: null } as const
		assert.strictEqual(resolveDestination('src/net/api.c', 'extract', output), join('include', 'api.h'))
	})

	it('should mirror the tree under the root', () => {
		const output = { headerDir: 'include', kind: 'directory', rootDir: 'src' } as const
		assert.strictEqual(
			resolveDestination('src/net/api.c', 'extract', output),
			join('include', 'net', 'api.h')
		)
	})

	it('should reject a source outside the root', () => {
		const output = { headerDir: 'include', kind: 'directory', rootDir: 'src' } as const
		assert.throws(() => resolveDestination('lib/api.c', 'extract', output), {
			message: "[HCLI004] target 'lib/api.c' is not a member of the root directory 'src'",
			name: 'TargetError',
		})
	})
})

describe('guardName', () => {
	it('should upper-case the file name', () => {
		assert.strictEqual(guardName('include/api.h'), 'API_H')
	})

	it('should replace other characters with underscores', () => {
		assert.strictEqual(guardName('net-io.v2.h'), 'NET_IO_V2_H')
	})
})

describe('findSources', () => {
	let root = ''

	before(async () => {
		root = await mkdtemp(join(tmpdir(), 'hoist-find-'))
		await mkdir(join(root, 'net'))
		await mkdir(join(root, '.git'))
		await writeFile(join(root, 'main.c'), '')
		await writeFile(join(root, 'main.h'), '')
		await writeFile(join(root, 'net', 'socket.c'), '')
		await writeFile(join(root, '.git', 'hook.c'), '')
	})

	after(async () => {
		await rm(root, { force: true, recursive: true })
	})

	it('should find .c files recursively and skip hidden directories', async () => {
		assert.deepStrictEqual(await findSources(root), [join(root, 'main.c'), join(root, 'net', 'socket.c')])
	})

	it('should report a missing root as an I/O error', async () => {
		await assert.rejects(findSources(join(root, 'missing')), {
			message: `[HCLI001] file not found: ${join(root, 'missing')}`,
			name: 'IoError',
		})
	})
})
