import type { Writable } from 'node:stream'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import type { ScanMode } from '@hoist/transducer'
import { type DispatchOptions, validateDispatchOptions } from '../dispatch.ts'
import { dispatch, type TargetResult } from '../runner.ts'
import { formatProcessError, formatTargetError } from '../utils.ts'

/**
 * Flags and the run loop shared by the `headers` and `strip` commands.
 */
export abstract class TransduceCommand extends BaseCommand {
	protected abstract readonly mode: ScanMode

	/** Receives merged output in pipe mode */
	protected pipeOutput: Writable = process.stdout

	@args.spread({ description: 'C source files to process', required: false })
	declare files?: string[]

	@flags.string({ alias: 't', default: '@', description: 'Annotation token matched at line starts' })
	declare token: string

	@flags.number({
		alias: 'I',
		default: 4,
		description: 'Columns per tab when dedenting blocks (0 copies blocks verbatim)',
	})
	declare tabIndent: number

	@flags.string({ alias: 'd', description: 'Output directory (created if not exists)' })
	declare headerDir?: string

	@flags.string({ alias: 'r', description: 'Mirror sources under this directory into the output directory' })
	declare rootDir?: string

	@flags.string({
		alias: 'R',
		description: 'Like --root-dir, and process every .c file under it instead of the listed files',
	})
	declare rootDirRecursive?: string

	@flags.string({ alias: 's', description: 'Merge all sources into this file' })
	declare singleOutput?: string

	@flags.boolean({ alias: 'O', default: false, description: 'Merge all sources to standard output' })
	declare stdout: boolean

	@flags.boolean({
		alias: 'T',
		default: false,
		description: 'Skip sources whose output is newer, and stamp generated files',
	})
	declare timestampMode: boolean

	@flags.boolean({ alias: 'g', default: false, description: 'Wrap each header file in an include guard' })
	declare includeGuard: boolean

	@flags.boolean({ alias: 'k', default: false, description: 'Continue with the next file after a failure' })
	declare keepGoing: boolean

	@flags.boolean({ default: false, description: 'Trace processing' })
	declare verbose: boolean

	private resolveOptions(): DispatchOptions | null {
		try {
			return validateDispatchOptions(this.mode, this.files ?? [], {
				headerDir: this.headerDir,
				includeGuard: this.includeGuard,
				keepGoing: this.keepGoing,
				rootDir: this.rootDir,
				rootDirRecursive: this.rootDirRecursive,
				singleOutput: this.singleOutput,
				stdout: this.stdout,
				tabIndent: this.tabIndent,
				timestampMode: this.timestampMode,
				token: this.token,
			})
		} catch (error: unknown) {
			this.logger.error(formatProcessError(error))
			this.exitCode = 1
			return null
		}
	}

	/**
	 * Standard output carries the result in pipe mode, so tracing goes to
	 * standard error there.
	 */
	private createTrace(options: DispatchOptions): ((message: string) => void) | undefined {
		if (!this.verbose) return undefined
		if (options.output.kind === 'pipe') return (message) => console.error(message)
		return (message) => this.logger.info(message)
	}

	private report(options: DispatchOptions, results: readonly TargetResult[]): void {
		if (results.length === 0 && options.discoverRoot !== null) {
			this.logger.warning(`No .c files found under ${options.discoverRoot}`)
			return
		}

		for (const result of results) {
			if (result.status !== 'failed') continue
			this.logger.error(formatTargetError(result.source))
			this.logger.error(result.message)
			this.exitCode = 1
		}

		const total = options.discoverRoot === null ? options.files.length : null
		if (this.exitCode === 1 && total !== null && results.length < total) {
			this.logger.warning(`${total - results.length} of ${total} files not processed`)
		}
	}

	override async run(): Promise<void> {
		const options = this.resolveOptions()
		if (options === null) return

		if (options.discoverRoot !== null && options.files.length > 0) {
			this.logger.warning('Listed files are ignored with --root-dir-recursive')
		}

		try {
			const results = await dispatch(options, {
				stdout: this.pipeOutput,
				trace: this.createTrace(options),
			})
			this.report(options, results)
		} catch (error: unknown) {
			this.logger.error(formatProcessError(error))
			this.exitCode = 1
		}
	}
}
