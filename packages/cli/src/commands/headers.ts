import type { ScanMode } from '@hoist/transducer'
import { TransduceCommand } from './transduce.ts'

export default class HeadersCommand extends TransduceCommand {
	static override commandName = 'headers'
	static override description = 'Extract header declarations from annotated C sources'

	protected override readonly mode: ScanMode = 'extract'
}
