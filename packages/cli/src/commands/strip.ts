import type { ScanMode } from '@hoist/transducer'
import { TransduceCommand } from './transduce.ts'

export default class StripCommand extends TransduceCommand {
	static override commandName = 'strip'
	static override description = 'Remove annotations so sources compile as plain C'

	protected override readonly mode: ScanMode = 'strip'
}
