import { createInterface } from 'node:readline'
import { BaseCommand, flags } from '@adonisjs/ace'
import { ReplSession } from '../repl/session.ts'
import { resolveOptimize, validateLimits } from '../utils.ts'

export default class ReplCommand extends BaseCommand {
	static override commandName = 'repl'
	static override description = 'Run instructions line by line against one persistent tape'

	@flags.boolean({ description: 'Execute the IR as built, with every pass off' })
	declare unoptimized: boolean

	@flags.boolean({ description: 'Also clear loops stepping a cell by any odd amount' })
	declare oddDeltas: boolean

	@flags.number({ description: 'Stop each entry after this many loop iterations' })
	declare maxSteps?: number

	@flags.number({ default: 5000, description: 'Stop each entry after this many milliseconds' })
	declare timeout?: number

	@flags.string({ description: 'Queue this text as program input before the first prompt' })
	declare input?: string

	override async run(): Promise<void> {
		const limits = { maxSteps: this.maxSteps, timeout: this.timeout }
		const invalid = validateLimits(limits)
		if (invalid !== null) {
			this.logger.error(invalid)
			this.exitCode = 1
			return
		}

		const session = new ReplSession({
			...limits,
			optimize: resolveOptimize({ oddDeltas: this.oddDeltas, unoptimized: this.unoptimized }),
		})
		if (this.input !== undefined) session.feed(`:input ${this.input}`)

		this.logger.info('Type :help for commands, :quit to leave.')

		const rl = createInterface({ input: process.stdin, output: process.stdout })
		rl.setPrompt(session.prompt())
		rl.prompt()

		await new Promise<void>((resolve) => {
			rl.on('line', (line) => {
				const answer = session.feed(line)
				if (answer.output.length > 0) {
					process.stdout.write(answer.output.endsWith('\n') ? answer.output : `${answer.output}\n`)
				}
				for (const note of answer.notes) this.logger.log(note)
				for (const error of answer.errors) this.logger.error(error)
				if (answer.exit) {
					rl.close()
					return
				}
				rl.setPrompt(session.prompt())
				rl.prompt()
			})
			rl.on('close', resolve)
		})
	}
}
