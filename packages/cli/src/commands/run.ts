import { createReadStream } from 'node:fs'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	analyze,
	type CompileResult,
	compile,
	execute,
	formatAnalysis,
	readSource,
} from '@tapeworm/compiler'
import { FdInput, FdOutput } from '../io.ts'
import {
	buildAbortHook,
	formatCompileError,
	formatReadError,
	formatRuntimeError,
	resolveOptimize,
	validateLimits,
} from '../utils.ts'

export default class RunCommand extends BaseCommand {
	static override commandName = 'run'
	static override description = 'Compile a tape program and run it, stdin as input and stdout as output'

	@args.string({ description: 'Source file to run' })
	declare file: string

	@flags.boolean({ description: 'Execute the IR as built, with every pass off' })
	declare unoptimized: boolean

	@flags.boolean({ description: 'Also clear loops stepping a cell by any odd amount' })
	declare oddDeltas: boolean

	@flags.number({ description: 'Stop after this many loop iterations' })
	declare maxSteps?: number

	@flags.number({ description: 'Stop after this many milliseconds' })
	declare timeout?: number

	@flags.boolean({ description: 'Print node statistics after the run' })
	declare stats: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readSource(createReadStream(this.file))
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private compileSource(source: string): CompileResult | null {
		try {
			return compile(source, {
				filename: this.file,
				optimize: resolveOptimize({ oddDeltas: this.oddDeltas, unoptimized: this.unoptimized }),
			})
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return null
		}
	}

	private execute(result: CompileResult): boolean {
		const limits = { maxSteps: this.maxSteps, timeout: this.timeout }
		const shouldAbort = buildAbortHook(limits)
		try {
			execute(result.program, {
				input: new FdInput(),
				output: new FdOutput(),
				...(shouldAbort !== undefined ? { shouldAbort } : {}),
			})
			return true
		} catch (error: unknown) {
			this.logger.error(formatRuntimeError(error))
			this.exitCode = 1
			return false
		}
	}

	private printStats(result: CompileResult): void {
		const { stats } = result
		this.logger.info(
			`${stats.tokens} instructions, ${stats.irNodes} IR nodes, ${stats.optimizedNodes} after optimization`
		)
		this.logger.log(formatAnalysis(analyze(result.program)))
	}

	override async run(): Promise<void> {
		const invalid = validateLimits({ maxSteps: this.maxSteps, timeout: this.timeout })
		if (invalid !== null) {
			this.logger.error(invalid)
			this.exitCode = 1
			return
		}

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source)
		if (result === null) return

		const completed = this.execute(result)
		if (this.stats && completed) this.printStats(result)
	}
}
