import { createReadStream } from 'node:fs'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	analyze,
	type CompileResult,
	compile,
	formatAnalysis,
	formatIr,
	readSource,
} from '@tapeworm/compiler'
import {
	formatCompileError,
	formatInvalidOption,
	formatReadError,
	INSPECT_STAGES,
	type InspectStage,
	isValidStage,
} from '../utils.ts'

/**
 * Listing for one stage of the pipeline: the canonical program text, the
 * IR as built, or the IR after optimization.
 */
export function renderStage(result: CompileResult, stage: InspectStage): string {
	switch (stage) {
		case 'tree':
			return result.canonical
		case 'ir':
			return formatIr(result.unoptimized)
		case 'optimized':
			return formatIr(result.program)
	}
}

export default class InspectCommand extends BaseCommand {
	static override commandName = 'inspect'
	static override description = 'Show a tape program after parsing, IR building or optimization'

	@args.string({ description: 'Source file to inspect' })
	declare file: string

	@flags.string({
		alias: 's',
		default: 'optimized',
		description: `Stage to show: ${INSPECT_STAGES.join(', ')}`,
	})
	declare stage: string

	@flags.boolean({ description: 'Also clear loops stepping a cell by any odd amount' })
	declare oddDeltas: boolean

	override async run(): Promise<void> {
		const stage = this.stage
		if (!isValidStage(stage)) {
			this.logger.error(formatInvalidOption('stage', stage, `use ${INSPECT_STAGES.join(', ')}`))
			this.exitCode = 1
			return
		}

		let source: string
		try {
			source = await readSource(createReadStream(this.file))
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return
		}

		let result: CompileResult
		try {
			result = compile(source, {
				filename: this.file,
				optimize: { collapseOddDeltas: this.oddDeltas },
			})
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return
		}

		this.logger.log(renderStage(result, stage))
		if (stage !== 'tree') {
			const nodes = stage === 'ir' ? result.unoptimized : result.program
			this.logger.log('')
			this.logger.log(formatAnalysis(analyze(nodes)))
		}
	}
}
