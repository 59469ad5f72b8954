import {
	BufferInput,
	BufferOutput,
	CompileError,
	compile,
	execute,
	formatIr,
	type IrNode,
	Machine,
	type OptimizeOptions,
	SourceBuffer,
} from '@tapeworm/compiler'
import {
	buildAbortHook,
	formatRuntimeError,
	formatUnexpectedError,
	type LimitFlags,
} from '../utils.ts'

export const PROMPT = 'tapeworm> '
export const CONTINUATION_PROMPT = '...> '

export const HELP_TEXT = [
	':tape           show cells around the pointer',
	':reset          clear the tape, pointer and queued input',
	':input <text>   queue text (plus a newline) as program input',
	':ir             show the IR of the last program run',
	':help           show this help',
	':quit           leave the REPL',
].join('\n')

export interface ReplSessionOptions extends LimitFlags {
	optimize?: boolean | OptimizeOptions
	/** Starts from this machine instead of a fresh one */
	machine?: Machine
}

/** What one line of input produced. */
export interface ReplReply {
	/** Program output, decoded as UTF-8 */
	output: string
	/** Informational lines */
	notes: string[]
	/** Error lines */
	errors: string[]
	/** The user asked to leave */
	exit: boolean
}

function reply(parts: Partial<ReplReply> = {}): ReplReply {
	return { errors: [], exit: false, notes: [], output: '', ...parts }
}

/**
 * State of an interactive session: one machine kept across entries, a
 * queue of program input, and a buffer holding lines of an unfinished loop.
 *
 * Input nodes read from the queue; an empty queue reads 0, so a program
 * never waits for the terminal.
 */
export class ReplSession {
	readonly machine: Machine
	private readonly input = new BufferInput()
	private readonly buffer = new SourceBuffer()
	private readonly options: ReplSessionOptions
	private lastProgram: IrNode[] | null = null

	constructor(options: ReplSessionOptions = {}) {
		this.options = options
		this.machine = options.machine ?? new Machine()
	}

	prompt(): string {
		return this.buffer.isComplete() ? PROMPT : CONTINUATION_PROMPT
	}

	feed(line: string): ReplReply {
		const trimmed = line.trim()
		if (this.buffer.isEmpty() && trimmed.startsWith(':')) {
			return this.command(trimmed)
		}

		this.buffer.append(line)
		if (!this.buffer.isComplete()) return reply()

		return this.runSource(this.buffer.take())
	}

	private command(text: string): ReplReply {
		const space = text.indexOf(' ')
		const name = space === -1 ? text : text.slice(0, space)
		const argument = space === -1 ? '' : text.slice(space + 1)

		switch (name) {
			case ':help':
				return reply({ notes: [HELP_TEXT] })
			case ':quit':
			case ':exit':
				return reply({ exit: true })
			case ':tape':
				return reply({ notes: [this.machine.describe()] })
			case ':reset':
				this.machine.reset()
				this.input.clear()
				this.lastProgram = null
				return reply({ notes: ['tape reset'] })
			case ':input': {
				const text = `${argument}\n`
				this.input.appendString(text)
				return reply({ notes: [`queued ${Buffer.byteLength(text)} bytes`] })
			}
			case ':ir':
				if (this.lastProgram === null) {
					return reply({ notes: ['nothing has run yet'] })
				}
				return reply({
					notes: [this.lastProgram.length === 0 ? '(empty)' : formatIr(this.lastProgram)],
				})
			default:
				return reply({ errors: [`unknown command ${name} (try :help)`] })
		}
	}

	private runSource(source: string): ReplReply {
		let program: IrNode[]
		try {
			program = compile(source, {
				filename: '<repl>',
				...(this.options.optimize !== undefined ? { optimize: this.options.optimize } : {}),
			}).program
		} catch (error: unknown) {
			const message = error instanceof CompileError ? error.message : formatUnexpectedError(error)
			return reply({ errors: [message] })
		}

		this.lastProgram = program
		const output = new BufferOutput()
		const shouldAbort = buildAbortHook(this.options)
		try {
			execute(program, {
				input: this.input,
				machine: this.machine,
				output,
				...(shouldAbort !== undefined ? { shouldAbort } : {}),
			})
		} catch (error: unknown) {
			return reply({ errors: [formatRuntimeError(error)], output: output.text() })
		}
		return reply({ output: output.text() })
	}
}
