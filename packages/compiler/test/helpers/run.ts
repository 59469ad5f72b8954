import { compile } from '../../src/index.ts'
import { createStepLimit, execute, RuntimeError } from '../../src/exec/index.ts'
import { BufferInput, BufferOutput } from '../../src/exec/io.ts'
import type { IrNode } from '../../src/ir/types.ts'
import { type Outcome, trimCells } from './reference.ts'

/** IR exactly as built from `source`, no passes applied. */
export function irOf(source: string): IrNode[] {
	return compile(source, { optimize: false }).program
}

/** Executes IR and reduces the result to a comparable outcome. */
export function runIr(program: readonly IrNode[], input: readonly number[] = [], budget = 20_000): Outcome {
	const output = new BufferOutput()
	try {
		const machine = execute(program, {
			input: new BufferInput(input),
			output,
			shouldAbort: createStepLimit(budget),
		})
		return {
			cells: trimCells(machine.tape.slice(0, machine.tape.size)),
			kind: 'ok',
			output: Array.from(output.toBytes()),
			pointer: machine.pointer,
		}
	} catch (error: unknown) {
		if (error instanceof RuntimeError) {
			return error.code === 'TPRUN001' ? { kind: 'underflow' } : { kind: 'aborted' }
		}
		throw error
	}
}
