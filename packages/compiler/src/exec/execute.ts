import { IrKind, type IrNode } from '../ir/types.ts'
import { RuntimeError } from './errors.ts'
import type { AbortHook } from './hooks.ts'
import type { InputSource, OutputSink } from './io.ts'
import { Machine } from './machine.ts'

export interface ExecuteOptions {
	/** End of input stores 0 in the cell. Defaults to an empty source. */
	input?: InputSource
	/** Defaults to discarding output. */
	output?: OutputSink
	shouldAbort?: AbortHook
	/** Continue from existing state instead of a fresh tape. */
	machine?: Machine
}

interface Frame {
	readonly body: readonly IrNode[]
	index: number
}

const EMPTY_INPUT: InputSource = { read: () => null }
const DISCARD_OUTPUT: OutputSink = { write: () => {} }

/**
 * Runs a program against a machine and returns that machine.
 *
 * Loops are walked with an explicit frame stack, so nesting depth is not
 * bounded by the call stack. Addressing a cell left of cell 0 throws
 * RuntimeError TPRUN001; a true from `shouldAbort` throws TPRUN002. Either
 * way the machine keeps the state left by the last completed node and can
 * run again. The output sink is flushed however the run ends.
 */
export function execute(program: readonly IrNode[], options: ExecuteOptions = {}): Machine {
	const machine = options.machine ?? new Machine()
	const input = options.input ?? EMPTY_INPUT
	const output = options.output ?? DISCARD_OUTPUT
	const shouldAbort = options.shouldAbort
	const { tape } = machine
	let pointer = machine.pointer

	const address = (offset: number): number => {
		const cell = pointer + offset
		if (cell < 0) throw new RuntimeError('TPRUN001', cell)
		return cell
	}

	const poll = (): void => {
		if (shouldAbort?.()) throw new RuntimeError('TPRUN002', pointer)
	}

	const stack: Frame[] = [{ body: program, index: 0 }]

	try {
		for (;;) {
			const frame = stack[stack.length - 1]
			if (frame === undefined) break

			const node = frame.body[frame.index]
			if (node === undefined) {
				if (stack.length === 1) break
				// End of a loop body: back-edge or exit.
				if (tape.get(pointer) !== 0) {
					poll()
					frame.index = 0
				} else {
					stack.pop()
				}
				continue
			}
			frame.index++

			switch (node.kind) {
				case IrKind.AddAt:
					tape.add(address(node.offset), node.delta)
					break
				case IrKind.SetAt:
					tape.set(address(node.offset), node.value)
					break
				case IrKind.MulAt: {
					const source = address(node.offset)
					const value = tape.get(source)
					if (value !== 0) {
						tape.add(address(node.offset + node.into), value * node.factor)
					}
					break
				}
				case IrKind.Move:
					pointer = address(node.delta)
					break
				case IrKind.OutputAt:
					output.write(tape.get(address(node.offset)))
					break
				case IrKind.InputAt: {
					const cell = address(node.offset)
					tape.set(cell, input.read() ?? 0)
					break
				}
				case IrKind.Loop:
					poll()
					if (tape.get(pointer) !== 0) {
						stack.push({ body: node.body, index: 0 })
					}
					break
				case IrKind.ScanLoop:
					while (tape.get(pointer) !== 0) {
						poll()
						pointer = address(node.step)
					}
					break
			}
		}
	} finally {
		machine.pointer = pointer
		output.flush?.()
	}

	return machine
}
