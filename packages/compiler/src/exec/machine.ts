import { Tape } from './tape.ts'

/**
 * Tape plus pointer. Survives across runs, so an interactive session can
 * keep feeding programs to the same state.
 */
export class Machine {
	readonly tape: Tape
	pointer = 0

	constructor(tape: Tape = new Tape()) {
		this.tape = tape
	}

	reset(): void {
		this.tape.clear()
		this.pointer = 0
	}

	/**
	 * Cells within `width` of the pointer, the current one bracketed.
	 *
	 * @example
	 * // pointer at 2, cells 0..4 = 0 7 3 0 0
	 * machine.describe(2) // 'pointer 2: 0 7 [3] 0 0'
	 */
	describe(width = 8): string {
		const start = Math.max(0, this.pointer - width)
		const cells = this.tape.slice(start, this.pointer + width + 1).map((value, i) => {
			return start + i === this.pointer ? `[${value}]` : String(value)
		})
		return `pointer ${this.pointer}: ${cells.join(' ')}`
	}
}
