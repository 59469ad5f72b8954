export const DEFAULT_TAPE_SIZE = 1024

/**
 * Zero-initialized byte cells indexed from 0, growing to the right on
 * demand. Writes wrap modulo 256; reads past the allocated end are 0.
 * Callers never pass a negative index.
 */
export class Tape {
	private cells: Uint8Array

	constructor(initialSize = DEFAULT_TAPE_SIZE) {
		this.cells = new Uint8Array(Math.max(1, initialSize))
	}

	/** Cells currently allocated. */
	get size(): number {
		return this.cells.length
	}

	get(index: number): number {
		return this.cells[index] ?? 0
	}

	set(index: number, value: number): void {
		this.reserve(index)
		this.cells[index] = value
	}

	add(index: number, delta: number): void {
		this.set(index, this.get(index) + delta)
	}

	/** Values of cells [start, end), zeros past the allocated end. */
	slice(start: number, end: number): number[] {
		const values: number[] = []
		for (let i = start; i < end; i++) values.push(this.get(i))
		return values
	}

	clear(): void {
		this.cells.fill(0)
	}

	private reserve(index: number): void {
		if (index < this.cells.length) return
		let size = this.cells.length
		while (size <= index) size *= 2
		const grown = new Uint8Array(size)
		grown.set(this.cells)
		this.cells = grown
	}
}
