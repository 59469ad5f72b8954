/**
 * Straightforward interpreter over instruction text, independent of the
 * compiler. Tests hold the compiled pipeline against it.
 */

export type Outcome =
	| { kind: 'ok'; output: number[]; pointer: number; cells: number[] }
	| { kind: 'underflow' }
	| { kind: 'aborted' }

/** Dense copy of `cells` without trailing zeros. */
export function trimCells(cells: ArrayLike<number | undefined>): number[] {
	const dense = Array.from({ length: cells.length }, (_, i) => cells[i] ?? 0)
	while (dense.length > 0 && dense[dense.length - 1] === 0) dense.pop()
	return dense
}

function jumpTable(code: readonly string[]): Map<number, number> {
	const jumps = new Map<number, number>()
	const open: number[] = []
	code.forEach((char, i) => {
		if (char === '[') open.push(i)
		if (char === ']') {
			const start = open.pop()
			if (start === undefined) throw new Error(`unbalanced ']' at ${i}`)
			jumps.set(start, i)
			jumps.set(i, start)
		}
	})
	if (open.length > 0) throw new Error('unbalanced [')
	return jumps
}

/**
 * Runs `source`; `budget` bounds the number of loop iterations. End of
 * input reads 0 and moving left of cell 0 is an underflow.
 */
export function interpretReference(
	source: string,
	input: readonly number[] = [],
	budget = 20_000
): Outcome {
	const code = Array.from(source).filter((char) => '<>+-.,[]'.includes(char))
	const jumps = jumpTable(code)
	const cells: number[] = []
	const output: number[] = []
	let pointer = 0
	let inputIndex = 0
	let steps = 0

	for (let pc = 0; pc < code.length; pc++) {
		const current = cells[pointer] ?? 0
		switch (code[pc]) {
			case '>':
				pointer++
				break
			case '<':
				pointer--
				if (pointer < 0) return { kind: 'underflow' }
				break
			case '+':
				cells[pointer] = (current + 1) & 0xff
				break
			case '-':
				cells[pointer] = (current + 255) & 0xff
				break
			case '.':
				output.push(current)
				break
			case ',':
				cells[pointer] = input[inputIndex] ?? 0
				inputIndex++
				break
			case '[':
				if (current === 0) {
					pc = jumps.get(pc) ?? pc
				} else if (++steps > budget) {
					return { kind: 'aborted' }
				}
				break
			case ']':
				if (current !== 0) {
					if (++steps > budget) return { kind: 'aborted' }
					pc = jumps.get(pc) ?? pc
				}
				break
		}
	}

	return { cells: trimCells(cells), kind: 'ok', output, pointer }
}
