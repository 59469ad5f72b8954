import { IrKind, type IrNode, mulAt, setAt, toByte } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/**
 * Net change per offset for a body of plain AddAt nodes, or null when the
 * body does anything else.
 */
function netDeltas(body: readonly IrNode[]): Map<number, number> | null {
	const deltas = new Map<number, number>()
	for (const node of body) {
		if (node.kind !== IrKind.AddAt) return null
		deltas.set(node.offset, (deltas.get(node.offset) ?? 0) + node.delta)
	}
	return deltas
}

function collapseLoop(body: readonly IrNode[]): IrNode[] | null {
	const deltas = netDeltas(body)
	if (deltas === null) return null

	// The counter cell must step by exactly one so the trip count is known.
	const counter = toByte(deltas.get(0) ?? 0)
	if (counter !== 255 && counter !== 1) return null
	const sign = counter === 255 ? 1 : -1

	const out: IrNode[] = []
	for (const [offset, delta] of deltas) {
		if (offset === 0) continue
		const product = mulAt(0, offset, sign * delta)
		if (product.factor !== 0) out.push(product)
	}
	out.push(setAt(0, 0))
	return out
}

/**
 * Turns multiplication loops into straight-line code.
 *
 * `[->+++>+<<]` adds three times the cell to its right neighbour and once to
 * the next, then clears it: MulAt(0, 1, 3), MulAt(0, 2, 1), SetAt(0, 0).
 * A loop counting up by one multiplies by the negated deltas, since it runs
 * 256 - n times.
 */
export function collapseMultiplications(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, (block) =>
		block.flatMap((node) =>
			node.kind === IrKind.Loop ? (collapseLoop(node.body) ?? [node]) : [node]
		)
	)
}
