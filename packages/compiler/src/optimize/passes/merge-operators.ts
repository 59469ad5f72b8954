import { addAt, IrKind, type IrNode, move, wrapDelta } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/**
 * Sums runs of AddAt on the same cell and runs of Move.
 *
 * `++++` becomes AddAt(0, 4); `+-` and `><` vanish. Running it on its own
 * output changes nothing.
 */
export function mergeOperators(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, mergeRuns)
}

function mergeRuns(nodes: readonly IrNode[]): IrNode[] {
	const out: IrNode[] = []

	for (const node of nodes) {
		const last = out[out.length - 1]

		if (node.kind === IrKind.AddAt) {
			if (last?.kind === IrKind.AddAt && last.offset === node.offset) {
				out.pop()
				const delta = wrapDelta(last.delta + node.delta)
				if (delta !== 0) out.push(addAt(node.offset, delta))
			} else if (node.delta !== 0) {
				out.push(node)
			}
			continue
		}

		if (node.kind === IrKind.Move) {
			if (last?.kind === IrKind.Move) {
				out.pop()
				const delta = last.delta + node.delta
				if (delta !== 0) out.push(move(delta))
			} else if (node.delta !== 0) {
				out.push(node)
			}
			continue
		}

		out.push(node)
	}

	return out
}
