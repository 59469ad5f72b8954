import { IrKind, type IrNode, move } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/** Sums whatever adjacent Moves earlier passes left behind. */
export function collapseMoves(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, sumMoves)
}

function sumMoves(nodes: readonly IrNode[]): IrNode[] {
	const out: IrNode[] = []
	for (const node of nodes) {
		const last = out[out.length - 1]
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
