import { IrKind, type IrNode, isOffsetNode, move, shiftOffset } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/**
 * Peephole that lets cell operations absorb the movement before them:
 * `Move(m), X(o)` becomes `X(o + m), Move(m)`. Adjacent moves merge on the
 * way. Loops are barriers; their bodies are rewritten on their own.
 *
 * `>>+++<<` becomes AddAt(2, 3).
 */
export function collapseOffsets(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, absorbMoves)
}

function absorbMoves(nodes: readonly IrNode[]): IrNode[] {
	const out: IrNode[] = []

	for (const node of nodes) {
		const last = out[out.length - 1]

		if (node.kind === IrKind.Move) {
			if (last?.kind === IrKind.Move) {
				out.pop()
				const delta = last.delta + node.delta
				if (delta !== 0) out.push(move(delta))
			} else {
				out.push(node)
			}
			continue
		}

		if (isOffsetNode(node)) {
			if (last?.kind === IrKind.Move) {
				out.pop()
				out.push(shiftOffset(node, last.delta), last)
			} else {
				out.push(node)
			}
			continue
		}

		out.push(node)
	}

	return out
}
