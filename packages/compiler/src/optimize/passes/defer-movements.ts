import { IrKind, type IrNode, isOffsetNode, move, shiftOffset } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/**
 * Tracks pointer movement through each straight-line block and emits it as
 * one Move just before the next loop and at the end of the block.
 */
export function deferMovements(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, deferBlock)
}

function deferBlock(nodes: readonly IrNode[]): IrNode[] {
	const out: IrNode[] = []
	let pending = 0

	const flush = (): void => {
		if (pending !== 0) out.push(move(pending))
		pending = 0
	}

	for (const node of nodes) {
		if (node.kind === IrKind.Move) {
			pending += node.delta
		} else if (isOffsetNode(node)) {
			out.push(shiftOffset(node, pending))
		} else {
			flush()
			out.push(node)
		}
	}

	flush()
	return out
}
