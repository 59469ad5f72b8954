import { IrKind, type IrNode, scanLoop } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

/** `[>]` and `[<<]` become ScanLoop(1) and ScanLoop(-2). */
export function collapseScanLoops(nodes: readonly IrNode[]): IrNode[] {
	return rewriteBlocks(nodes, (block) =>
		block.map((node) => {
			if (node.kind !== IrKind.Loop) return node
			const only = node.body[0]
			if (node.body.length === 1 && only?.kind === IrKind.Move && only.delta !== 0) {
				return scanLoop(only.delta)
			}
			return node
		})
	)
}
