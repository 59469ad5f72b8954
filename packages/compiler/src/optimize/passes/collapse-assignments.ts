import { IrKind, type IrNode, setAt } from '../../ir/types.ts'
import { rewriteBlocks } from '../../ir/walk.ts'

export interface CollapseAssignmentsOptions {
	/**
	 * Also clear loops stepping the cell by any odd amount. An odd step is
	 * coprime to 256, so every start value reaches zero.
	 */
	oddDeltas?: boolean
}

function isClearLoop(body: readonly IrNode[], oddDeltas: boolean): boolean {
	const only = body[0]
	if (body.length !== 1 || only === undefined) return false
	if (only.kind !== IrKind.AddAt || only.offset !== 0) return false
	if (only.delta === 1 || only.delta === -1) return true
	return oddDeltas && only.delta % 2 !== 0
}

/**
 * Replaces clear loops (`[-]`, `[+]`) with SetAt(0, 0), then folds an
 * AddAt straight after a SetAt on the same cell into the SetAt.
 *
 * `[-]+++` becomes SetAt(0, 3).
 */
export function collapseAssignments(
	nodes: readonly IrNode[],
	options: CollapseAssignmentsOptions = {}
): IrNode[] {
	const oddDeltas = options.oddDeltas ?? false
	return rewriteBlocks(nodes, (block) => collapseBlock(block, oddDeltas))
}

function collapseBlock(nodes: readonly IrNode[], oddDeltas: boolean): IrNode[] {
	const out: IrNode[] = []

	for (const original of nodes) {
		const node =
			original.kind === IrKind.Loop && isClearLoop(original.body, oddDeltas)
				? setAt(0, 0)
				: original

		const last = out[out.length - 1]
		if (
			node.kind === IrKind.AddAt &&
			last?.kind === IrKind.SetAt &&
			last.offset === node.offset
		) {
			out.pop()
			out.push(setAt(node.offset, last.value + node.delta))
			continue
		}

		out.push(node)
	}

	return out
}
