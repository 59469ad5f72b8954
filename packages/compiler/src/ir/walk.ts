import { IrKind, type IrNode, loop } from './types.ts'

interface Cursor {
	readonly nodes: readonly IrNode[]
	index: number
}

interface PendingBlock extends Cursor {
	readonly out: IrNode[]
}

/**
 * Every node in program order, loop bodies right after their Loop, with
 * its nesting depth. Uses an explicit stack, so depth is unbounded.
 */
export function* walkIr(nodes: readonly IrNode[]): Generator<{ node: IrNode; depth: number }> {
	const stack: Cursor[] = [{ index: 0, nodes }]
	for (;;) {
		const top = stack[stack.length - 1]
		if (top === undefined) return
		const node = top.nodes[top.index]
		if (node === undefined) {
			stack.pop()
			continue
		}
		top.index++
		yield { depth: stack.length - 1, node }
		if (node.kind === IrKind.Loop) stack.push({ index: 0, nodes: node.body })
	}
}

/**
 * Applies `rewrite` to every block, innermost first. Loop nodes handed to
 * `rewrite` already carry their rewritten bodies, so a pass only ever
 * looks at one level.
 */
export function rewriteBlocks(
	nodes: readonly IrNode[],
	rewrite: (block: IrNode[]) => IrNode[]
): IrNode[] {
	const stack: PendingBlock[] = [{ index: 0, nodes, out: [] }]
	for (;;) {
		const top = stack[stack.length - 1]
		if (top === undefined) return []
		const node = top.nodes[top.index]

		if (node === undefined) {
			const block = rewrite(top.out)
			stack.pop()
			const parent = stack[stack.length - 1]
			if (parent === undefined) return block
			parent.out.push(loop(block))
			parent.index++
			continue
		}

		if (node.kind === IrKind.Loop) {
			stack.push({ index: 0, nodes: node.body, out: [] })
		} else {
			top.out.push(node)
			top.index++
		}
	}
}
