import type { CompilationContext } from '../core/context.ts'
import { type NodeId, NodeKind } from '../core/nodes.ts'

const INSTRUCTION_SYMBOLS: Readonly<Record<NodeKind, string>> = {
	[NodeKind.Increment]: '+',
	[NodeKind.Decrement]: '-',
	[NodeKind.MoveRight]: '>',
	[NodeKind.MoveLeft]: '<',
	[NodeKind.Output]: '.',
	[NodeKind.Input]: ',',
	[NodeKind.Loop]: '',
	[NodeKind.Program]: '',
}

/**
 * Re-serializes a parsed tree as bare instruction characters.
 * Comment text is gone; parsing the result yields the same tree shape.
 */
export function printTree(context: CompilationContext, rootNode: NodeId): string {
	return context.nodes.fold<string>(rootNode, (node, children) => {
		switch (node.kind) {
			case NodeKind.Loop:
				return `[${children.join('')}]`
			case NodeKind.Program:
				return children.join('')
			default:
				return INSTRUCTION_SYMBOLS[node.kind]
		}
	})
}
