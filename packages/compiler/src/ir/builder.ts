import type { CompilationContext } from '../core/context.ts'
import { type NodeId, NodeKind, type ParseNode } from '../core/nodes.ts'
import { addAt, type IrNode, inputAt, loop, move, outputAt } from './types.ts'

function buildNode(node: ParseNode, body: IrNode[]): IrNode {
	switch (node.kind) {
		case NodeKind.Increment:
			return addAt(0, 1)
		case NodeKind.Decrement:
			return addAt(0, -1)
		case NodeKind.MoveRight:
			return move(1)
		case NodeKind.MoveLeft:
			return move(-1)
		case NodeKind.Output:
			return outputAt(0)
		case NodeKind.Input:
			return inputAt(0)
		case NodeKind.Loop:
			return loop(body)
		case NodeKind.Program:
			throw new Error(`Program node at token ${node.tokenId} nested inside another node`)
	}
}

/**
 * Translates a parsed program one node per instruction.
 * No fusion happens here; that is the optimizer's job.
 */
export function buildIr(context: CompilationContext, rootNode: NodeId): IrNode[] {
	return context.nodes
		.children(rootNode)
		.map(([childId]) => context.nodes.fold<IrNode>(childId, buildNode))
}
