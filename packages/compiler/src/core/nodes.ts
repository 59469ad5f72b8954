/**
 * Parse tree of a tape program, kept in one dense array in postorder.
 *
 * A node's children are the `subtreeSize - 1` entries just before it, so
 * a Loop never holds references to its body. Program and Loop are the only
 * interior kinds.
 */

import type { TokenId } from './tokens.ts'

export const NodeKind = {
	Decrement: 1,
	Increment: 0,
	Input: 5,
	Loop: 6,
	MoveLeft: 3,
	MoveRight: 2,
	Output: 4,
	Program: 7,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

export type NodeId = number & { readonly __brand: 'NodeId' }

export function nodeId(n: number): NodeId {
	return n as NodeId
}

export interface ParseNode {
	readonly kind: NodeKind
	/** Instruction token, or the opening bracket for a Loop */
	readonly tokenId: TokenId
	/** This node plus everything nested in it */
	readonly subtreeSize: number
}

export class NodeStore {
	private readonly nodes: ParseNode[] = []

	add(node: ParseNode): NodeId {
		this.nodes.push(node)
		return nodeId(this.nodes.length - 1)
	}

	get(id: NodeId): ParseNode {
		const node = this.nodes[id]
		if (node === undefined) {
			throw new Error(`Invalid NodeId: ${id}`)
		}
		return node
	}

	count(): number {
		return this.nodes.length
	}

	/**
	 * Direct children in source order. Walks back from the node, hopping
	 * over each child's subtree to reach the sibling before it.
	 */
	children(id: NodeId): Array<[NodeId, ParseNode]> {
		const first = id - this.get(id).subtreeSize + 1
		const found: Array<[NodeId, ParseNode]> = []
		let cursor = id - 1
		while (cursor >= first) {
			const child = this.get(nodeId(cursor))
			found.push([nodeId(cursor), child])
			cursor -= child.subtreeSize
		}
		return found.reverse()
	}

	/**
	 * Folds the subtree under `id` bottom-up. `combine` sees each node with
	 * its children's results in source order. Runs in one forward sweep
	 * over the postorder array, so nesting depth costs no call stack.
	 */
	fold<T>(id: NodeId, combine: (node: ParseNode, children: T[]) => T): T {
		const first = id - this.get(id).subtreeSize + 1
		const done: Array<{ value: T; size: number }> = []
		for (let cursor = first; cursor <= id; cursor++) {
			const node = this.get(nodeId(cursor))
			const children: T[] = []
			let covered = 0
			while (covered < node.subtreeSize - 1) {
				const child = done.pop()
				if (child === undefined) {
					throw new Error(`Malformed subtree at NodeId: ${cursor}`)
				}
				children.push(child.value)
				covered += child.size
			}
			done.push({ size: node.subtreeSize, value: combine(node, children.reverse()) })
		}
		const root = done.pop()
		if (root === undefined || done.length > 0) {
			throw new Error(`Malformed subtree at NodeId: ${id}`)
		}
		return root.value
	}

	*[Symbol.iterator](): Generator<[NodeId, ParseNode]> {
		for (const [i, node] of this.nodes.entries()) {
			yield [nodeId(i), node]
		}
	}
}
