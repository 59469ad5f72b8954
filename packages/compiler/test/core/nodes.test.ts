import assert from 'node:assert'
import { describe, it } from 'node:test'
import { NodeKind, NodeStore, nodeId } from '../../src/core/nodes.ts'
import { tokenId } from '../../src/core/tokens.ts'

/**
 * Builds the postorder store for `+[->]`:
 *   0 Increment, 1 Decrement, 2 MoveRight, 3 Loop(1..2), 4 Program(0..3)
 */
function buildSample(): NodeStore {
	const store = new NodeStore()
	store.add({ kind: NodeKind.Increment, subtreeSize: 1, tokenId: tokenId(0) })
	store.add({ kind: NodeKind.Decrement, subtreeSize: 1, tokenId: tokenId(2) })
	store.add({ kind: NodeKind.MoveRight, subtreeSize: 1, tokenId: tokenId(3) })
	store.add({ kind: NodeKind.Loop, subtreeSize: 3, tokenId: tokenId(1) })
	store.add({ kind: NodeKind.Program, subtreeSize: 5, tokenId: tokenId(0) })
	return store
}

describe('core/nodes', () => {
	describe('NodeStore', () => {
		it('should count nodes and hand out ids in order', () => {
			const store = buildSample()
			assert.strictEqual(store.count(), 5)
			assert.strictEqual(store.get(nodeId(4)).kind, NodeKind.Program)
		})

		it('should throw on unknown ids', () => {
			assert.throws(() => new NodeStore().get(nodeId(0)), { message: 'Invalid NodeId: 0' })
		})

		it('should list direct children in source order', () => {
			const store = buildSample()
			assert.deepStrictEqual(
				store.children(nodeId(4)).map(([id]) => id),
				[0, 3]
			)
			assert.deepStrictEqual(
				store.children(nodeId(3)).map(([, node]) => node.kind),
				[NodeKind.Decrement, NodeKind.MoveRight]
			)
		})

		it('should have no children for a leaf or an empty loop', () => {
			const store = new NodeStore()
			store.add({ kind: NodeKind.Loop, subtreeSize: 1, tokenId: tokenId(0) })
			assert.deepStrictEqual(store.children(nodeId(0)), [])
		})

		it('should fold a subtree bottom-up with children in source order', () => {
			const store = buildSample()
			const shape = store.fold<string>(nodeId(4), (node, children) =>
				children.length === 0 && node.kind !== NodeKind.Loop
					? String(node.kind)
					: `(${children.join(' ')})`
			)
			assert.strictEqual(shape, '(0 (1 2))')
		})

		it('should fold a leaf to its own value', () => {
			const store = buildSample()
			assert.strictEqual(
				store.fold<number>(nodeId(2), (node) => node.kind),
				NodeKind.MoveRight
			)
		})

		it('should fold nesting far deeper than the call stack', () => {
			const depth = 100_000
			const store = new NodeStore()
			store.add({ kind: NodeKind.Increment, subtreeSize: 1, tokenId: tokenId(0) })
			for (let i = 1; i <= depth; i++) {
				store.add({ kind: NodeKind.Loop, subtreeSize: i + 1, tokenId: tokenId(0) })
			}
			const loops = store.fold<number>(nodeId(depth), (node, children) =>
				node.kind === NodeKind.Loop ? 1 + (children[0] ?? 0) : 0
			)
			assert.strictEqual(loops, depth)
		})

		it('should throw when a subtree size overruns its children', () => {
			const store = new NodeStore()
			store.add({ kind: NodeKind.Loop, subtreeSize: 2, tokenId: tokenId(0) })
			assert.throws(() => store.fold(nodeId(0), () => 0), {
				message: 'Invalid NodeId: -1',
			})
		})

		it('should number kinds densely from zero', () => {
			assert.deepStrictEqual(
				Object.values(NodeKind).sort((a, b) => a - b),
				[0, 1, 2, 3, 4, 5, 6, 7]
			)
		})

		it('should iterate every node in storage order', () => {
			const kinds = Array.from(buildSample(), ([, node]) => node.kind)
			assert.deepStrictEqual(kinds, [
				NodeKind.Increment,
				NodeKind.Decrement,
				NodeKind.MoveRight,
				NodeKind.Loop,
				NodeKind.Program,
			])
		})
	})
})
