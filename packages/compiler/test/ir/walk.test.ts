import assert from 'node:assert'
import { describe, it } from 'node:test'
import { addAt, IrKind, type IrNode, loop, move, outputAt, setAt } from '../../src/ir/types.ts'
import { rewriteBlocks, walkIr } from '../../src/ir/walk.ts'

function nest(depth: number, inner: IrNode[]): IrNode[] {
	let body = inner
	for (let i = 0; i < depth; i++) body = [loop(body)]
	return body
}

describe('ir/walk', () => {
	describe('walkIr', () => {
		it('should visit loop bodies right after their loop', () => {
			const visited = Array.from(
				walkIr([addAt(0, 1), loop([move(1), loop([])]), outputAt(0)]),
				({ node, depth }) => `${depth}:${node.kind}`
			)
			assert.deepStrictEqual(visited, [
				'0:AddAt',
				'0:Loop',
				'1:Move',
				'1:Loop',
				'0:OutputAt',
			])
		})

		it('should reach the bottom of deep nesting', () => {
			const depths = Array.from(walkIr(nest(50_000, [move(1)])), ({ depth }) => depth)
			assert.strictEqual(depths.length, 50_001)
			assert.strictEqual(depths[depths.length - 1], 50_000)
		})
	})

	describe('rewriteBlocks', () => {
		it('should rewrite inner blocks before the block holding them', () => {
			const seen: number[] = []
			rewriteBlocks([addAt(0, 1), loop([addAt(0, 2), loop([addAt(0, 3)])])], (block) => {
				seen.push(block.length)
				return block
			})
			assert.deepStrictEqual(seen, [1, 2, 2])
		})

		it('should hand loops over with their bodies already rewritten', () => {
			const result = rewriteBlocks([loop([loop([addAt(0, -1)])])], (block) =>
				block.map((node) =>
					node.kind === IrKind.Loop && node.body.length === 1 && node.body[0]?.kind === IrKind.AddAt
						? setAt(0, 0)
						: node
				)
			)
			assert.deepStrictEqual(result, [loop([setAt(0, 0)])])
		})

		it('should rewrite deep nesting', () => {
			const result = rewriteBlocks(nest(50_000, [move(1), move(1)]), (block) =>
				block.filter((node) => node.kind !== IrKind.Move)
			)
			assert.strictEqual(Array.from(walkIr(result)).length, 50_000)
		})
	})
})
