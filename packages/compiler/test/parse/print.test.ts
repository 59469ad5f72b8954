import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { type NodeId, nodeId } from '../../src/core/nodes.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { parse } from '../../src/parse/parser.ts'
import { printTree } from '../../src/parse/print.ts'

function parsed(source: string): { ctx: CompilationContext; root: NodeId } {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	const { rootNode } = parse(ctx)
	assert.ok(rootNode !== undefined)
	return { ctx, root: rootNode }
}

describe('parse/print', () => {
	it('should drop comments and keep instructions in order', () => {
		const { ctx, root } = parsed('read , then [ echo . and read , ] bye')
		assert.strictEqual(printTree(ctx, root), ',[.,]')
	})

	it('should print nested loops', () => {
		const { ctx, root } = parsed('+[>[-]<-]')
		assert.strictEqual(printTree(ctx, root), '+[>[-]<-]')
	})

	it('should print an empty program as empty text', () => {
		const { ctx, root } = parsed('nothing here')
		assert.strictEqual(printTree(ctx, root), '')
	})

	it('should print a single loop subtree', () => {
		const { ctx } = parsed('+[-]')
		// Nodes: 0 Increment, 1 Decrement, 2 Loop, 3 Program
		const loopId = nodeId(2)
		assert.strictEqual(printTree(ctx, loopId), '[-]')
	})
})
