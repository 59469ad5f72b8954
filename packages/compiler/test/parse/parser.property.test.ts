import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { CompilationContext } from '../../src/core/context.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { parse } from '../../src/parse/parser.ts'
import { printTree } from '../../src/parse/print.ts'
import { balancedProgram, commentedProgram } from '../helpers/arbitraries.ts'

function parseAndPrint(source: string): { printed: string; shape: string } | null {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	const { rootNode } = parse(ctx)
	if (rootNode === undefined) return null
	const shape = Array.from(ctx.nodes, ([, n]) => `${n.kind}/${n.subtreeSize}`).join(' ')
	return { printed: printTree(ctx, rootNode), shape }
}

function isBalanced(source: string): boolean {
	let depth = 0
	for (const char of source) {
		if (char === '[') depth++
		if (char === ']' && --depth < 0) return false
	}
	return depth === 0
}

describe('parse/parser properties', () => {
	it('accepts every balanced program and prints it back unchanged', () => {
		fc.assert(
			fc.property(balancedProgram(), (source) => {
				const result = parseAndPrint(source)
				assert.ok(result)
				assert.strictEqual(result.printed, source)
			}),
			{ numRuns: 300 }
		)
	})

	it('parses printed text to the same tree shape', () => {
		fc.assert(
			fc.property(commentedProgram(), (source) => {
				const first = parseAndPrint(source)
				assert.ok(first)
				const second = parseAndPrint(first.printed)
				assert.ok(second)
				assert.strictEqual(second.shape, first.shape)
				assert.strictEqual(second.printed, first.printed)
			}),
			{ numRuns: 300 }
		)
	})

	it('succeeds exactly when brackets balance', () => {
		fc.assert(
			fc.property(fc.string({ unit: fc.constantFrom('[', ']', '+', '>') }), (source) => {
				const ctx = new CompilationContext(source)
				tokenize(ctx)
				assert.strictEqual(parse(ctx).succeeded, isBalanced(source))
				assert.strictEqual(ctx.hasErrors(), !isBalanced(source))
			}),
			{ numRuns: 500 }
		)
	})
})
