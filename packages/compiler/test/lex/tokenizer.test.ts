import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function tokensOf(source: string): Token[] {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	return Array.from(ctx.tokens, ([, token]) => token)
}

describe('lex/tokenizer', () => {
	describe('basic tokenization', () => {
		it('should tokenize empty input to nothing', () => {
			const ctx = new CompilationContext('')
			const result = tokenize(ctx)

			assert.deepStrictEqual(result, { count: 0, succeeded: true })
		})

		it('should produce one token per instruction character', () => {
			const kinds = tokensOf('><+-.,[]').map((t) => t.kind)
			assert.deepStrictEqual(kinds, [
				TokenKind.MoveRight,
				TokenKind.MoveLeft,
				TokenKind.Increment,
				TokenKind.Decrement,
				TokenKind.Output,
				TokenKind.Input,
				TokenKind.LoopOpen,
				TokenKind.LoopClose,
			])
		})

		it('should skip comment text', () => {
			const kinds = tokensOf('add two: ++ then print it.').map((t) => t.kind)
			assert.deepStrictEqual(kinds, [TokenKind.Increment, TokenKind.Increment, TokenKind.Output])
		})
	})

	describe('positions', () => {
		it('should track lines and columns', () => {
			const tokens = tokensOf('+ x\n  -\n\n.')
			assert.deepStrictEqual(
				tokens.map((t) => [t.line, t.column, t.offset]),
				[
					[1, 1, 0],
					[2, 3, 6],
					[4, 1, 9],
				]
			)
		})

		it('should count columns in code points', () => {
			const [token] = tokensOf('🐛+')
			assert.strictEqual(token?.column, 2)
			assert.strictEqual(token?.offset, 2)
		})

		it('should ignore a leading byte order mark', () => {
			const [token] = tokensOf('\uFEFF+')
			assert.strictEqual(token?.column, 1)
			assert.strictEqual(token?.offset, 1)
		})

		it('should treat CRLF as one line break', () => {
			const tokens = tokensOf('+\r\n-')
			assert.deepStrictEqual(
				tokens.map((t) => [t.line, t.column]),
				[
					[1, 1],
					[2, 1],
				]
			)
		})
	})
})
