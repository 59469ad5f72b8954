import type { Node, Semantics } from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import { type NodeId, NodeKind, nodeId } from '../core/nodes.ts'
import { type TokenId, TokenKind, tokenId } from '../core/tokens.ts'
import { TapewormGrammar, tokensToGrammarInput } from '../grammar/index.ts'

export interface ParseResult {
	succeeded: boolean
	rootNode?: NodeId
}

/**
 * Checks loop nesting with a stack of open brackets.
 * Every stray `]` and every `[` still open at the end is reported.
 */
function validateBrackets(context: CompilationContext): boolean {
	const open: TokenId[] = []
	let valid = true

	for (const [id, token] of context.tokens) {
		if (token.kind === TokenKind.LoopOpen) {
			open.push(id)
		} else if (token.kind === TokenKind.LoopClose) {
			if (open.pop() === undefined) {
				context.emitAtToken('TPPARSE001', id)
				valid = false
			}
		}
	}

	for (const id of open) {
		context.emitAtToken('TPPARSE002', id)
		valid = false
	}

	return valid
}

interface OpenLoop {
	readonly tokenId: TokenId
	/** Node count when the bracket opened; the body starts here */
	readonly start: number
}

/**
 * Emits nodes in postorder while walking the flat symbol list. A `[`
 * remembers where its body starts and the matching `]` stores the Loop
 * over everything emitted since.
 */
function createNodeEmittingSemantics(context: CompilationContext): Semantics {
	const semantics = TapewormGrammar.createSemantics()
	const open: OpenLoop[] = []

	function leaf(node: Node, kind: NodeKind): void {
		context.nodes.add({ kind, subtreeSize: 1, tokenId: tokenId(node.source.startIdx) })
	}

	semantics.addOperation<void>('emitNode', {
		decrement(_sym: Node): void {
			leaf(this, NodeKind.Decrement)
		},
		increment(_sym: Node): void {
			leaf(this, NodeKind.Increment)
		},
		input(_sym: Node): void {
			leaf(this, NodeKind.Input)
		},
		instruction(instruction: Node): void {
			instruction['emitNode']()
		},
		loopClose(_sym: Node): void {
			const loop = open.pop()
			if (loop === undefined) {
				throw new Error(`Unmatched ']' at token ${this.source.startIdx}`)
			}
			context.nodes.add({
				kind: NodeKind.Loop,
				subtreeSize: context.nodes.count() - loop.start + 1,
				tokenId: loop.tokenId,
			})
		},
		loopOpen(_sym: Node): void {
			open.push({ start: context.nodes.count(), tokenId: tokenId(this.source.startIdx) })
		},
		moveLeft(_sym: Node): void {
			leaf(this, NodeKind.MoveLeft)
		},
		moveRight(_sym: Node): void {
			leaf(this, NodeKind.MoveRight)
		},
		output(_sym: Node): void {
			leaf(this, NodeKind.Output)
		},
		Program(symbols: Node): void {
			const start = context.nodes.count()
			for (const symbol of symbols.children) {
				symbol['emitNode']()
			}
			if (open.length > 0) {
				throw new Error(`Unclosed '[' at token ${open[open.length - 1]?.tokenId}`)
			}
			context.nodes.add({
				kind: NodeKind.Program,
				subtreeSize: context.nodes.count() - start + 1,
				tokenId: tokenId(0),
			})
		},
		symbol(symbol: Node): void {
			symbol['emitNode']()
		},
	})

	return semantics
}

/**
 * Parses tokens from context.tokens and populates context.nodes.
 *
 * The Program node is the last node stored. Its tokenId is 0 even for an
 * empty program, so it is never used to locate a diagnostic.
 */
export function parse(context: CompilationContext): ParseResult {
	if (!validateBrackets(context)) {
		return { succeeded: false }
	}

	const matchResult = TapewormGrammar.match(tokensToGrammarInput(context.tokens))
	if (matchResult.failed()) {
		context.emit('TPPARSE003', 1, 1, {
			detail: matchResult.shortMessage ?? 'unexpected input',
		})
		return { succeeded: false }
	}

	createNodeEmittingSemantics(context)(matchResult)['emitNode']()
	return { rootNode: nodeId(context.nodes.count() - 1), succeeded: true }
}
