import type { CompilationContext } from '../core/context.ts'
import { tokenKindOf } from '../core/tokens.ts'

export interface TokenizeResult {
	succeeded: boolean
	/** Number of instruction tokens produced */
	count: number
}

interface TokenizerState {
	line: number
	column: number
	/** UTF-16 index into the original source */
	offset: number
}

/**
 * UTF-8 Byte Order Mark (BOM) character.
 * Sometimes added by editors; skipped before scanning.
 */
const UTF8_BOM = '\uFEFF'

function createTokenizerState(source: string): TokenizerState {
	return {
		column: 1,
		line: 1,
		offset: source.startsWith(UTF8_BOM) ? UTF8_BOM.length : 0,
	}
}

function advance(char: string, state: TokenizerState): void {
	state.offset += char.length
	if (char === '\n') {
		state.line++
		state.column = 1
	} else {
		state.column++
	}
}

/**
 * Tokenizes source code, populating context.tokens.
 * Each instruction character becomes one token; every other character is a
 * comment and is skipped. Columns count code points.
 */
export function tokenize(context: CompilationContext): TokenizeResult {
	const state = createTokenizerState(context.source)
	const source = context.source.slice(state.offset)

	for (const char of source) {
		const kind = tokenKindOf(char)
		if (kind !== null) {
			context.tokens.add({ column: state.column, kind, line: state.line, offset: state.offset })
		}
		advance(char, state)
	}

	return { count: context.tokens.count(), succeeded: !context.hasErrors() }
}
