import * as ohm from 'ohm-js'
import { TOKEN_SYMBOLS, type TokenStore } from '../core/tokens.ts'

/**
 * Tapeworm Grammar Source
 *
 * Input is the token stream rendered one symbol per token, so an Ohm
 * interval's startIdx is the TokenId of the first token it covers. Comment
 * text never reaches the grammar.
 *
 * Brackets are plain symbols here. Nesting is rebuilt by the parser's
 * bracket stack, so deep loops never recurse inside the matcher.
 */
const grammarSource = String.raw`
Tapeworm {
  Program (a program) = symbol*
  symbol = loopOpen | loopClose | instruction
  loopOpen = "["
  loopClose = "]"

  instruction (an instruction) = increment | decrement | moveRight | moveLeft | output | input
  increment = "+"
  decrement = "-"
  moveRight = ">"
  moveLeft = "<"
  output = "."
  input = ","
}
`

/**
 * The compiled Tapeworm grammar.
 */
export const TapewormGrammar = ohm.grammar(grammarSource)

/**
 * Render tokens as grammar input, one character per token.
 */
export function tokensToGrammarInput(tokens: TokenStore): string {
	const parts: string[] = []
	for (const [, token] of tokens) {
		parts.push(TOKEN_SYMBOLS[token.kind])
	}
	return parts.join('')
}

/**
 * Match input against the grammar without extracting semantics.
 */
export function match(input: string): ohm.MatchResult {
	return TapewormGrammar.match(input)
}

/**
 * Trace a parse for debugging purposes.
 */
export function trace(input: string): string {
	return TapewormGrammar.trace(input).toString()
}
