/**
 * Token storage using dense arrays with integer IDs.
 * One token per instruction character; everything else never becomes a token.
 */

/** Token kinds - one per instruction symbol. */
export const TokenKind = {
	Decrement: 3,
	Increment: 2,
	Input: 5,
	LoopClose: 7,
	LoopOpen: 6,
	MoveLeft: 1,
	MoveRight: 0,
	Output: 4,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Instruction symbol for each token kind. */
export const TOKEN_SYMBOLS: Readonly<Record<TokenKind, string>> = {
	[TokenKind.MoveRight]: '>',
	[TokenKind.MoveLeft]: '<',
	[TokenKind.Increment]: '+',
	[TokenKind.Decrement]: '-',
	[TokenKind.Output]: '.',
	[TokenKind.Input]: ',',
	[TokenKind.LoopOpen]: '[',
	[TokenKind.LoopClose]: ']',
}

const SYMBOL_KINDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['>', TokenKind.MoveRight],
	['<', TokenKind.MoveLeft],
	['+', TokenKind.Increment],
	['-', TokenKind.Decrement],
	['.', TokenKind.Output],
	[',', TokenKind.Input],
	['[', TokenKind.LoopOpen],
	[']', TokenKind.LoopClose],
])

/** Token kind for an instruction character, or null for comment text. */
export function tokenKindOf(char: string): TokenKind | null {
	return SYMBOL_KINDS.get(char) ?? null
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * `offset` is the UTF-16 index of the character in the source.
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly offset: number
}

/** Tokens in source order; comment text never gets an id. */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		this.tokens.push(token)
		return tokenId(this.tokens.length - 1)
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (const [i, token] of this.tokens.entries()) {
			yield [tokenId(i), token]
		}
	}
}
