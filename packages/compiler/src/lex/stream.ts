import type { Readable } from 'node:stream'
import { StringDecoder } from 'node:string_decoder'

const UTF8_BOM = '\uFEFF'

interface ReadState {
	isFirstChunk: boolean
	readonly decoder: StringDecoder
}

/**
 * Converts a chunk to string and strips BOM if first chunk.
 * A multi-byte character split across chunks is held back by the decoder.
 */
function chunkToString(chunk: unknown, state: ReadState): string {
	let str: string
	if (typeof chunk === 'string') {
		str = chunk
	} else if (chunk instanceof Uint8Array) {
		str = state.decoder.write(chunk)
	} else {
		throw new TypeError(`Unsupported stream chunk: ${typeof chunk}`)
	}
	if (state.isFirstChunk && str.length > 0) {
		if (str.startsWith(UTF8_BOM)) {
			str = str.slice(1)
		}
		state.isFirstChunk = false
	}
	return str
}

/**
 * Reads a whole UTF-8 stream into one source string.
 *
 * Program text arriving in several chunks compiles exactly like the same text
 * read in one piece.
 */
export async function readSource(stream: Readable): Promise<string> {
	const state: ReadState = { decoder: new StringDecoder('utf8'), isFirstChunk: true }
	const parts: string[] = []
	for await (const chunk of stream) {
		parts.push(chunkToString(chunk, state))
	}
	parts.push(state.decoder.end())
	return parts.join('')
}
