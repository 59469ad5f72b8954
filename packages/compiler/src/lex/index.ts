/**
 * Lexical analysis module.
 * Tokenizes source code into a flat array of tokens.
 */

export { SourceBuffer } from './buffer.ts'
export { readSource } from './stream.ts'
export { type TokenizeResult, tokenize } from './tokenizer.ts'
