/**
 * Tapeworm Compiler Public API
 *
 * Data-oriented front end feeding an IR optimizer and a byte-tape machine:
 * - Dense arrays with integer IDs (TokenStore, NodeStore)
 * - Postorder node storage for O(1) child range lookup
 * - Unified CompilationContext flowing through the front-end phases
 * - Immutable IR rewritten by pure optimization passes
 */

import { CompilationContext, type Diagnostic } from './core/context.ts'
import { type ExecuteOptions, execute } from './exec/execute.ts'
import type { Machine } from './exec/machine.ts'
import { buildIr } from './ir/builder.ts'
import { countNodes } from './ir/format.ts'
import type { IrNode } from './ir/types.ts'
import { tokenize } from './lex/tokenizer.ts'
import { optimize } from './optimize/index.ts'
import type { OptimizeOptions } from './optimize/options.ts'
import { parse } from './parse/parser.ts'
import { printTree } from './parse/print.ts'

export { type Analysis, analyze, formatAnalysis } from './analyze/index.ts'
export {
	CompilationContext,
	type Diagnostic,
	DiagnosticSeverity,
} from './core/context.ts'
export { type NodeId, NodeKind, NodeStore, nodeId, type ParseNode } from './core/nodes.ts'
export {
	TOKEN_SYMBOLS,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindOf,
} from './core/tokens.ts'
export {
	type AbortHook,
	anyOf,
	BufferInput,
	BufferOutput,
	createDeadline,
	createStepLimit,
	DEFAULT_TAPE_SIZE,
	type ExecuteOptions,
	execute,
	type InputSource,
	isRuntimeError,
	Machine,
	type OutputSink,
	RuntimeError,
	Tape,
} from './exec/index.ts'
export * from './ir/index.ts'
export { readSource, SourceBuffer, type TokenizeResult, tokenize } from './lex/index.ts'
export {
	DEFAULT_OPTIMIZE_OPTIONS,
	NO_OPTIMIZATIONS,
	type OptimizationPass,
	type OptimizeOptions,
	optimize,
	passesFor,
	type ResolvedOptimizeOptions,
	resolveOptimizeOptions,
} from './optimize/index.ts'
export { type ParseResult, parse } from './parse/parser.ts'
export { printTree } from './parse/print.ts'

/**
 * Thrown when source does not compile. `message` holds every diagnostic,
 * each formatted with its source excerpt.
 */
export class CompileError extends Error {
	readonly diagnostics: readonly Diagnostic[]

	constructor(message: string, diagnostics: readonly Diagnostic[] = []) {
		super(message)
		this.name = 'CompileError'
		this.diagnostics = diagnostics
	}
}

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** `true` (default) runs every pass, `false` none, or pick passes */
	optimize?: boolean | OptimizeOptions
}

export interface CompileStats {
	readonly tokens: number
	readonly parseNodes: number
	readonly irNodes: number
	readonly optimizedNodes: number
}

export interface CompileResult {
	/** IR to execute */
	readonly program: IrNode[]
	/** IR as built, before any pass ran */
	readonly unoptimized: IrNode[]
	/** Instruction characters only, loops intact */
	readonly canonical: string
	readonly stats: CompileStats
}

export interface RunOptions extends CompileOptions, ExecuteOptions {}

export interface RunResult {
	readonly compiled: CompileResult
	readonly machine: Machine
}

function failure(context: CompilationContext, fallback: string): CompileError {
	const message = context.hasErrors() ? context.formatAllDiagnostics() : fallback
	return new CompileError(message, context.getDiagnostics())
}

/**
 * Compile source to optimized IR.
 *
 * This is the main entry point for compilation. It chains all phases:
 * 1. Tokenization (source → tokens)
 * 2. Parsing (tokens → parse nodes, brackets validated)
 * 3. IR building (parse nodes → IR)
 * 4. Optimization (IR → IR)
 *
 * @throws {CompileError} If the source has unbalanced brackets
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
	const context = new CompilationContext(source, options.filename)

	const tokenResult = tokenize(context)
	if (!tokenResult.succeeded) {
		throw failure(context, 'Tokenization failed')
	}

	const parseResult = parse(context)
	if (!parseResult.succeeded || parseResult.rootNode === undefined) {
		throw failure(context, 'Parse failed')
	}

	const unoptimized = buildIr(context, parseResult.rootNode)
	const program = optimize(unoptimized, options.optimize ?? true)

	return {
		canonical: printTree(context, parseResult.rootNode),
		program,
		stats: {
			irNodes: countNodes(unoptimized),
			optimizedNodes: countNodes(program),
			parseNodes: context.nodes.count(),
			tokens: tokenResult.count,
		},
		unoptimized,
	}
}

/**
 * Compile and execute in one step. Nothing runs if compilation fails.
 *
 * @throws {CompileError} If the source does not compile
 * @throws {RuntimeError} On pointer underflow or when `shouldAbort` fires
 */
export function run(source: string, options: RunOptions = {}): RunResult {
	const { filename, optimize: optimizeOption, ...executeOptions } = options
	const compiled = compile(source, {
		...(filename !== undefined ? { filename } : {}),
		...(optimizeOption !== undefined ? { optimize: optimizeOption } : {}),
	})
	const machine = execute(compiled.program, executeOptions)
	return { compiled, machine }
}
