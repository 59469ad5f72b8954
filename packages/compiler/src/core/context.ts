/**
 * State shared by the front-end phases of one compilation: the source, the
 * token and node stores filled in by the tokenizer and parser, and the
 * diagnostics they report.
 */

import {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@tapeworm/diagnostics'
import { NodeStore } from './nodes.ts'
import { type TokenId, TokenStore } from './tokens.ts'

export { DiagnosticSeverity } from '@tapeworm/diagnostics'

export interface Diagnostic {
	readonly def: DiagnosticDef
	/** Message template with `args` filled in */
	readonly message: string
	/** 1-based */
	readonly line: number
	/** 1-based, in code points */
	readonly column: number
	readonly args?: DiagnosticArgs
	readonly tokenId?: TokenId
}

const SEVERITY_LABELS: Readonly<Record<DiagnosticSeverity, string>> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Note]: 'note',
	[DiagnosticSeverity.Warning]: 'warning',
}

/**
 * Gutter, source line and caret under the reported column:
 *
 * ```
 *    |
 *  3 | ,[.,
 *    |  ^
 * ```
 */
function excerpt(diagnostic: Diagnostic, sourceLine: string): { gutter: string; lines: string[] } {
	const number = String(diagnostic.line)
	const gutter = ` ${' '.repeat(number.length)} | `
	return {
		gutter,
		lines: [gutter, ` ${number} | ${sourceLine}`, `${gutter}${' '.repeat(diagnostic.column - 1)}^`],
	}
}

export class CompilationContext {
	readonly source: string
	readonly filename: string
	readonly tokens = new TokenStore()
	readonly nodes = new NodeStore()

	private readonly diagnostics: Diagnostic[] = []
	private lines: string[] | null = null

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
	}

	/** Report at an explicit line and column. */
	emit(code: CompilerDiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		this.report(code, { column, line }, args)
	}

	/** Report at the position of a token. */
	emitAtToken(code: CompilerDiagnosticCode, id: TokenId, args?: DiagnosticArgs): void {
		const { line, column } = this.tokens.get(id)
		this.report(code, { column, line, tokenId: id }, args)
	}

	private report(
		code: CompilerDiagnosticCode,
		at: Pick<Diagnostic, 'line' | 'column' | 'tokenId'>,
		args: DiagnosticArgs | undefined
	): void {
		const def = COMPILER_DIAGNOSTICS[code]
		this.diagnostics.push({
			...at,
			def,
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		})
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	/** Text of a 1-based line without its line ending. */
	getSourceLine(line: number): string | undefined {
		this.lines ??= this.source.split(/\r?\n/)
		return this.lines[line - 1]
	}

	/**
	 * Renders a diagnostic with its location, a source excerpt and the
	 * catalog's help line:
	 *
	 * ```
	 * error[TPPARSE002]: unclosed '[': loop opened here is never closed
	 *   --> examples/echo.b:3:2
	 *    |
	 *  3 | ,[.,
	 *    |  ^
	 *    |
	 *    = help: Add a matching `]` to close the loop.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const out = [
			`${SEVERITY_LABELS[def.severity]}[${def.code}]: ${diagnostic.message}`,
			`  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`,
		]

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) return out.join('\n')

		const { gutter, lines } = excerpt(diagnostic, sourceLine)
		out.push(...lines)
		if (def.suggestion) {
			out.push(gutter, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}
		return out.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
