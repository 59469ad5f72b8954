import {
	type DiagnosticDef,
	formatCoded,
	RUNTIME_DIAGNOSTICS,
	type RuntimeDiagnosticCode,
} from '@tapeworm/diagnostics'

/**
 * A run that stopped early. `pointer` is the cell the failing node
 * addressed (negative for an underflow) or the pointer at the abort.
 */
export class RuntimeError extends Error {
	readonly code: RuntimeDiagnosticCode
	readonly def: DiagnosticDef
	readonly pointer: number

	constructor(code: RuntimeDiagnosticCode, pointer: number) {
		const def = RUNTIME_DIAGNOSTICS[code]
		super(formatCoded(def, { pointer }))
		this.name = 'RuntimeError'
		this.code = code
		this.def = def
		this.pointer = pointer
	}
}

export function isRuntimeError(error: unknown): error is RuntimeError {
	return error instanceof RuntimeError
}
