/**
 * @tapeworm/diagnostics
 *
 * Shared diagnostic types and definitions for Tapeworm packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TPCLI001,
	TPCLI002,
	TPCLI003,
	TPCLI004,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	TPPARSE001,
	TPPARSE002,
	TPPARSE003,
} from './compiler.ts'
export { formatCoded, interpolateMessage } from './interpolate.ts'
export { RUNTIME_DIAGNOSTICS, type RuntimeDiagnosticCode, TPRUN001, TPRUN002 } from './runtime.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCatalog,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'
import { RUNTIME_DIAGNOSTICS } from './runtime.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...RUNTIME_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
