/**
 * Runtime diagnostic definitions.
 *
 * Error code format: TPRUN<NUMBER>
 */

import { type DiagnosticCatalog, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// RUNTIME ERRORS (TPRUN001-099)
// =============================================================================

export const TPRUN001: DiagnosticDef = {
	code: 'TPRUN001',
	description: 'The program addressed a cell to the left of the first cell of the tape.',
	message: 'pointer underflow: cell {pointer} is left of the tape start',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move right before moving left; the tape starts at cell 0.',
}

export const TPRUN002: DiagnosticDef = {
	code: 'TPRUN002',
	description: 'The run was stopped by its abort hook (step limit, timeout or interrupt).',
	message: 'execution aborted at cell {pointer}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Raise --max-steps or --timeout if the program needs longer to finish.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const RUNTIME_DIAGNOSTICS = {
	TPRUN001,
	TPRUN002,
} as const satisfies DiagnosticCatalog

export type RuntimeDiagnosticCode = keyof typeof RUNTIME_DIAGNOSTICS
