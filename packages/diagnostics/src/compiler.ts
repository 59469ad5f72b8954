/**
 * Compiler diagnostic definitions.
 *
 * Error code format: TP<PHASE><NUMBER>
 * - TPPARSE: Parser errors (001-099)
 */

import { type DiagnosticCatalog, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (TPPARSE001-099)
// =============================================================================

export const TPPARSE001: DiagnosticDef = {
	code: 'TPPARSE001',
	description: 'This `]` closes a loop that was never opened.',
	message: "unmatched ']': no open loop to close",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the `]`, or add the `[` that should start this loop.',
}

export const TPPARSE002: DiagnosticDef = {
	code: 'TPPARSE002',
	description: 'This `[` starts a loop that is still open when the program ends.',
	message: "unclosed '[': loop opened here is never closed",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a matching `]` to close the loop.',
}

export const TPPARSE003: DiagnosticDef = {
	code: 'TPPARSE003',
	description: "The instruction stream didn't match the program grammar.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This usually means unbalanced brackets; check every `[` has a `]`.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	TPPARSE001,
	TPPARSE002,
	TPPARSE003,
} as const satisfies DiagnosticCatalog

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
