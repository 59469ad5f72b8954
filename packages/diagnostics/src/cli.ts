/**
 * CLI diagnostic definitions.
 *
 * Error code format: TPCLI<NUMBER>
 * - TPCLI: CLI errors (001-099)
 */

import { type DiagnosticCatalog, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TPCLI001-099)
// =============================================================================

export const TPCLI001: DiagnosticDef = {
	code: 'TPCLI001',
	description: "Tapeworm couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TPCLI002: DiagnosticDef = {
	code: 'TPCLI002',
	description: "The file exists but Tapeworm can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TPCLI003: DiagnosticDef = {
	code: 'TPCLI003',
	description: 'A command line option was given a value Tapeworm does not accept.',
	message: 'invalid value for --{flag}: {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: '{hint}',
}

export const TPCLI004: DiagnosticDef = {
	code: 'TPCLI004',
	description: 'Something unexpected went wrong while running the program.',
	message: 'unexpected failure: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TPCLI001,
	TPCLI002,
	TPCLI003,
	TPCLI004,
} as const satisfies DiagnosticCatalog

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
