/** How serious a diagnostic is. Tapeworm only reports errors today. */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * One catalog entry. `message` and `suggestion` are templates whose
 * `{name}` placeholders are filled from DiagnosticArgs.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	/** Longer explanation for documentation */
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Record<string, string | number>

/** Definitions of one phase, keyed by their own code. */
export type DiagnosticCatalog = Readonly<Record<string, DiagnosticDef>>
