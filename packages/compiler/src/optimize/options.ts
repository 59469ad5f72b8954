/**
 * Switches for the optimizer. Every pass is on unless turned off;
 * `collapseOddDeltas` widens clear-loop detection and is off by default.
 */
export interface OptimizeOptions {
	mergeOperators?: boolean
	collapseAssignments?: boolean
	collapseOddDeltas?: boolean
	collapseOffsets?: boolean
	deferMovements?: boolean
	collapseMultiplications?: boolean
	collapseMoves?: boolean
	collapseScanLoops?: boolean
}

export type ResolvedOptimizeOptions = Required<OptimizeOptions>

export const DEFAULT_OPTIMIZE_OPTIONS: ResolvedOptimizeOptions = {
	collapseAssignments: true,
	collapseMoves: true,
	collapseMultiplications: true,
	collapseOddDeltas: false,
	collapseOffsets: true,
	collapseScanLoops: true,
	deferMovements: true,
	mergeOperators: true,
}

/** Every pass switched off; the IR is executed exactly as built. */
export const NO_OPTIMIZATIONS: ResolvedOptimizeOptions = {
	collapseAssignments: false,
	collapseMoves: false,
	collapseMultiplications: false,
	collapseOddDeltas: false,
	collapseOffsets: false,
	collapseScanLoops: false,
	deferMovements: false,
	mergeOperators: false,
}

export function resolveOptimizeOptions(
	options: boolean | OptimizeOptions = true
): ResolvedOptimizeOptions {
	if (options === true) return DEFAULT_OPTIMIZE_OPTIONS
	if (options === false) return NO_OPTIMIZATIONS
	return { ...DEFAULT_OPTIMIZE_OPTIONS, ...options }
}
