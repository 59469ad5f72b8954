/**
 * IR optimizer.
 *
 * A fixed pipeline of pure passes. Each pass takes a node list and returns
 * a new one with the same observable behaviour, loop bodies rewritten first.
 */

import type { IrNode } from '../ir/types.ts'
import { type OptimizeOptions, resolveOptimizeOptions } from './options.ts'
import { collapseAssignments } from './passes/collapse-assignments.ts'
import { collapseMoves } from './passes/collapse-moves.ts'
import { collapseMultiplications } from './passes/collapse-multiplications.ts'
import { collapseOffsets } from './passes/collapse-offsets.ts'
import { collapseScanLoops } from './passes/collapse-scan-loops.ts'
import { deferMovements } from './passes/defer-movements.ts'
import { mergeOperators } from './passes/merge-operators.ts'

export {
	DEFAULT_OPTIMIZE_OPTIONS,
	NO_OPTIMIZATIONS,
	type OptimizeOptions,
	type ResolvedOptimizeOptions,
	resolveOptimizeOptions,
} from './options.ts'
export {
	type CollapseAssignmentsOptions,
	collapseAssignments,
} from './passes/collapse-assignments.ts'
export { collapseMoves } from './passes/collapse-moves.ts'
export { collapseMultiplications } from './passes/collapse-multiplications.ts'
export { collapseOffsets } from './passes/collapse-offsets.ts'
export { collapseScanLoops } from './passes/collapse-scan-loops.ts'
export { deferMovements } from './passes/defer-movements.ts'
export { mergeOperators } from './passes/merge-operators.ts'

export interface OptimizationPass {
	readonly name: string
	apply(nodes: readonly IrNode[]): IrNode[]
}

/**
 * The passes `options` enables, in execution order.
 * Multiplication loops are collapsed after movements are deferred, and
 * movements are deferred once more so the new code fuses with its
 * neighbours.
 */
export function passesFor(options: boolean | OptimizeOptions = true): OptimizationPass[] {
	const enabled = resolveOptimizeOptions(options)
	const passes: OptimizationPass[] = []

	if (enabled.mergeOperators) {
		passes.push({ apply: mergeOperators, name: 'mergeOperators' })
	}
	if (enabled.collapseAssignments) {
		const oddDeltas = enabled.collapseOddDeltas
		passes.push({
			apply: (nodes) => collapseAssignments(nodes, { oddDeltas }),
			name: 'collapseAssignments',
		})
	}
	if (enabled.collapseOffsets) {
		passes.push({ apply: collapseOffsets, name: 'collapseOffsets' })
	}
	if (enabled.deferMovements) {
		passes.push({ apply: deferMovements, name: 'deferMovements' })
	}
	if (enabled.collapseMultiplications) {
		passes.push({ apply: collapseMultiplications, name: 'collapseMultiplications' })
		if (enabled.deferMovements) {
			passes.push({ apply: deferMovements, name: 'deferMovements' })
		}
	}
	if (enabled.collapseMoves) {
		passes.push({ apply: collapseMoves, name: 'collapseMoves' })
	}
	if (enabled.collapseScanLoops) {
		passes.push({ apply: collapseScanLoops, name: 'collapseScanLoops' })
	}

	return passes
}

export function optimize(
	nodes: readonly IrNode[],
	options: boolean | OptimizeOptions = true
): IrNode[] {
	let current: IrNode[] = [...nodes]
	for (const pass of passesFor(options)) {
		current = pass.apply(current)
	}
	return current
}
