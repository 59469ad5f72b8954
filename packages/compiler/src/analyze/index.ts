import { IrKind, type IrNode } from '../ir/types.ts'
import { walkIr } from '../ir/walk.ts'

export interface Analysis {
	/** All nodes, loop bodies included */
	readonly total: number
	readonly counts: Readonly<Record<IrKind, number>>
}

function emptyCounts(): Record<IrKind, number> {
	return {
		[IrKind.AddAt]: 0,
		[IrKind.InputAt]: 0,
		[IrKind.Loop]: 0,
		[IrKind.Move]: 0,
		[IrKind.MulAt]: 0,
		[IrKind.OutputAt]: 0,
		[IrKind.ScanLoop]: 0,
		[IrKind.SetAt]: 0,
	}
}

/** Counts IR nodes by kind. */
export function analyze(nodes: readonly IrNode[]): Analysis {
	const counts = emptyCounts()
	let total = 0
	for (const { node } of walkIr(nodes)) {
		counts[node.kind]++
		total++
	}
	return { counts, total }
}

/**
 * One line per kind that occurs, most frequent first, then the total.
 *
 * @example
 * formatAnalysis(analyze([addAt(0, 1), move(1), addAt(0, 2)]))
 * // AddAt      2
 * // Move       1
 * // total      3
 */
export function formatAnalysis(analysis: Analysis): string {
	const rows = Object.values(IrKind)
		.map((kind) => [kind, analysis.counts[kind]] as const)
		.filter(([, count]) => count > 0)
		.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
		.map(([kind, count]) => `${kind.padEnd(10)} ${count}`)
	rows.push(`${'total'.padEnd(10)} ${analysis.total}`)
	return rows.join('\n')
}
