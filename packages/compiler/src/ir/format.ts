import { IrKind, type IrNode } from './types.ts'
import { walkIr } from './walk.ts'

const INDENT = '  '

function label(node: IrNode): string {
	switch (node.kind) {
		case IrKind.AddAt:
			return `AddAt(${node.offset}, ${node.delta})`
		case IrKind.SetAt:
			return `SetAt(${node.offset}, ${node.value})`
		case IrKind.MulAt:
			return `MulAt(${node.offset}, ${node.into}, ${node.factor})`
		case IrKind.Move:
			return `Move(${node.delta})`
		case IrKind.OutputAt:
			return `OutputAt(${node.offset})`
		case IrKind.InputAt:
			return `InputAt(${node.offset})`
		case IrKind.ScanLoop:
			return `ScanLoop(${node.step})`
		case IrKind.Loop:
			return node.body.length === 0 ? 'Loop []' : 'Loop ['
	}
}

/**
 * Renders IR one node per line, loop bodies indented by two spaces.
 *
 * @example
 * formatIr([setAt(0, 2), loop([addAt(0, -1), outputAt(1)])])
 * // SetAt(0, 2)
 * // Loop [
 * //   AddAt(0, -1)
 * //   OutputAt(1)
 * // ]
 */
export function formatIr(nodes: readonly IrNode[]): string {
	const lines: string[] = []
	// Depths of loops whose closing bracket is still owed.
	const open: number[] = []
	const close = (depth: number): void => {
		while (open.length > 0 && (open[open.length - 1] ?? -1) >= depth) {
			lines.push(`${INDENT.repeat(open.pop() ?? 0)}]`)
		}
	}

	for (const { node, depth } of walkIr(nodes)) {
		close(depth)
		lines.push(`${INDENT.repeat(depth)}${label(node)}`)
		if (node.kind === IrKind.Loop && node.body.length > 0) open.push(depth)
	}
	close(0)
	return lines.join('\n')
}

/** Counts nodes including everything nested in loop bodies. */
export function countNodes(nodes: readonly IrNode[]): number {
	return Array.from(walkIr(nodes)).length
}
