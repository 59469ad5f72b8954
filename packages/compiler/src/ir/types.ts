/**
 * Intermediate representation executed by the machine.
 *
 * Every node addresses cells relative to the pointer; only Move and ScanLoop
 * change the pointer. Nodes are immutable, so passes build new arrays.
 */

export const IrKind = {
	AddAt: 'AddAt',
	InputAt: 'InputAt',
	Loop: 'Loop',
	Move: 'Move',
	MulAt: 'MulAt',
	OutputAt: 'OutputAt',
	ScanLoop: 'ScanLoop',
	SetAt: 'SetAt',
} as const

export type IrKind = (typeof IrKind)[keyof typeof IrKind]

/** Add `delta` (signed byte, -128..127) to cell pointer + offset. */
export interface AddAt {
	readonly kind: typeof IrKind.AddAt
	readonly offset: number
	readonly delta: number
}

/** Store `value` (0..255) in cell pointer + offset. */
export interface SetAt {
	readonly kind: typeof IrKind.SetAt
	readonly offset: number
	readonly value: number
}

/**
 * If cell pointer + offset is non-zero, add that cell times `factor` to
 * cell pointer + offset + into. A zero source cell touches nothing.
 */
export interface MulAt {
	readonly kind: typeof IrKind.MulAt
	readonly offset: number
	readonly into: number
	readonly factor: number
}

export interface Move {
	readonly kind: typeof IrKind.Move
	readonly delta: number
}

export interface OutputAt {
	readonly kind: typeof IrKind.OutputAt
	readonly offset: number
}

export interface InputAt {
	readonly kind: typeof IrKind.InputAt
	readonly offset: number
}

/** Run `body` while the cell under the pointer is non-zero. */
export interface Loop {
	readonly kind: typeof IrKind.Loop
	readonly body: readonly IrNode[]
}

/** Step the pointer by `step` until the cell under it is zero. */
export interface ScanLoop {
	readonly kind: typeof IrKind.ScanLoop
	readonly step: number
}

export type IrNode = AddAt | SetAt | MulAt | Move | OutputAt | InputAt | Loop | ScanLoop

/** Nodes that address a cell through an offset and never move the pointer. */
export type OffsetNode = AddAt | SetAt | MulAt | OutputAt | InputAt

/** Reduce to a byte, 0..255. */
export function toByte(n: number): number {
	return ((n % 256) + 256) % 256
}

/** Reduce to a signed byte, -128..127. */
export function wrapDelta(n: number): number {
	const byte = toByte(n)
	return byte > 127 ? byte - 256 : byte
}

export function addAt(offset: number, delta: number): AddAt {
	return { delta: wrapDelta(delta), kind: IrKind.AddAt, offset }
}

export function setAt(offset: number, value: number): SetAt {
	return { kind: IrKind.SetAt, offset, value: toByte(value) }
}

export function mulAt(offset: number, into: number, factor: number): MulAt {
	return { factor: wrapDelta(factor), into, kind: IrKind.MulAt, offset }
}

export function move(delta: number): Move {
	return { delta, kind: IrKind.Move }
}

export function outputAt(offset: number): OutputAt {
	return { kind: IrKind.OutputAt, offset }
}

export function inputAt(offset: number): InputAt {
	return { kind: IrKind.InputAt, offset }
}

export function loop(body: readonly IrNode[]): Loop {
	return { body, kind: IrKind.Loop }
}

export function scanLoop(step: number): ScanLoop {
	return { kind: IrKind.ScanLoop, step }
}

export function isOffsetNode(node: IrNode): node is OffsetNode {
	switch (node.kind) {
		case IrKind.AddAt:
		case IrKind.SetAt:
		case IrKind.MulAt:
		case IrKind.OutputAt:
		case IrKind.InputAt:
			return true
		default:
			return false
	}
}

/** Same node, addressing a cell `by` further along. */
export function shiftOffset<T extends OffsetNode>(node: T, by: number): T {
	if (by === 0) return node
	return { ...node, offset: node.offset + by }
}
