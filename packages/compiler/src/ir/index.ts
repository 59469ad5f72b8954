export { buildIr } from './builder.ts'
export { countNodes, formatIr } from './format.ts'
export {
	type AddAt,
	addAt,
	type InputAt,
	IrKind,
	type IrNode,
	inputAt,
	isOffsetNode,
	type Loop,
	loop,
	type Move,
	type MulAt,
	move,
	mulAt,
	type OffsetNode,
	type OutputAt,
	outputAt,
	type ScanLoop,
	type SetAt,
	scanLoop,
	setAt,
	shiftOffset,
	toByte,
	wrapDelta,
} from './types.ts'
