import {
	type AbortHook,
	anyOf,
	CompileError,
	createDeadline,
	createStepLimit,
	type OptimizeOptions,
	RuntimeError,
} from '@tapeworm/compiler'
import { formatCoded, TPCLI001, TPCLI002, TPCLI003, TPCLI004 } from '@tapeworm/diagnostics'

export const INSPECT_STAGES = ['tree', 'ir', 'optimized'] as const

export type InspectStage = (typeof INSPECT_STAGES)[number]

export interface LimitFlags {
	maxSteps?: number | undefined
	timeout?: number | undefined
}

export interface OptimizeFlags {
	unoptimized: boolean
	oddDeltas: boolean
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCoded(TPCLI001, { path: filePath })
	}
	return formatCoded(TPCLI002, { reason: getErrorMessage(error) })
}

export function formatUnexpectedError(error: unknown): string {
	return formatCoded(TPCLI004, { reason: getErrorMessage(error) })
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	return formatUnexpectedError(error)
}

export function formatRuntimeError(error: unknown): string {
	if (error instanceof RuntimeError) {
		return error.message
	}
	return formatUnexpectedError(error)
}

export function formatInvalidOption(flag: string, value: unknown, hint: string): string {
	return `${formatCoded(TPCLI003, { flag, value: String(value) })} (${hint})`
}

export function isValidStage(value: string): value is InspectStage {
	return INSPECT_STAGES.some((stage) => stage === value)
}

/**
 * Checks the limit flags; returns an error line for the first bad one.
 */
export function validateLimits(limits: LimitFlags): string | null {
	for (const [flag, value] of [
		['max-steps', limits.maxSteps],
		['timeout', limits.timeout],
	] as const) {
		if (value !== undefined && !(Number.isInteger(value) && value > 0)) {
			return formatInvalidOption(flag, value, 'expected a positive whole number')
		}
	}
	return null
}

export function buildAbortHook(limits: LimitFlags): AbortHook | undefined {
	return anyOf(
		limits.maxSteps !== undefined ? createStepLimit(limits.maxSteps) : undefined,
		limits.timeout !== undefined ? createDeadline(limits.timeout) : undefined
	)
}

export function resolveOptimize(flags: OptimizeFlags): boolean | OptimizeOptions {
	if (flags.unoptimized) return false
	return { collapseOddDeltas: flags.oddDeltas }
}
