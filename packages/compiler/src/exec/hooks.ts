/**
 * Polled by the executor at every loop entry, loop back-edge and scan
 * step. Returning true stops the run.
 */
export type AbortHook = () => boolean

/** Stops a run after `maxSteps` polls. */
export function createStepLimit(maxSteps: number): AbortHook {
	let steps = 0
	return () => {
		steps++
		return steps > maxSteps
	}
}

/**
 * Stops a run once `ms` milliseconds have passed. The clock is read on
 * every `checkEvery`-th poll only.
 */
export function createDeadline(
	ms: number,
	now: () => number = Date.now,
	checkEvery = 1024
): AbortHook {
	const deadline = now() + ms
	let polls = 0
	return () => {
		polls++
		if (polls % checkEvery !== 0) return false
		return now() >= deadline
	}
}

/**
 * Stops when any of the hooks does; undefined when there are none.
 * Every hook sees every poll.
 */
export function anyOf(...hooks: Array<AbortHook | undefined>): AbortHook | undefined {
	const present = hooks.filter((hook): hook is AbortHook => hook !== undefined)
	if (present.length === 0) return undefined
	if (present.length === 1) return present[0]
	return () => {
		let stop = false
		for (const hook of present) {
			if (hook()) stop = true
		}
		return stop
	}
}
